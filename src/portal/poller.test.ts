/**
 * Tests for the status poller
 */

import { describe, it, expect, vi } from 'vitest';
import { StatusPoller, isTerminal, observedState, FAILED_STATE, LOADED_STATE } from './poller.js';
import { PollTimeoutError, type StatusSnapshot } from '../types/index.js';

vi.mock('../utils/logger.js', () => ({
  info: vi.fn(),
  warn: vi.fn(),
  error: vi.fn(),
  debug: vi.fn(),
}));

const inProcess: StatusSnapshot = { state: 'EN_PROCESO', files: [{ state: 'EN_PROCESO', messages: [] }] };
const loaded: StatusSnapshot = { state: 'FINALIZADO', files: [{ state: LOADED_STATE, messages: [] }] };
const failed: StatusSnapshot = {
  state: 'FINALIZADO',
  files: [{ state: FAILED_STATE, messages: [{ code: 'E1', type: 'ERROR', description: 'Sin PDF' }] }],
};

describe('isTerminal', () => {
  it('is true when the first file is loaded or failed', () => {
    expect(isTerminal(loaded)).toBe(true);
    expect(isTerminal(failed)).toBe(true);
    expect(isTerminal(inProcess)).toBe(false);
    expect(isTerminal({ state: LOADED_STATE, files: [] })).toBe(false);
  });
});

describe('observedState', () => {
  it('prefers the first file state and falls back to the load state', () => {
    expect(observedState(inProcess)).toBe('EN_PROCESO');
    expect(observedState({ state: 'PENDIENTE', files: [] })).toBe('PENDIENTE');
  });
});

describe('StatusPoller', () => {
  it('stops at a failed file without further fetches', async () => {
    const fetchSnapshot = vi.fn<(key: string) => Promise<StatusSnapshot>>()
      .mockResolvedValueOnce(inProcess)
      .mockResolvedValue(failed);
    const sleep = vi.fn(async (_ms: number) => {});

    const snapshot = await new StatusPoller(fetchSnapshot, sleep).poll('tx-1', 10, 6);

    expect(snapshot).toBe(failed);
    expect(fetchSnapshot).toHaveBeenCalledTimes(2);
    expect(sleep).toHaveBeenCalledTimes(1);
  });

  it('returns the first terminal snapshot without sleeping', async () => {
    const fetchSnapshot = vi.fn(async () => loaded);
    const sleep = vi.fn(async () => {});

    const snapshot = await new StatusPoller(fetchSnapshot, sleep).poll('tx-1', 10, 6);

    expect(snapshot).toBe(loaded);
    expect(fetchSnapshot).toHaveBeenCalledWith('tx-1');
    expect(fetchSnapshot).toHaveBeenCalledTimes(1);
    expect(sleep).not.toHaveBeenCalled();
  });

  it('sleeps the interval between non-terminal snapshots', async () => {
    const fetchSnapshot = vi.fn<(key: string) => Promise<StatusSnapshot>>()
      .mockResolvedValueOnce(inProcess)
      .mockResolvedValueOnce(inProcess)
      .mockResolvedValueOnce(loaded);
    const sleep = vi.fn(async (_ms: number) => {});

    await new StatusPoller(fetchSnapshot, sleep).poll('tx-1', 10, 6);

    expect(fetchSnapshot).toHaveBeenCalledTimes(3);
    expect(sleep).toHaveBeenCalledTimes(2);
    expect(sleep).toHaveBeenCalledWith(6000);
  });

  it('fails after maxAttempts fetches and maxAttempts - 1 sleeps', async () => {
    const fetchSnapshot = vi.fn(async () => inProcess);
    const sleep = vi.fn(async () => {});

    const failure = new StatusPoller(fetchSnapshot, sleep).poll('tx-1', 10, 6);

    await expect(failure).rejects.toBeInstanceOf(PollTimeoutError);
    await expect(failure).rejects.toMatchObject({
      lastState: 'EN_PROCESO',
      correlationKey: 'tx-1',
      attempts: 10,
    });
    expect(fetchSnapshot).toHaveBeenCalledTimes(10);
    expect(sleep).toHaveBeenCalledTimes(9);
  });

  it('describes the timeout in business terms', async () => {
    const poller = new StatusPoller(async () => inProcess, async () => {});

    await expect(poller.poll('tx-9', 2, 0)).rejects.toThrow(
      "Después de 2 intentos, no se cargó la factura. Último estado de API fue 'EN_PROCESO'. El ID de Cargue es tx-9."
    );
  });

  it('makes at least one attempt', async () => {
    const fetchSnapshot = vi.fn(async () => inProcess);
    const sleep = vi.fn(async () => {});

    await expect(new StatusPoller(fetchSnapshot, sleep).poll('tx-1', 0, 6)).rejects.toMatchObject({ attempts: 1 });
    expect(fetchSnapshot).toHaveBeenCalledTimes(1);
    expect(sleep).not.toHaveBeenCalled();
  });

  it('propagates fetch failures immediately', async () => {
    const fetchSnapshot = vi.fn(async (): Promise<StatusSnapshot> => {
      throw new Error('network down');
    });
    const sleep = vi.fn(async () => {});

    await expect(new StatusPoller(fetchSnapshot, sleep).poll('tx-1', 10, 6)).rejects.toThrow('network down');
    expect(fetchSnapshot).toHaveBeenCalledTimes(1);
  });
});
