/**
 * Tests for the portal HTTP transport
 */

import { describe, it, expect, vi } from 'vitest';
import { PortalHttp, buildUrl } from './http.js';
import { TransportError } from '../types/index.js';
import { createFakeFetch, jsonResponse } from '../testing/fixtures.js';

vi.mock('../utils/logger.js', () => ({
  info: vi.fn(),
  warn: vi.fn(),
  error: vi.fn(),
  debug: vi.fn(),
}));

describe('buildUrl', () => {
  it('returns the URL unchanged without query parameters', () => {
    expect(buildUrl('https://api.portal.test/x')).toBe('https://api.portal.test/x');
    expect(buildUrl('https://api.portal.test/x', {})).toBe('https://api.portal.test/x');
  });

  it('encodes query parameters', () => {
    expect(buildUrl('https://api.portal.test/x', { codigo_aplicacion: 'REG-FACT', q: 'a b' }))
      .toBe('https://api.portal.test/x?codigo_aplicacion=REG-FACT&q=a+b');
  });

  it('appends to an existing query string', () => {
    expect(buildUrl('https://api.portal.test/x?a=1', { b: '2' })).toBe('https://api.portal.test/x?a=1&b=2');
  });
});

describe('PortalHttp', () => {
  it('sends a JSON body and parses the JSON response', async () => {
    const { fetchFn, requests } = createFakeFetch(() => jsonResponse({ ok: 1 }));
    const http = new PortalHttp(fetchFn);

    const body = await http.request('POST', 'https://api.portal.test/upload', {
      json: { cantidad: 1 },
      headers: { 'content-type': 'application/json' },
    });

    expect(body).toEqual({ ok: 1 });
    expect(requests[0].method).toBe('POST');
    expect(requests[0].body).toEqual({ cantidad: 1 });
    expect(requests[0].headers['content-type']).toBe('application/json');
  });

  it('returns an empty object for 204 and empty bodies', async () => {
    const http204 = new PortalHttp(createFakeFetch(() => new Response(null, { status: 204 })).fetchFn);
    const httpEmpty = new PortalHttp(createFakeFetch(() => new Response('', { status: 200 })).fetchFn);

    expect(await http204.request('POST', 'https://api.portal.test/upload')).toEqual({});
    expect(await httpEmpty.request('POST', 'https://api.portal.test/upload')).toEqual({});
  });

  it('returns null for a non-JSON body', async () => {
    const http = new PortalHttp(createFakeFetch(() => new Response('OK', { status: 200 })).fetchFn);

    expect(await http.request('GET', 'https://api.portal.test/x')).toBeNull();
  });

  it('sends a binary body untouched', async () => {
    const { fetchFn, requests } = createFakeFetch(() => new Response('', { status: 200 }));
    const http = new PortalHttp(fetchFn);
    const bytes = Buffer.from('zip-bytes');

    await http.request('PUT', 'https://storage.portal.test/f.zip', { body: bytes });

    expect(requests[0].body).toBe(bytes);
  });

  it('throws TransportError with the status for non-2xx responses', async () => {
    const http = new PortalHttp(createFakeFetch(() => jsonResponse({ message: 'denied' }, 401)).fetchFn);

    const failure = http.request('GET', 'https://api.portal.test/x');

    await expect(failure).rejects.toBeInstanceOf(TransportError);
    await expect(failure).rejects.toMatchObject({
      status: 401,
      url: 'https://api.portal.test/x',
      details: '{"message":"denied"}',
    });
  });

  it('throws TransportError without status for network failures', async () => {
    const http = new PortalHttp(async () => {
      throw new Error('ECONNREFUSED');
    });

    await expect(http.request('GET', 'https://api.portal.test/x')).rejects.toMatchObject({
      name: 'TransportError',
      status: undefined,
      message: 'Portal request failed: GET https://api.portal.test/x: ECONNREFUSED',
    });
  });

  it('reports timeouts', async () => {
    const http = new PortalHttp(
      (_input, init) =>
        new Promise<Response>((_resolve, reject) => {
          init?.signal?.addEventListener('abort', () => {
            const abort = new Error('aborted');
            abort.name = 'AbortError';
            reject(abort);
          });
        }),
      10
    );

    await expect(http.request('GET', 'https://api.portal.test/slow')).rejects.toThrow(
      'Portal request timeout after 10ms: GET https://api.portal.test/slow'
    );
  });

  it('applies the timeout while the body is still streaming', async () => {
    const http = new PortalHttp(async (_input, init) => {
      const stalled = new ReadableStream<Uint8Array>({
        start(controller) {
          init?.signal?.addEventListener('abort', () => {
            const abort = new Error('aborted');
            abort.name = 'AbortError';
            controller.error(abort);
          });
        },
      });
      return new Response(stalled, { status: 200 });
    }, 10);

    await expect(http.request('GET', 'https://api.portal.test/stalled')).rejects.toThrow(
      'Portal request timeout after 10ms: GET https://api.portal.test/stalled'
    );
  });
});
