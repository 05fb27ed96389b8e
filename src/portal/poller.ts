/**
 * Bounded polling of the portal's asynchronous load processing
 */

import type { StatusSnapshot } from '../types/index.js';
import { PollTimeoutError } from '../types/index.js';
import { debug, info } from '../utils/logger.js';

/**
 * File state reported once the portal has finished processing
 */
export const LOADED_STATE = 'CARGADO';

/**
 * File state reported when the portal rejected the archive
 */
export const FAILED_STATE = 'ERROR';

/**
 * File states after which the portal does no further processing
 */
export const TERMINAL_STATES: ReadonlySet<string> = new Set([LOADED_STATE, FAILED_STATE]);

export type SnapshotFetcher = (correlationKey: string) => Promise<StatusSnapshot>;

export type Sleep = (ms: number) => Promise<void>;

/**
 * Sleeps for a specified number of milliseconds
 */
export function sleep(ms: number): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, ms));
}

/**
 * State used for progress and timeout reporting:
 * the first file's state, or the load state when there are no files
 */
export function observedState(snapshot: StatusSnapshot): string {
  return snapshot.files.length > 0 ? snapshot.files[0].state : snapshot.state;
}

/**
 * A snapshot is terminal when its first file finished processing, loaded or failed
 */
export function isTerminal(snapshot: StatusSnapshot): boolean {
  return snapshot.files.length > 0 && TERMINAL_STATES.has(snapshot.files[0].state);
}

export class StatusPoller {
  constructor(
    private readonly fetchSnapshot: SnapshotFetcher,
    private readonly sleepFn: Sleep = sleep
  ) {}

  /**
   * Polls until the load is terminal
   *
   * Performs at most maxAttempts fetches and maxAttempts - 1 sleeps.
   *
   * @param correlationKey - Transaction id of the load
   * @param maxAttempts - Fetch budget (values below 1 count as 1)
   * @param intervalSeconds - Wait between fetches
   * @returns The terminal snapshot
   * @throws PollTimeoutError with the last observed state when the budget runs out
   */
  async poll(correlationKey: string, maxAttempts: number, intervalSeconds: number): Promise<StatusSnapshot> {
    const attempts = Math.max(1, Math.floor(maxAttempts));
    let lastState = '';

    for (let attempt = 1; attempt <= attempts; attempt++) {
      const snapshot = await this.fetchSnapshot(correlationKey);
      lastState = observedState(snapshot);

      debug('Polled load status', {
        module: 'status-poller',
        phase: 'poll',
        attempt,
        maxAttempts: attempts,
        state: lastState,
        correlationKey,
      });

      if (isTerminal(snapshot)) {
        return snapshot;
      }

      if (attempt < attempts) {
        info('Load still in process, waiting', {
          module: 'status-poller',
          phase: 'poll',
          state: lastState,
          sleepSeconds: intervalSeconds,
          attempt,
        });
        await this.sleepFn(intervalSeconds * 1000);
      }
    }

    throw new PollTimeoutError(lastState, correlationKey, attempts);
  }
}
