/**
 * Processing queue for running independent uploads concurrently
 * Uses p-queue for concurrency control
 */

import PQueue from 'p-queue';

/**
 * Processing queue with bounded concurrency
 */
export class ProcessingQueue {
  private queue: PQueue;

  /**
   * Creates a new processing queue
   *
   * @param concurrency - Maximum concurrent uploads (default: 1)
   */
  constructor(concurrency: number = 1) {
    this.queue = new PQueue({ concurrency: Math.max(1, concurrency) });
  }

  /**
   * Adds a task to the queue
   *
   * @param task - Async function to execute
   * @returns Promise that resolves when task completes
   */
  async add<T>(task: () => Promise<T>): Promise<T> {
    return this.queue.add(task, { throwOnTimeout: true });
  }

  /**
   * Adds multiple tasks and waits for all to complete
   *
   * @param tasks - Array of async functions
   * @returns Results in task order
   */
  async addAll<T>(tasks: Array<() => Promise<T>>): Promise<T[]> {
    return Promise.all(tasks.map(task => this.add(task)));
  }
}
