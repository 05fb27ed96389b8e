/**
 * Batch runner: uploads many archives and records each verdict in the run ledger
 *
 * Every task gets its own uploader (and so its own Session); sessions are
 * never shared between concurrent uploads.
 */

import type { Outcome, UploadItem } from '../types/index.js';
import { FILE_NOT_FOUND_REASON, type RunLedger } from '../ledger/run-ledger.js';
import { ProcessingQueue } from './queue.js';
import { classifyError, errorReason } from '../portal/errors.js';
import { info, warn } from '../utils/logger.js';

/**
 * Anything that can upload one archive; UploadPipeline satisfies it
 */
export interface Uploader {
  upload(filePath: string, invoiceId: string): Promise<Outcome>;
}

export interface BatchRunnerOptions {
  /** Concurrent uploads */
  concurrency: number;
  /** Per-upload deadline; 0 disables it */
  uploadTimeoutMs: number;
  /** Items past this count are not processed in this run */
  maxItemsPerRun: number;
}

export interface BatchSummary {
  uploaded: number;
  failed: number;
  /** Items left for a later run */
  skipped: number;
}

const TIMED_OUT = Symbol('timed-out');

/**
 * Races a task against a deadline
 * The task is not cancelled; its later settlement is ignored
 */
async function withDeadline<T>(task: Promise<T>, ms: number): Promise<T | typeof TIMED_OUT> {
  if (ms <= 0) return task;

  let timer: NodeJS.Timeout | undefined;
  const deadline = new Promise<typeof TIMED_OUT>(resolve => {
    timer = setTimeout(() => resolve(TIMED_OUT), ms);
  });

  try {
    return await Promise.race([task, deadline]);
  } finally {
    clearTimeout(timer);
  }
}

export class BatchRunner {
  constructor(
    private readonly createUploader: () => Uploader,
    private readonly ledger: RunLedger,
    private readonly options: BatchRunnerOptions
  ) {}

  /**
   * Uploads every item and records the result against its invoice id
   *
   * Never throws for a single item: each failure is recorded in the ledger.
   */
  async run(items: UploadItem[]): Promise<BatchSummary> {
    const accepted = items.slice(0, this.options.maxItemsPerRun);
    const skipped = items.length - accepted.length;
    if (skipped > 0) {
      warn('Run item limit reached, deferring remaining items', {
        module: 'batch',
        phase: 'start',
        limit: this.options.maxItemsPerRun,
        skipped,
      });
    }

    info('Starting upload run', { module: 'batch', phase: 'start', items: accepted.length });

    const queue = new ProcessingQueue(this.options.concurrency);
    const results = await queue.addAll(accepted.map(item => () => this.process(item)));

    const uploaded = results.filter(ok => ok).length;
    const summary: BatchSummary = { uploaded, failed: results.length - uploaded, skipped };

    info('Upload run finished', { module: 'batch', phase: 'complete', ...summary });
    return summary;
  }

  /**
   * Uploads one item
   *
   * @returns true when the portal accepted the archive
   */
  private async process(item: UploadItem): Promise<boolean> {
    const { filePath, invoiceId } = item;
    this.ledger.begin(invoiceId, { receivedAt: item.receivedAt });

    try {
      const uploader = this.createUploader();
      const result = await withDeadline(uploader.upload(filePath, invoiceId), this.options.uploadTimeoutMs);

      const outcome: Outcome = result === TIMED_OUT
        ? { kind: 'failure', reason: `Upload timed out after ${this.options.uploadTimeoutMs}ms` }
        : result;

      this.ledger.recordOutcome(invoiceId, outcome);
      return outcome.kind === 'success';
    } catch (err) {
      const category = classifyError(err);
      const reason = category === 'missing_file' ? FILE_NOT_FOUND_REASON : errorReason(err);
      warn('Upload failed', { module: 'batch', phase: 'upload', invoiceId, category, reason });
      this.ledger.recordError(invoiceId, reason);
      return false;
    }
  }
}
