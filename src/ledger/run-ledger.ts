/**
 * Run ledger: per-invoice record of one batch of uploads
 *
 * Records keep timezone-aware instants; the fixed reporting offset is
 * applied only when projecting rows.
 */

import type { LedgerRow, Outcome } from '../types/index.js';
import { toFixedOffsetParts } from '../utils/date.js';

/**
 * Report status values
 */
export const LEDGER_STATUS = {
  PENDING: '',
  UPLOADED: 'Cargado en el portal',
  NOT_UPLOADED: 'Factura NO CARGADA en el portal',
} as const;

/**
 * Error recorded when the archive is missing locally
 */
export const FILE_NOT_FOUND_REASON = 'Archivo no encontrado al intentar ser enviado al portal';

export type Clock = () => Date;

export interface BeginOptions {
  /** When the source document was received (defaults to the start time) */
  receivedAt?: Date;
}

export class LedgerRecord {
  readonly startedAt: Date;
  readonly receivedAt: Date;
  private currentOutcome: Outcome | null = null;
  private currentStatus: string = LEDGER_STATUS.PENDING;
  private readonly errorList: string[] = [];
  private mutatedAt: Date;

  constructor(
    readonly invoiceId: string,
    private readonly clock: Clock,
    options: BeginOptions = {}
  ) {
    this.startedAt = clock();
    this.mutatedAt = this.startedAt;
    this.receivedAt = options.receivedAt ?? this.startedAt;
  }

  get outcome(): Outcome | null {
    return this.currentOutcome;
  }

  get status(): string {
    return this.currentStatus;
  }

  get errors(): readonly string[] {
    return this.errorList;
  }

  get lastMutatedAt(): Date {
    return this.mutatedAt;
  }

  /**
   * Stores the upload verdict and derives the status
   * A failure reason is also appended to the errors
   */
  setOutcome(outcome: Outcome): Date {
    this.currentOutcome = outcome;
    if (outcome.kind === 'success') {
      this.currentStatus = LEDGER_STATUS.UPLOADED;
    } else {
      this.currentStatus = LEDGER_STATUS.NOT_UPLOADED;
      this.errorList.push(outcome.reason);
    }
    return this.touch();
  }

  /**
   * Appends an error and marks the invoice as not uploaded
   */
  addError(reason: string): Date {
    this.errorList.push(reason);
    this.currentStatus = LEDGER_STATUS.NOT_UPLOADED;
    return this.touch();
  }

  setStatus(status: string): Date {
    this.currentStatus = status;
    return this.touch();
  }

  /**
   * Advances lastMutatedAt; never moves it backwards
   */
  private touch(): Date {
    const now = this.clock();
    if (now.getTime() > this.mutatedAt.getTime()) {
      this.mutatedAt = now;
    }
    return this.mutatedAt;
  }
}

export class RunLedger {
  readonly date: Date;
  private readonly records = new Map<string, LedgerRecord>();

  /**
   * @param clock - Time source for records
   * @param reportUtcOffsetHours - Offset applied by snapshotAsRows (default UTC-5)
   */
  constructor(
    private readonly clock: Clock = () => new Date(),
    private readonly reportUtcOffsetHours: number = -5
  ) {
    this.date = clock();
  }

  /**
   * Creates the record for an invoice if absent
   * Calling it again for a started invoice returns the existing record untouched
   */
  begin(invoiceId: string, options: BeginOptions = {}): LedgerRecord {
    const existing = this.records.get(invoiceId);
    if (existing) return existing;

    const record = new LedgerRecord(invoiceId, this.clock, options);
    this.records.set(invoiceId, record);
    return record;
  }

  get(invoiceId: string): LedgerRecord | undefined {
    return this.records.get(invoiceId);
  }

  has(invoiceId: string): boolean {
    return this.records.has(invoiceId);
  }

  get size(): number {
    return this.records.size;
  }

  recordOutcome(invoiceId: string, outcome: Outcome): LedgerRecord {
    const record = this.begin(invoiceId);
    record.setOutcome(outcome);
    return record;
  }

  recordError(invoiceId: string, reason: string): LedgerRecord {
    const record = this.begin(invoiceId);
    record.addError(reason);
    return record;
  }

  setStatus(invoiceId: string, status: string): LedgerRecord {
    const record = this.begin(invoiceId);
    record.setStatus(status);
    return record;
  }

  /**
   * Records in insertion order
   */
  list(): LedgerRecord[] {
    return [...this.records.values()];
  }

  /**
   * Records ordered by document receipt time, newest first
   */
  orderByReceivedDesc(): LedgerRecord[] {
    return this.list().sort((a, b) => b.receivedAt.getTime() - a.receivedAt.getTime());
  }

  /**
   * Projects every record into a flat report row, in insertion order
   *
   * @param offsetHours - UTC offset for the calendar columns
   */
  snapshotAsRows(offsetHours: number = this.reportUtcOffsetHours): LedgerRow[] {
    return this.list().map(record => {
      const parts = toFixedOffsetParts(record.lastMutatedAt, offsetHours);
      const outcome = record.outcome;
      return {
        invoiceId: record.invoiceId,
        transactionId: outcome?.kind === 'success' ? outcome.transactionId : '',
        status: record.status,
        errors: record.errors.join(', '),
        day: parts.day,
        month: parts.month,
        year: parts.year,
        time: parts.time,
      };
    });
  }
}
