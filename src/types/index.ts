/**
 * Type definitions for the portal invoice uploader
 * All TypeScript interfaces, types and error classes
 */

/**
 * Log levels for the logging system
 */
export type LogLevel = 'DEBUG' | 'INFO' | 'WARN' | 'ERROR';

/**
 * Portal credentials and organization identity
 * Immutable for the process lifetime
 */
export interface Credential {
  readonly username: string;
  readonly password: string;
  /** Organization NIT */
  readonly organizationId: string;
  readonly organizationName: string;
  readonly userId: string;
}

/**
 * Message attached to a processed file by the portal
 */
export interface PortalMessage {
  /** Portal message code (e.g., "E1") */
  code: string;
  /** Message type as reported by the portal (e.g., "ERROR") */
  type: string;
  description: string;
}

/**
 * Processing result for one file inside a load
 */
export interface FileResult {
  /** File state (e.g., "CARGADO", "EN_PROCESO", "ERROR") */
  state: string;
  messages: PortalMessage[];
}

/**
 * Snapshot of a load as returned by the status endpoint
 */
export interface StatusSnapshot {
  /** Load id echoed by the portal, if any */
  id?: string;
  /** Overall load state */
  state: string;
  files: FileResult[];
}

/**
 * Terminal verdict for one upload
 */
export type Outcome =
  | { kind: 'success'; transactionId: string }
  | { kind: 'failure'; reason: string };

/**
 * Flat ledger projection consumed by reporting collaborators
 */
export interface LedgerRow {
  invoiceId: string;
  /** Transaction (cargue) id, empty when the upload never succeeded */
  transactionId: string;
  status: string;
  /** Errors joined with ", " */
  errors: string;
  /** Two-digit day of last mutation */
  day: string;
  /** Two-digit month of last mutation */
  month: string;
  year: number;
  /** HH:MM:SS of last mutation */
  time: string;
}

/**
 * One file to upload in a batch
 */
export interface UploadItem {
  filePath: string;
  /** Invoice number (nro_factura) */
  invoiceId: string;
  /** When the source document was received, used for report ordering */
  receivedAt?: Date;
}

/**
 * Base class for every error raised by the upload engine
 */
export class PortalError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'PortalError';
  }
}

/**
 * Login rejected or login response without a token
 */
export class AuthenticationError extends PortalError {
  constructor(message: string) {
    super(message);
    this.name = 'AuthenticationError';
  }
}

/**
 * Expected file type missing from the portal configuration
 */
export class ConfigurationError extends PortalError {
  constructor(
    message: string,
    public code: string
  ) {
    super(message);
    this.name = 'ConfigurationError';
  }
}

/**
 * Network or HTTP failure talking to the portal
 * status is undefined for network-level failures
 */
export class TransportError extends PortalError {
  constructor(
    message: string,
    public url: string,
    public status?: number,
    public details?: unknown
  ) {
    super(message);
    this.name = 'TransportError';
  }
}

/**
 * Load never reached a terminal state within the polling budget
 */
export class PollTimeoutError extends PortalError {
  constructor(
    public lastState: string,
    public correlationKey: string,
    public attempts: number
  ) {
    super(
      `Después de ${attempts} intentos, no se cargó la factura. ` +
      `Último estado de API fue '${lastState}'. ` +
      `El ID de Cargue es ${correlationKey}.`
    );
    this.name = 'PollTimeoutError';
  }
}

/**
 * Load finished but the portal attached failure messages
 */
export class UploadRejectedError extends PortalError {
  constructor(public reason: string) {
    super(reason);
    this.name = 'UploadRejectedError';
  }
}

/**
 * Local archive does not exist; the portal is never contacted
 */
export class FileNotFoundError extends PortalError {
  constructor(public filePath: string) {
    super(`File not found: ${filePath}`);
    this.name = 'FileNotFoundError';
  }
}
