/**
 * Upload pipeline: drives the six-step portal protocol for one archive
 *
 * Steps run strictly in order; each one feeds ids or headers to the next.
 * A failing step aborts the rest. Nothing is rolled back: bytes already
 * transferred are left for the portal to clean up.
 */

import { readFile, stat } from 'node:fs/promises';
import { basename } from 'node:path';
import type { Config } from '../config.js';
import type { Outcome } from '../types/index.js';
import { FileNotFoundError, UploadRejectedError } from '../types/index.js';
import { createCredential } from './credentials.js';
import { PortalHttp, type FetchFn } from './http.js';
import { Session } from './session.js';
import { PortalClient } from './client.js';
import { StatusPoller, type Sleep } from './poller.js';
import { classifyOutcome } from './classifier.js';
import { errorReason } from './errors.js';
import { nextUploadCode } from '../utils/date.js';
import { info, warn, error as logError } from '../utils/logger.js';

export const UPLOAD_DISABLED_REASON = 'upload disabled';

export interface UploadPipelineOptions {
  pollMaxAttempts: number;
  pollIntervalSeconds: number;
  /** When false, upload() returns a failure without touching the portal */
  uploadEnabled: boolean;
  /** Generator of in-attempt file codes (default: the process-wide generator) */
  nextUploadCode?: () => string;
}

function isMissingFileError(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === 'ENOENT';
}

/**
 * Stats a local archive
 *
 * @throws FileNotFoundError if it does not exist
 */
async function ensureFile(filePath: string): Promise<void> {
  try {
    await stat(filePath);
  } catch (err) {
    if (isMissingFileError(err)) {
      throw new FileNotFoundError(filePath);
    }
    throw err;
  }
}

async function readArchive(filePath: string): Promise<Buffer> {
  try {
    return await readFile(filePath);
  } catch (err) {
    if (isMissingFileError(err)) {
      throw new FileNotFoundError(filePath);
    }
    throw err;
  }
}

export class UploadPipeline {
  private readonly nextUploadCode: () => string;

  constructor(
    private readonly session: Session,
    private readonly client: PortalClient,
    private readonly poller: StatusPoller,
    private readonly options: UploadPipelineOptions
  ) {
    this.nextUploadCode = options.nextUploadCode ?? nextUploadCode;
  }

  /**
   * Uploads one archive and waits for the portal's verdict
   *
   * @param filePath - Path of the ZIP archive
   * @param invoiceId - Invoice number, used for logging
   * @returns Success with the transaction id, or Failure with the portal's reason
   * @throws FileNotFoundError before any portal call if the archive is missing
   * @throws AuthenticationError, ConfigurationError, TransportError, PollTimeoutError
   */
  async upload(filePath: string, invoiceId: string): Promise<Outcome> {
    if (!this.options.uploadEnabled) {
      warn('Skipping upload because uploads are disabled', {
        module: 'upload-pipeline',
        phase: 'start',
        invoiceId,
      });
      return { kind: 'failure', reason: UPLOAD_DISABLED_REASON };
    }

    await ensureFile(filePath);

    const fileName = basename(filePath);
    const transactionId = this.session.beginTransaction();

    info('Uploading invoice archive', {
      module: 'upload-pipeline',
      phase: 'start',
      invoiceId,
      fileName,
      transactionId,
    });

    try {
      // 1. Resolve the file type id
      const fileTypeId = await this.client.resolveFileTypeId();
      // 2. Register the upload intent
      await this.client.registerUploadIntent(fileTypeId, fileName);
      // 3. Obtain the signed transfer URL
      const uploadFileName = `${this.nextUploadCode()}.zip`;
      const signedUrl = await this.client.getSignedUploadUrl(uploadFileName);
      // 4. Transfer the bytes
      const bytes = await readArchive(filePath);
      await this.client.transferFile(signedUrl, bytes);
      // 5. Register the file metadata
      await this.client.registerFile({ uploadFileName, fileTypeId, fileName, sizeBytes: bytes.length });
      // 6. Await completion
      const snapshot = await this.poller.poll(
        transactionId,
        this.options.pollMaxAttempts,
        this.options.pollIntervalSeconds
      );

      const outcome = classifyOutcome(snapshot, transactionId);
      info('Upload finished', {
        module: 'upload-pipeline',
        phase: 'complete',
        invoiceId,
        transactionId,
        outcome: outcome.kind,
        ...(outcome.kind === 'failure' ? { reason: outcome.reason } : {}),
      });
      return outcome;
    } catch (err) {
      logError('Could not complete the upload', {
        module: 'upload-pipeline',
        phase: 'error',
        invoiceId,
        transactionId,
        error: errorReason(err),
      });
      throw err;
    } finally {
      this.session.endTransaction();
    }
  }

  /**
   * Like upload(), but a rejected upload raises instead of returning Failure
   *
   * @returns Transaction id of the accepted load
   * @throws UploadRejectedError with the portal's reason
   */
  async uploadOrThrow(filePath: string, invoiceId: string): Promise<string> {
    const outcome = await this.upload(filePath, invoiceId);
    if (outcome.kind === 'failure') {
      throw new UploadRejectedError(outcome.reason);
    }
    return outcome.transactionId;
  }
}

/**
 * Injectable collaborators of a pipeline
 */
export interface PipelineDependencies {
  fetchFn?: FetchFn;
  sleep?: Sleep;
  /** Clock used to pick the status search day */
  now?: () => Date;
  nextUploadCode?: () => string;
}

/**
 * Builds a pipeline with its own Session; one per worker
 */
export function createUploadPipeline(config: Config, deps: PipelineDependencies = {}): UploadPipeline {
  const credential = createCredential(config);
  const http = new PortalHttp(deps.fetchFn);
  const session = new Session(credential, http, {
    authBaseUrl: config.portalAuthUrl,
    portalUrl: config.portalUrl,
    userAgent: config.userAgent,
  });
  const client = new PortalClient(session, credential, {
    apiBaseUrl: config.portalApiUrl,
    applicationCode: config.applicationCode,
    fileTypeCode: config.fileTypeCode,
    roles: config.roles,
  });
  const now = deps.now ?? (() => new Date());
  const poller = new StatusPoller(key => client.findLoad(key, now()), deps.sleep);

  return new UploadPipeline(session, client, poller, {
    pollMaxAttempts: config.pollMaxAttempts,
    pollIntervalSeconds: config.pollIntervalSeconds,
    uploadEnabled: config.uploadEnabled,
    nextUploadCode: deps.nextUploadCode,
  });
}
