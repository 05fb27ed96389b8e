/**
 * Portal Error Classification
 *
 * Classifies failures raised while talking to the portal:
 * - authorization: 401 from an API call, recoverable by one re-login
 * - missing_file: local archive absent, the portal was never contacted
 * - business: the portal processed the upload and rejected it, or never finished
 * - fatal: everything else (configuration, login, transport)
 */

import {
  FileNotFoundError,
  PollTimeoutError,
  TransportError,
  UploadRejectedError,
} from '../types/index.js';

/**
 * Error categories for handling different types of failures
 */
export type ErrorCategory = 'authorization' | 'missing_file' | 'business' | 'fatal';

/**
 * Classifies an error raised by the upload engine
 *
 * @param error - Anything caught from a portal call
 * @returns The error category determining how the caller reacts
 */
export function classifyError(error: unknown): ErrorCategory {
  if (isAuthorizationError(error)) return 'authorization';
  if (error instanceof FileNotFoundError) return 'missing_file';
  if (error instanceof PollTimeoutError || error instanceof UploadRejectedError) {
    return 'business';
  }
  return 'fatal';
}

/**
 * True for HTTP 401 transport failures
 */
export function isAuthorizationError(error: unknown): error is TransportError {
  return error instanceof TransportError && error.status === 401;
}

/**
 * Extracts a human-readable reason from any thrown value
 */
export function errorReason(error: unknown): string {
  if (error instanceof Error) return error.message;
  return String(error);
}
