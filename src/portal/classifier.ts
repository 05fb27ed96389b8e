/**
 * Outcome classification of a terminal load snapshot
 */

import type { Outcome, PortalMessage, StatusSnapshot } from '../types/index.js';

export const NO_FILE_RESULT_REASON = 'no file result returned';

/**
 * Separator between joined portal messages
 */
export const MESSAGE_SEPARATOR = '| ';

/**
 * Reduces every path-like token of a description to its base name
 *
 * "El archivo /tmp/x.zip no contiene PDF." -> "El archivo x.zip no contiene PDF."
 * Idempotent: a base name contains no separators.
 */
export function simplifyDescription(description: string): string {
  return description
    .split(' ')
    .map(word => {
      if (!word.includes('/') && !word.includes('\\')) return word;
      const segments = word.split(/[/\\]/).filter(segment => segment !== '');
      return segments[segments.length - 1] ?? '';
    })
    .join(' ');
}

/**
 * Whether a portal message rejects the upload
 *
 * Every message observed so far is a rejection, regardless of its type.
 * Portal message types may later distinguish informational messages; this
 * is the only place that rule would change.
 */
export function isRejectingMessage(_message: PortalMessage): boolean {
  return true;
}

/**
 * Formats one message as "<code>. <description>"
 */
export function formatMessage(message: PortalMessage): string {
  return `${message.code}. ${simplifyDescription(message.description)}`;
}

/**
 * Classifies a terminal snapshot
 *
 * @param snapshot - Last snapshot returned by the poller
 * @param transactionId - Transaction id reported on success
 */
export function classifyOutcome(snapshot: StatusSnapshot, transactionId: string): Outcome {
  if (snapshot.files.length === 0) {
    return { kind: 'failure', reason: NO_FILE_RESULT_REASON };
  }

  const rejections = snapshot.files[0].messages.filter(isRejectingMessage);
  if (rejections.length === 0) {
    return { kind: 'success', transactionId };
  }

  return { kind: 'failure', reason: rejections.map(formatMessage).join(MESSAGE_SEPARATOR) };
}
