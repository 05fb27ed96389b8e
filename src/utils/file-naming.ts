/**
 * File naming utilities for invoice archives
 */

import { win32 } from 'node:path';

/**
 * Extracts the invoice number from an archive name
 *
 * Archives are named "<invoice>_<payer NIT>.zip"
 * Example: "/tmp/FE1590904_900000001.zip" -> "FE1590904"
 *
 * @param filePath - Archive path or name
 * @returns Invoice number, or the bare file name when it has no "_"
 */
export function invoiceIdFromFileName(filePath: string): string {
  // win32 accepts both separators
  const name = win32.basename(filePath, win32.extname(filePath));
  const [invoiceId] = name.split('_');
  return invoiceId || name;
}
