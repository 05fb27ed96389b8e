/**
 * Command-line argument handling for the uploader
 */

import type { LedgerRow, UploadItem } from './types/index.js';
import { invoiceIdFromFileName } from './utils/file-naming.js';

export interface CliOptions {
  items: UploadItem[];
  json: boolean;
  help: boolean;
}

/**
 * Parses one positional argument: "<file>" or "<file>:<invoiceId>"
 * Without an explicit id, the invoice number is taken from the file name
 */
export function parseItem(arg: string): UploadItem {
  const separator = arg.lastIndexOf(':');
  const idPart = separator >= 0 ? arg.slice(separator + 1) : '';

  // "C:\dir\file.zip" has a colon but no id after it
  if (separator > 0 && idPart && !/[\\/]/.test(idPart)) {
    return { filePath: arg.slice(0, separator), invoiceId: idPart };
  }
  return { filePath: arg, invoiceId: invoiceIdFromFileName(arg) };
}

export function parseArgs(argv: string[]): CliOptions {
  const options: CliOptions = { items: [], json: false, help: false };
  for (const arg of argv) {
    if (arg === '--json') {
      options.json = true;
    } else if (arg === '--help' || arg === '-h') {
      options.help = true;
    } else if (!arg.startsWith('-')) {
      options.items.push(parseItem(arg));
    }
  }
  return options;
}

export const HELP_TEXT = `Usage: portal-upload [--json] <file>[:<invoiceId>] ...

Uploads each invoice archive to the portal and prints the run report.

Options:
  --json     Print report rows as JSON instead of a table.
  --help     Show this help message.
`;

/**
 * Formats report rows as a tab-separated table with a header line
 */
export function formatRows(rows: LedgerRow[]): string {
  const header = ['Factura', 'ID de cargue', 'Status', 'Errores', 'Día', 'Mes', 'Año', 'Momento'];
  const lines = rows.map(row =>
    [row.invoiceId, row.transactionId, row.status, row.errors, row.day, row.month, String(row.year), row.time].join('\t')
  );
  return [header.join('\t'), ...lines].join('\n');
}
