import type { InvoiceFields } from './api';

export const DOWNLOAD_FILENAME = 'invoice_fields.json';
export const DOWNLOAD_MIME_TYPE = 'application/json';

export function toDownloadJson(fields: InvoiceFields): string {
  return JSON.stringify(fields, null, 2);
}

/**
 * Saves the fields as `invoice_fields.json` through a temporary object URL.
 */
export function downloadJson(fields: InvoiceFields): void {
  const blob = new Blob([toDownloadJson(fields)], { type: DOWNLOAD_MIME_TYPE });
  const url = URL.createObjectURL(blob);
  const link = document.createElement('a');
  link.href = url;
  link.download = DOWNLOAD_FILENAME;
  document.body.appendChild(link);
  link.click();
  link.remove();
  URL.revokeObjectURL(url);
}
