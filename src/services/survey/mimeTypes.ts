import * as mime from 'mime-types';

/**
 * Document types the model accepts as an uploaded file part
 */
export const SUPPORTED_DOCUMENT_MIME_TYPES: ReadonlySet<string> = new Set([
  'application/pdf',
  'text/plain',
  'text/markdown',
  'text/html',
  'text/csv',
  'text/rtf',
  'application/rtf',
  'image/png',
  'image/jpeg',
  'image/webp',
  'image/heic',
  'image/heif',
]);

export function isSupportedMimeType(mimeType: string): boolean {
  return SUPPORTED_DOCUMENT_MIME_TYPES.has(mimeType.toLowerCase());
}

/**
 * Resolve the MIME type of an input document.
 * An explicitly reported type wins over the extension lookup.
 *
 * @returns the MIME type, or null when neither source yields one
 */
export function detectMimeType(filename: string, reportedMimeType?: string): string | null {
  if (reportedMimeType) {
    return reportedMimeType.toLowerCase();
  }
  const detected = mime.lookup(filename);
  return detected || null;
}
