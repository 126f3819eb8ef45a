import type { Document, DocumentKind } from '../types/document';
import { PipelineError } from './errors';

export const SUPPORTED_EXTENSIONS = ['.pdf', '.png', '.jpg', '.jpeg'] as const;

const KIND_BY_EXTENSION: Record<(typeof SUPPORTED_EXTENSIONS)[number], DocumentKind> = {
  '.pdf': 'pdf',
  '.png': 'image',
  '.jpg': 'image',
  '.jpeg': 'image',
};

/**
 * Picks the extraction path from the filename suffix alone. The bytes are
 * never inspected, so a mislabeled file takes the wrong path and fails to decode.
 *
 * @returns the document kind, or null when the suffix is not supported
 */
export function classifyDocument(filename: string): DocumentKind | null {
  const name = filename.trim().toLowerCase();
  for (const extension of SUPPORTED_EXTENSIONS) {
    if (name.endsWith(extension)) return KIND_BY_EXTENSION[extension];
  }
  return null;
}

/**
 * @throws {PipelineError} of kind `UnsupportedFile` for any other suffix
 */
export function loadDocument(filename: string, content: Buffer): Document {
  const kind = classifyDocument(filename);
  if (!kind) {
    throw new PipelineError(
      'UnsupportedFile',
      `Unsupported file type for "${filename}". Expected one of: ${SUPPORTED_EXTENSIONS.join(', ')}`
    );
  }
  return { filename, content, kind };
}
