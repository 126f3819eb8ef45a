/**
 * Extraction Pipeline
 *
 * bytes → text → fields, one document at a time. Stages throw
 * `PipelineError`s internally; `run` converts them into a tagged result so
 * callers branch on `errorCode` rather than on message text.
 *
 * @module pipeline
 */

import type { Document, DocumentKind, TextSource } from '../types/document';
import { type PipelineErrorKind, PipelineError, errorMessage } from './errors';
import type { FieldExtractor } from './field-extractor';
import { type ExtractedInvoice, emptyInvoice } from './invoice-schema';
import { loadDocument } from './loader';
import { createLogger } from './logger';
import type { TextExtractor } from './text-extractor';

const logger = createLogger('Pipeline');

export type PipelineResult =
  | {
      success: true;
      data: ExtractedInvoice;
      kind: DocumentKind;
      text: string;
      textSource: TextSource;
    }
  | {
      success: false;
      error: string;
      errorCode: PipelineErrorKind;
    };

export interface PipelineDeps {
  textExtractor: TextExtractor;
  fieldExtractor: FieldExtractor;
  /**
   * Return the empty invoice without calling the model when no text was
   * recovered (default: true).
   */
  skipEmptyText?: boolean;
}

export interface Pipeline {
  run(document: Document): Promise<PipelineResult>;
  runFile(filename: string, content: Buffer): Promise<PipelineResult>;
}

function toFailure(error: unknown): PipelineResult {
  if (error instanceof PipelineError) {
    return { success: false, error: error.message, errorCode: error.kind };
  }
  // Every stage tags its failures; anything untagged is a bug and goes to the caller.
  throw error;
}

export function createPipeline(deps: PipelineDeps): Pipeline {
  const skipEmptyText = deps.skipEmptyText ?? true;

  async function run(document: Document): Promise<PipelineResult> {
    const startTime = Date.now();
    try {
      const raw = await deps.textExtractor.extract(document);
      logger.debug('Acquired text', { filename: document.filename, source: raw.source, textLength: raw.text.length });

      let data: ExtractedInvoice;
      if (skipEmptyText && raw.text.trim() === '') {
        logger.warn('No text recovered; skipping field extraction', { filename: document.filename });
        data = emptyInvoice();
      } else {
        data = await deps.fieldExtractor.extractFields(raw.text);
      }

      logger.info('Pipeline completed', {
        filename: document.filename,
        source: raw.source,
        processingTimeMs: Date.now() - startTime,
      });
      return { success: true, data, kind: document.kind, text: raw.text, textSource: raw.source };
    } catch (error) {
      logger.error('Pipeline failed', {
        filename: document.filename,
        error: errorMessage(error),
        errorCode: error instanceof PipelineError ? error.kind : undefined,
      });
      return toFailure(error);
    }
  }

  return {
    run,

    async runFile(filename, content) {
      let document: Document;
      try {
        document = loadDocument(filename, content);
      } catch (error) {
        logger.warn('Rejected upload', { filename, error: errorMessage(error) });
        return toFailure(error);
      }
      return run(document);
    },
  };
}
