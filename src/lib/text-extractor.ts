import type { Document, RawText } from '../types/document';
import { wrapError } from './errors';
import { createLogger } from './logger';
import { type OcrEngine, performOcr } from './ocr';
import { DEFAULT_RENDER_SCALE, type PdfReader, rasterizePages, readTextLayer } from './pdf';

const logger = createLogger('Text Extractor');

export interface TextExtractorDeps {
  pdfReader: PdfReader;
  ocrEngine: OcrEngine;
  /** Zoom for rasterizing text-less PDF pages before OCR. */
  renderScale?: number;
}

export interface TextExtractor {
  extract(document: Document): Promise<RawText>;
}

/**
 * PDFs are read from their text layer first. Only when that layer is empty
 * (scanned or image-only PDFs) are the pages rendered and sent to OCR.
 * Images always go straight to OCR.
 */
export function createTextExtractor(deps: TextExtractorDeps): TextExtractor {
  const renderScale = deps.renderScale ?? DEFAULT_RENDER_SCALE;

  async function extractFromPdf(document: Document): Promise<RawText> {
    const pdf = await deps.pdfReader.open(document.content);
    try {
      const pages = await readTextLayer(pdf).catch((error: unknown) => {
        throw wrapError(error, 'DecodeError', 'Could not read PDF text');
      });
      const text = pages.join('\n');
      if (text.trim()) {
        logger.info('Read PDF text layer', { filename: document.filename, pageCount: pdf.pageCount });
        return { text, source: 'text-layer', pageCount: pdf.pageCount };
      }

      logger.info('PDF has no text layer, falling back to OCR', {
        filename: document.filename,
        pageCount: pdf.pageCount,
      });
      const images = await rasterizePages(pdf, renderScale).catch((error: unknown) => {
        throw wrapError(error, 'DecodeError', 'Could not render PDF pages');
      });
      const ocrText = await performOcr(
        images.map((image) => image.data),
        deps.ocrEngine
      );
      return { text: ocrText, source: 'ocr', pageCount: pdf.pageCount };
    } finally {
      await pdf.close();
    }
  }

  async function extractFromImage(document: Document): Promise<RawText> {
    logger.info('Running OCR on image', { filename: document.filename });
    const text = await performOcr([document.content], deps.ocrEngine);
    return { text, source: 'ocr', pageCount: 1 };
  }

  return {
    extract(document) {
      return document.kind === 'pdf' ? extractFromPdf(document) : extractFromImage(document);
    },
  };
}
