import { createCanvas } from '@napi-rs/canvas';
import { getDocument, VerbosityLevel } from 'pdfjs-dist/legacy/build/pdf.mjs';
import type { PageImage } from '../types/document';
import { PipelineError, wrapError } from './errors';

/**
 * Zoom used when rendering pages: 1.5 × 72 DPI user space.
 */
export const DEFAULT_RENDER_SCALE = 1.5;

/**
 * An opened PDF. Page numbers are 1-based.
 */
export interface PdfDocumentHandle {
  readonly pageCount: number;
  pageText(pageNumber: number): Promise<string>;
  renderPage(pageNumber: number, scale: number): Promise<PageImage>;
  close(): Promise<void>;
}

export interface PdfReader {
  open(bytes: Buffer): Promise<PdfDocumentHandle>;
}

// Type-level bridge only: SKRSContext2D implements the 2D API pdfjs paints
// through but is not declared as the DOM CanvasRenderingContext2D.
function isDomContext(value: object): value is CanvasRenderingContext2D {
  return 'drawImage' in value;
}

/**
 * PDF access backed by pdfjs-dist (legacy Node build) and @napi-rs/canvas.
 */
export const pdfjsReader: PdfReader = {
  async open(bytes) {
    // pdfjs rejects Node Buffers and detaches what it is given, so hand it a copy.
    const loadingTask = getDocument({
      data: new Uint8Array(bytes),
      isEvalSupported: false,
      useSystemFonts: false,
      disableFontFace: true,
      verbosity: VerbosityLevel.ERRORS,
    });

    const doc = await loadingTask.promise.catch((error: unknown) => {
      throw wrapError(error, 'DecodeError', 'Could not open PDF');
    });

    return {
      pageCount: doc.numPages,

      async pageText(pageNumber) {
        const page = await doc.getPage(pageNumber);
        const content = await page.getTextContent();
        let text = '';
        for (const item of content.items) {
          if (!('str' in item)) continue; // marked-content boundaries carry no text
          text += item.str;
          if (item.hasEOL) text += '\n';
        }
        page.cleanup();
        return text;
      },

      async renderPage(pageNumber, scale) {
        const page = await doc.getPage(pageNumber);
        const viewport = page.getViewport({ scale });
        const width = Math.ceil(viewport.width);
        const height = Math.ceil(viewport.height);
        const canvas = createCanvas(width, height);
        const context = canvas.getContext('2d');

        // Scanned pages may be transparent where no image was painted.
        context.fillStyle = '#ffffff';
        context.fillRect(0, 0, width, height);
        // The napi context stands in for the DOM one pdfjs is typed against.
        if (!isDomContext(context)) {
          throw new PipelineError('DecodeError', 'Canvas backend does not provide a 2D context');
        }
        await page.render({ canvasContext: context, viewport }).promise;
        page.cleanup();

        return { pageNumber, width, height, data: canvas.toBuffer('image/png') };
      },

      async close() {
        await doc.destroy();
      },
    };
  },
};

/**
 * Concatenates the text layer of every page in document order.
 */
export async function readTextLayer(pdf: PdfDocumentHandle): Promise<string[]> {
  const pages: string[] = [];
  for (let pageNumber = 1; pageNumber <= pdf.pageCount; pageNumber++) {
    pages.push(await pdf.pageText(pageNumber));
  }
  return pages;
}

/**
 * Renders every page, one after another, at the given zoom.
 */
export async function rasterizePages(pdf: PdfDocumentHandle, scale: number = DEFAULT_RENDER_SCALE): Promise<PageImage[]> {
  const images: PageImage[] = [];
  for (let pageNumber = 1; pageNumber <= pdf.pageCount; pageNumber++) {
    images.push(await pdf.renderPage(pageNumber, scale));
  }
  return images;
}
