/**
 * The extraction path a document takes, decided from its filename suffix.
 */
export type DocumentKind = "pdf" | "image";

/**
 * Where the raw text of a document came from.
 */
export type TextSource = "text-layer" | "ocr";

/**
 * An uploaded artifact as it moves through one pipeline run.
 * Nothing here outlives the request that created it.
 */
export interface Document {
  filename: string; // Used only to pick the extraction path
  content: Buffer;
  kind: DocumentKind;
}

/**
 * One rendered page (or a whole uploaded image), encoded as PNG.
 */
export interface PageImage {
  pageNumber: number;
  width: number;
  height: number;
  data: Buffer;
}

/**
 * Text collected from the PDF text layer or from OCR, one page per
 * newline-separated unit, in page order.
 */
export interface RawText {
  text: string;
  source: TextSource;
  pageCount: number;
}
