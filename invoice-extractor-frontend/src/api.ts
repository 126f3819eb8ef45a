// Types that mirror the extraction service's responses
export type ErrorCode =
  | 'UnsupportedFile'
  | 'DecodeError'
  | 'OCRError'
  | 'LLMRequestError'
  | 'LLMParseError';

export interface Product {
  description: string;
  quantity: string | number;
  unit_price: string | number;
  line_total: string | number;
}

export interface InvoiceFields {
  invoice_number: string | number;
  invoice_date: string;
  vendor_name: string;
  total_amount: string | number;
  products: Product[];
}

export interface ExtractResponse {
  documentId: string;
  filename: string;
  kind: 'pdf' | 'image';
  textSource: 'text-layer' | 'ocr';
  fields: InvoiceFields;
}

export interface PreviewPage {
  pageNumber: number;
  width: number;
  height: number;
  dataUrl: string;
}

export const ACCEPTED_EXTENSIONS = ['.pdf', '.png', '.jpg', '.jpeg'];

/**
 * Error raised for a non-2xx response. `errorCode` is set when the service
 * reported which pipeline stage failed.
 */
export class ApiError extends Error {
  readonly status: number;
  readonly errorCode?: ErrorCode;

  constructor(message: string, status: number, errorCode?: ErrorCode) {
    super(message);
    this.name = 'ApiError';
    this.status = status;
    this.errorCode = errorCode;
  }
}

function isErrorCode(value: unknown): value is ErrorCode {
  return (
    value === 'UnsupportedFile' ||
    value === 'DecodeError' ||
    value === 'OCRError' ||
    value === 'LLMRequestError' ||
    value === 'LLMParseError'
  );
}

async function toApiError(response: Response, fallback: string): Promise<ApiError> {
  let body: unknown = null;
  try {
    body = await response.json();
  } catch {
    // non-JSON error pages fall back to the generic message
  }
  if (typeof body === 'object' && body !== null) {
    const message = 'error' in body && typeof body.error === 'string' ? body.error : fallback;
    const code = 'errorCode' in body && isErrorCode(body.errorCode) ? body.errorCode : undefined;
    return new ApiError(message, response.status, code);
  }
  return new ApiError(fallback, response.status);
}

function toFormData(file: File): FormData {
  const formData = new FormData();
  formData.append('document', file);
  return formData;
}

export async function extractInvoice(file: File, baseUrl = ''): Promise<ExtractResponse> {
  const response = await fetch(`${baseUrl}/api/extract`, { method: 'POST', body: toFormData(file) });
  if (!response.ok) {
    throw await toApiError(response, 'Failed to extract invoice fields.');
  }
  const data: ExtractResponse = await response.json();
  return data;
}

export async function previewPdf(file: File, baseUrl = ''): Promise<PreviewPage[]> {
  const response = await fetch(`${baseUrl}/api/preview`, { method: 'POST', body: toFormData(file) });
  if (!response.ok) {
    throw await toApiError(response, 'Could not preview PDF.');
  }
  const data: { pages: PreviewPage[] } = await response.json();
  return data.pages;
}
