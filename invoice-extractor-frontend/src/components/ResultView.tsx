import type { ErrorCode, ExtractResponse } from '../api';

const ERROR_LABELS: Record<ErrorCode, string> = {
  UnsupportedFile: 'Unsupported file',
  DecodeError: 'Could not read file',
  OCRError: 'Text recognition failed',
  LLMRequestError: 'Model request failed',
  LLMParseError: 'Unexpected model reply',
};

interface ResultViewProps {
  result: ExtractResponse | null;
  error: string;
  errorCode?: ErrorCode;
  isLoading: boolean;
  onDownload: () => void;
}

/**
 * Right-hand column: the extracted JSON with its download button, or the
 * failure banner.
 */
export function ResultView({ result, error, errorCode, isLoading, onDownload }: ResultViewProps): JSX.Element {
  if (isLoading) {
    return (
      <div className="p-3 rounded-lg bg-blue-100 text-blue-800 border border-blue-200" role="status">
        Extracting data…
      </div>
    );
  }

  if (error) {
    return (
      <div className="p-3 rounded-lg bg-red-100 text-red-800 border border-red-200" role="alert">
        <span className="font-medium">{errorCode ? ERROR_LABELS[errorCode] : 'Error during processing'}:</span> {error}
      </div>
    );
  }

  if (!result) {
    return <p className="text-gray-500">Upload a file on the left to see the JSON here.</p>;
  }

  return (
    <div>
      <p className="mb-2 text-gray-600">
        <span className="font-medium">Text source:</span> {result.textSource === 'ocr' ? 'OCR' : 'PDF text layer'}
      </p>
      <pre className="bg-gray-900 text-gray-100 rounded-md p-4 overflow-auto text-sm" data-testid="invoice-json">
        {JSON.stringify(result.fields, null, 2)}
      </pre>
      <button
        onClick={onDownload}
        className="mt-4 w-full py-3 px-6 rounded-lg font-semibold text-white bg-blue-600 hover:bg-blue-700"
      >
        Download JSON
      </button>
    </div>
  );
}
