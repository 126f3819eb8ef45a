import { useState, useEffect, useRef, type ChangeEvent } from 'react';
import {
  ACCEPTED_EXTENSIONS,
  ApiError,
  type ErrorCode,
  type ExtractResponse,
  type PreviewPage,
  extractInvoice,
  previewPdf,
} from './api';
import { ResultView } from './components/ResultView';
import { downloadJson } from './download';

function isImage(file: File): boolean {
  return /\.(png|jpe?g)$/i.test(file.name);
}

function App(): JSX.Element {
  const [selectedFile, setSelectedFile] = useState<File | null>(null);
  const [imageUrl, setImageUrl] = useState<string | null>(null);
  const [previewPages, setPreviewPages] = useState<PreviewPage[]>([]);
  const [previewError, setPreviewError] = useState<string>('');
  const [result, setResult] = useState<ExtractResponse | null>(null);
  const [isLoading, setIsLoading] = useState<boolean>(false);
  const [error, setError] = useState<string>('');
  const [errorCode, setErrorCode] = useState<ErrorCode | undefined>(undefined);
  // Bumped on every selection; replies for an older selection are dropped.
  const selectionRef = useRef(0);

  const resetState = (): void => {
    setSelectedFile(null);
    setImageUrl(null);
    setPreviewPages([]);
    setPreviewError('');
    setResult(null);
    setIsLoading(false);
    setError('');
    setErrorCode(undefined);
  };

  // Release the object URL of the previous image preview
  useEffect(() => {
    return () => {
      if (imageUrl) URL.revokeObjectURL(imageUrl);
    };
  }, [imageUrl]);

  const isCurrent = (selection: number): boolean => selectionRef.current === selection;

  const loadPreview = async (file: File, selection: number): Promise<void> => {
    if (isImage(file)) {
      setImageUrl(URL.createObjectURL(file));
      return;
    }
    try {
      const pages = await previewPdf(file);
      if (isCurrent(selection)) setPreviewPages(pages);
    } catch (err) {
      if (isCurrent(selection)) setPreviewError(err instanceof Error ? err.message : 'Could not preview PDF.');
    }
  };

  const runExtraction = async (file: File, selection: number): Promise<void> => {
    setIsLoading(true);
    try {
      const response = await extractInvoice(file);
      if (isCurrent(selection)) setResult(response);
    } catch (err) {
      if (!isCurrent(selection)) return;
      console.error('Extraction error:', err);
      setError(err instanceof Error ? err.message : 'An unexpected error occurred during extraction.');
      setErrorCode(err instanceof ApiError ? err.errorCode : undefined);
    } finally {
      if (isCurrent(selection)) setIsLoading(false);
    }
  };

  const handleFileChange = (event: ChangeEvent<HTMLInputElement>): void => {
    const selection = ++selectionRef.current;
    resetState();
    const file = event.target.files && event.target.files.length > 0 ? event.target.files[0] : null;
    if (!file) return;

    setSelectedFile(file);
    void loadPreview(file, selection);
    void runExtraction(file, selection);
  };

  return (
    <div className="min-h-screen bg-gray-100 flex flex-col items-center py-10 px-4">
      <div className="bg-white p-8 rounded-lg shadow-xl w-full max-w-6xl">
        <h1 className="text-3xl font-bold text-center text-gray-800 mb-2">
          Invoice Extraction
        </h1>
        <p className="text-center text-gray-600 mb-6">
          Upload a PDF or image invoice, see a preview on the left, and get your extracted JSON on the right.
        </p>

        <div className="grid grid-cols-1 lg:grid-cols-2 gap-6">
          {/* Upload & Preview */}
          <div className="p-6 border border-gray-200 rounded-lg bg-gray-50">
            <h2 className="text-2xl font-semibold text-gray-700 mb-4">Upload &amp; Preview</h2>
            <input
              type="file"
              accept={ACCEPTED_EXTENSIONS.join(',')}
              onChange={handleFileChange}
              className="block w-full text-sm text-gray-900 border border-gray-300 rounded-lg cursor-pointer bg-white"
            />
            {selectedFile && (
              <p className="mt-4 text-gray-600">
                <span className="font-medium">Selected file:</span> {selectedFile.name}
              </p>
            )}
            {imageUrl && <img src={imageUrl} alt={selectedFile?.name} className="mt-4 w-full" />}
            {previewError && (
              <div className="mt-4 p-3 rounded-lg bg-red-100 text-red-800 border border-red-200">
                Could not preview PDF: {previewError}
              </div>
            )}
            {previewPages.map((page) => (
              <div key={page.pageNumber} className="mt-4">
                <p className="font-medium text-gray-700">Page {page.pageNumber}</p>
                <img src={page.dataUrl} alt={`Page ${page.pageNumber}`} className="w-full border border-gray-200" />
              </div>
            ))}
          </div>

          {/* JSON Output */}
          <div className="p-6 border border-gray-200 rounded-lg bg-white">
            <h2 className="text-2xl font-semibold text-gray-700 mb-4">JSON Output</h2>
            <ResultView
              result={result}
              error={error}
              errorCode={errorCode}
              isLoading={isLoading}
              onDownload={() => result && downloadJson(result.fields)}
            />
          </div>
        </div>

        {/* Instructions */}
        <div className="mt-8 p-6 border border-gray-200 rounded-lg bg-gray-50">
          <h2 className="text-xl font-semibold text-gray-700 mb-2">Instructions</h2>
          <ol className="list-decimal list-inside text-gray-700">
            <li>Upload a native (digital) PDF, or a scanned PDF or image.</li>
            <li>Digital PDFs are read directly; scans and images go through OCR.</li>
            <li>Fields are parsed by the language model against a strict JSON schema.</li>
            <li>Download the JSON with the button under the output.</li>
          </ol>
        </div>
      </div>
    </div>
  );
}

export default App;
