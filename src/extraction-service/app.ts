import fs from 'node:fs';
import path from 'node:path';
import cors from 'cors';
import express, { type NextFunction, type Request, type Response } from 'express';
import multer from 'multer';
import { v4 as uuidv4 } from 'uuid';
import type { AppConfig } from '../lib/config';
import { type PipelineErrorKind, PipelineError, errorMessage, wrapError } from '../lib/errors';
import { classifyDocument } from '../lib/loader';
import { createLogger } from '../lib/logger';
import { type PdfReader, rasterizePages } from '../lib/pdf';
import type { Pipeline } from '../lib/pipeline';

const logger = createLogger('Extraction Service');

export const DOWNLOAD_FILENAME = 'invoice_fields.json';

export const STATUS_BY_ERROR_CODE: Record<PipelineErrorKind, number> = {
  UnsupportedFile: 415,
  DecodeError: 422,
  OCRError: 422,
  LLMRequestError: 502,
  LLMParseError: 502,
};

export interface AppDeps {
  pipeline: Pipeline;
  pdfReader: PdfReader;
  config: Pick<AppConfig, 'corsOrigins' | 'maxUploadBytes' | 'pdfRenderScale' | 'staticDir'>;
}

function sendFailure(res: Response, error: string, errorCode: PipelineErrorKind): void {
  res.status(STATUS_BY_ERROR_CODE[errorCode]).json({ error, errorCode });
}

/**
 * Builds the HTTP app without binding a port.
 */
export function createApp(deps: AppDeps): express.Express {
  const app = express();
  const upload = multer({
    storage: multer.memoryStorage(), // uploads never touch disk
    limits: { fileSize: deps.config.maxUploadBytes, files: 1 },
  });

  app.use(cors({
    origin: deps.config.corsOrigins,
    methods: ['GET', 'POST'],
    allowedHeaders: ['Content-Type', 'Authorization'],
  }));

  app.get('/health', (_req, res) => {
    res.status(200).json({ status: 'ok' });
  });

  /**
   * Runs the full pipeline on one uploaded file.
   *
   * @route POST /api/extract
   * @middleware upload.single('document') - Expects a single file field named 'document'.
   * @query download - when "true", responds with the fields as an `invoice_fields.json` attachment
   */
  app.post('/api/extract', upload.single('document'), async (req, res, next) => {
    if (!req.file) {
      res.status(400).json({ error: 'No document uploaded. Please ensure the file field is named "document".' });
      return;
    }

    const documentId = uuidv4();
    const filename = req.file.originalname;
    logger.info('Received document', { documentId, filename, size: req.file.size });

    try {
      const result = await deps.pipeline.runFile(filename, req.file.buffer);
      if (!result.success) {
        logger.warn('Extraction failed', { documentId, errorCode: result.errorCode, error: result.error });
        sendFailure(res, result.error, result.errorCode);
        return;
      }

      logger.info('Extraction succeeded', { documentId, textSource: result.textSource });
      if (req.query.download === 'true') {
        res.attachment(DOWNLOAD_FILENAME);
        res.send(JSON.stringify(result.data, null, 2));
        return;
      }

      res.status(200).json({
        documentId,
        filename,
        kind: result.kind,
        textSource: result.textSource,
        fields: result.data,
      });
    } catch (error) {
      next(error);
    }
  });

  /**
   * Renders every page of an uploaded PDF for display next to the results.
   *
   * @route POST /api/preview
   */
  app.post('/api/preview', upload.single('document'), async (req, res, next) => {
    if (!req.file) {
      res.status(400).json({ error: 'No document uploaded. Please ensure the file field is named "document".' });
      return;
    }
    if (classifyDocument(req.file.originalname) !== 'pdf') {
      sendFailure(res, 'Only PDF files can be previewed.', 'UnsupportedFile');
      return;
    }

    try {
      const pdf = await deps.pdfReader.open(req.file.buffer);
      try {
        const pages = await rasterizePages(pdf, deps.config.pdfRenderScale).catch((error: unknown) => {
          throw wrapError(error, 'DecodeError', 'Could not render PDF pages');
        });
        res.status(200).json({
          pages: pages.map((page) => ({
            pageNumber: page.pageNumber,
            width: page.width,
            height: page.height,
            dataUrl: `data:image/png;base64,${page.data.toString('base64')}`,
          })),
        });
      } finally {
        await pdf.close();
      }
    } catch (error) {
      if (error instanceof PipelineError) {
        sendFailure(res, error.message, error.kind);
        return;
      }
      next(error);
    }
  });

  const staticDir = path.resolve(deps.config.staticDir);
  if (fs.existsSync(staticDir)) {
    app.use(express.static(staticDir));
  }

  app.use((error: unknown, _req: Request, res: Response, _next: NextFunction) => {
    if (error instanceof multer.MulterError) {
      const status = error.code === 'LIMIT_FILE_SIZE' ? 413 : 400;
      res.status(status).json({ error: error.message });
      return;
    }
    logger.error('Unhandled request error', { error: errorMessage(error) });
    res.status(500).json({ error: 'Internal Server Error during document processing.' });
  });

  return app;
}
