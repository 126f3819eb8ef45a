import dotenv from 'dotenv';
import { ConfigError, errorMessage } from '../lib/errors';
import { type AppConfig, loadConfig } from '../lib/config';
import { createFieldExtractor } from '../lib/field-extractor';
import { createLogger, setLogLevel } from '../lib/logger';
import { createTesseractEngine } from '../lib/ocr';
import { createOpenAIClient } from '../lib/openai';
import { pdfjsReader } from '../lib/pdf';
import { createPipeline } from '../lib/pipeline';
import { createTextExtractor } from '../lib/text-extractor';
import { createApp } from './app';

dotenv.config(); // Load environment variables

const logger = createLogger('Extraction Service');

function readConfig(): AppConfig {
  try {
    return loadConfig();
  } catch (error) {
    if (error instanceof ConfigError) {
      logger.error(error.message);
      process.exit(1);
    }
    throw error;
  }
}

const config = readConfig();
setLogLevel(config.logLevel);

const ocrEngine = createTesseractEngine({ lang: config.ocrLang, langPath: config.ocrLangPath });
const pipeline = createPipeline({
  textExtractor: createTextExtractor({
    pdfReader: pdfjsReader,
    ocrEngine,
    renderScale: config.pdfRenderScale,
  }),
  fieldExtractor: createFieldExtractor(createOpenAIClient(config), { model: config.openaiModel }),
  skipEmptyText: config.skipEmptyText,
});

const app = createApp({ pipeline, pdfReader: pdfjsReader, config });

const server = app.listen(config.port, () => {
  logger.info(`Listening on http://localhost:${config.port}`, { model: config.openaiModel });
});

function shutdown(signal: string): void {
  logger.info(`Received ${signal}, shutting down...`);
  ocrEngine
    .terminate()
    .catch((error: unknown) => {
      logger.error('Could not stop the OCR worker', { error: errorMessage(error) });
    })
    .finally(() => {
      server.close(() => process.exit(0));
    });
}

process.on('SIGINT', () => shutdown('SIGINT'));
process.on('SIGTERM', () => shutdown('SIGTERM'));
