import { createRequire } from 'node:module';
import path from 'node:path';
import sharp from 'sharp';
import { createWorker, type Worker } from 'tesseract.js';
import { createLogger } from './logger';
import { ConfigError, wrapError } from './errors';

const logger = createLogger('OCR');

/**
 * A text-recognition backend. Implementations receive images that have
 * already been through `preprocessImage`.
 */
export interface OcrEngine {
  recognize(image: Buffer): Promise<string>;
  terminate(): Promise<void>;
}

export interface TesseractEngineOptions {
  lang?: string;
  /** Directory holding `<lang>.traineddata`. Defaults to the bundled English data. */
  langPath?: string;
}

const require = createRequire(import.meta.url);

/**
 * Directory of the English model installed with `@tesseract.js-data/eng`, or
 * undefined for any other language.
 */
export function bundledLangPath(lang: string): string | undefined {
  if (lang !== 'eng') return undefined;
  const packageJson = require.resolve('@tesseract.js-data/eng/package.json');
  return path.join(path.dirname(packageJson), '4.0.0_best_int');
}

/**
 * Normalizes an image for recognition: transparency is flattened onto white
 * and the result is written out as a single-channel grayscale PNG. Palette
 * images need no extra step since sharp expands them on read.
 *
 * Deskewing, denoising and thresholding are not done yet.
 *
 * @throws {PipelineError} of kind `DecodeError` when the bytes are not a readable image
 */
export async function preprocessImage(image: Buffer): Promise<Buffer> {
  try {
    return await sharp(image)
      .flatten({ background: '#ffffff' })
      .toColourspace('b-w')
      .png()
      .toBuffer();
  } catch (error) {
    throw wrapError(error, 'DecodeError', 'Could not decode image');
  }
}

/**
 * tesseract.js engine. The worker is created on first use and reused for
 * every later page until `terminate` is called. Language data is always read
 * from disk.
 *
 * @throws {ConfigError} for a language other than `eng` without a `langPath`
 */
export function createTesseractEngine(options: TesseractEngineOptions = {}): OcrEngine {
  const lang = options.lang ?? 'eng';
  const langPath = options.langPath ?? bundledLangPath(lang);
  if (!langPath) {
    throw new ConfigError(`No language data for "${lang}": set OCR_LANG_PATH to a directory holding ${lang}.traineddata`);
  }
  let workerPromise: Promise<Worker> | null = null;

  const getWorker = (): Promise<Worker> => {
    if (!workerPromise) {
      logger.info('Initializing Tesseract worker', { lang, langPath });
      const starting = createWorker(lang, undefined, { langPath });
      workerPromise = starting;
      // A failed start must not poison later requests.
      starting.catch(() => {
        if (workerPromise === starting) workerPromise = null;
      });
      return starting;
    }
    return workerPromise;
  };

  return {
    async recognize(image) {
      const worker = await getWorker();
      const { data } = await worker.recognize(image);
      return data.text;
    },

    async terminate() {
      if (!workerPromise) return;
      const pending = workerPromise;
      workerPromise = null;
      const worker = await pending;
      await worker.terminate();
      logger.info('Tesseract worker terminated');
    },
  };
}

/**
 * Runs OCR over each image in order and joins the results with newlines.
 * Empty or unreadable output is passed through as-is.
 *
 * @throws {PipelineError} `DecodeError` for undecodable images, `OCRError` when the engine fails
 */
export async function performOcr(images: Buffer[], engine: OcrEngine): Promise<string> {
  const texts: string[] = [];
  for (const [index, image] of images.entries()) {
    const prepared = await preprocessImage(image);
    try {
      texts.push(await engine.recognize(prepared));
    } catch (error) {
      throw wrapError(error, 'OCRError', `Text recognition failed on image ${index + 1}`);
    }
    logger.debug('Recognized image', { image: index + 1, characters: texts[index].length });
  }
  return texts.join('\n');
}
