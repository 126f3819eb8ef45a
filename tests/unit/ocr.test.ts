import fs from 'node:fs';
import path from 'node:path';
import sharp from 'sharp';
import { beforeEach, describe, it, expect, vi } from 'vitest';
import { PipelineError } from '../../src/lib/errors';
import { type OcrEngine, bundledLangPath, createTesseractEngine, performOcr, preprocessImage } from '../../src/lib/ocr';
import { createFakeOcrEngine, whitePng } from '../helpers/fakes';

const tesseract = vi.hoisted(() => {
  const worker = {
    recognize: vi.fn(async (_image: unknown) => ({ data: { text: 'recognized text' } })),
    terminate: vi.fn(async () => {}),
  };
  return { worker, createWorker: vi.fn(async (..._args: unknown[]) => worker) };
});

vi.mock('tesseract.js', () => ({ createWorker: tesseract.createWorker }));

async function captureError(promise: Promise<unknown>): Promise<unknown> {
  try {
    await promise;
  } catch (error) {
    return error;
  }
  throw new Error('expected the promise to reject');
}

describe('preprocessImage', () => {
  it('produces a single-channel PNG', async () => {
    const input = await sharp({ create: { width: 12, height: 6, channels: 3, background: '#3366cc' } })
      .jpeg()
      .toBuffer();

    const output = await sharp(await preprocessImage(input)).metadata();

    expect(output.format).toBe('png');
    expect(output.channels).toBe(1);
    expect(output.width).toBe(12);
    expect(output.height).toBe(6);
  });

  it('flattens transparent images onto white', async () => {
    const input = await sharp({ create: { width: 4, height: 4, channels: 4, background: { r: 0, g: 0, b: 0, alpha: 0 } } })
      .png()
      .toBuffer();

    const { data } = await sharp(await preprocessImage(input)).raw().toBuffer({ resolveWithObject: true });

    expect([...data].every((value) => value === 255)).toBe(true);
  });

  it('accepts palette PNGs', async () => {
    const input = await sharp({ create: { width: 8, height: 8, channels: 3, background: '#ff0000' } })
      .png({ palette: true })
      .toBuffer();
    expect((await sharp(input).metadata()).paletteBitDepth).toBeDefined();

    const output = await sharp(await preprocessImage(input)).metadata();

    expect(output.channels).toBe(1);
  });

  it('rejects bytes that are not an image', async () => {
    const error = await captureError(preprocessImage(Buffer.from('definitely not an image')));

    expect(error).toBeInstanceOf(PipelineError);
    expect(error).toMatchObject({ kind: 'DecodeError' });
    expect(error instanceof Error && error.message.startsWith('Could not decode image: ')).toBe(true);
  });
});

describe('performOcr', () => {
  it('recognizes images in order and joins them with newlines', async () => {
    const { engine, recognize } = createFakeOcrEngine(['page one', 'page two']);

    const text = await performOcr([await whitePng(), await whitePng(16, 16)], engine);

    expect(text).toBe('page one\npage two');
    expect(recognize).toHaveBeenCalledTimes(2);
    const secondInput = await sharp(recognize.mock.calls[1][0]).metadata();
    expect(secondInput.width).toBe(16);
    expect(secondInput.channels).toBe(1);
  });

  it('passes empty recognition output through', async () => {
    const { engine } = createFakeOcrEngine(['']);

    expect(await performOcr([await whitePng()], engine)).toBe('');
  });

  it('returns an empty string for no images', async () => {
    const { engine, recognize } = createFakeOcrEngine();

    expect(await performOcr([], engine)).toBe('');
    expect(recognize).not.toHaveBeenCalled();
  });

  it('reports engine failures as OCRError naming the image', async () => {
    const engine: OcrEngine = {
      recognize: async () => {
        throw new Error('engine crashed');
      },
      terminate: async () => {},
    };

    const error = await captureError(performOcr([await whitePng()], engine));

    expect(error).toMatchObject({ kind: 'OCRError', message: 'Text recognition failed on image 1: engine crashed' });
  });

  it('does not call the engine for undecodable images', async () => {
    const { engine, recognize } = createFakeOcrEngine(['unused']);

    const error = await captureError(performOcr([Buffer.from('garbage')], engine));

    expect(error).toMatchObject({ kind: 'DecodeError' });
    expect(recognize).not.toHaveBeenCalled();
  });
});

describe('createTesseractEngine', () => {
  beforeEach(() => {
    tesseract.createWorker.mockClear();
    tesseract.worker.recognize.mockClear();
    tesseract.worker.terminate.mockClear();
  });

  it('starts one worker lazily and reuses it', async () => {
    const engine = createTesseractEngine();
    expect(tesseract.createWorker).not.toHaveBeenCalled();

    expect(await engine.recognize(Buffer.from('a'))).toBe('recognized text');
    expect(await engine.recognize(Buffer.from('b'))).toBe('recognized text');

    expect(tesseract.createWorker).toHaveBeenCalledTimes(1);
    expect(tesseract.createWorker).toHaveBeenCalledWith('eng', undefined, { langPath: bundledLangPath('eng') });
    expect(tesseract.worker.recognize).toHaveBeenCalledTimes(2);
  });

  it('reads English data from the installed package by default', async () => {
    await createTesseractEngine().recognize(Buffer.from('a'));

    const [, , options] = tesseract.createWorker.mock.calls[0];
    expect(options).toEqual({ langPath: expect.stringMatching(/@tesseract\.js-data[\\/]eng[\\/]4\.0\.0_best_int$/) });
    const langPath = bundledLangPath('eng');
    expect(langPath !== undefined && path.isAbsolute(langPath)).toBe(true);
    expect(langPath !== undefined && fs.existsSync(path.join(langPath, 'eng.traineddata.gz'))).toBe(true);
  });

  it('requires a data path for other languages', () => {
    expect(bundledLangPath('deu')).toBeUndefined();
    expect(() => createTesseractEngine({ lang: 'deu' })).toThrow(
      'No language data for "deu": set OCR_LANG_PATH to a directory holding deu.traineddata'
    );
    expect(tesseract.createWorker).not.toHaveBeenCalled();
  });

  it('passes the language and data path to the worker', async () => {
    const engine = createTesseractEngine({ lang: 'deu', langPath: '/opt/tessdata' });

    await engine.recognize(Buffer.from('a'));

    expect(tesseract.createWorker).toHaveBeenCalledWith('deu', undefined, { langPath: '/opt/tessdata' });
  });

  it('retries worker start-up after a failed attempt', async () => {
    tesseract.createWorker.mockRejectedValueOnce(new Error('traineddata missing'));
    const engine = createTesseractEngine();

    await expect(engine.recognize(Buffer.from('a'))).rejects.toThrow('traineddata missing');
    expect(await engine.recognize(Buffer.from('a'))).toBe('recognized text');

    expect(tesseract.createWorker).toHaveBeenCalledTimes(2);
  });

  it('terminates the worker once', async () => {
    const engine = createTesseractEngine();

    await engine.terminate();
    expect(tesseract.worker.terminate).not.toHaveBeenCalled();

    await engine.recognize(Buffer.from('a'));
    await engine.terminate();
    await engine.terminate();

    expect(tesseract.worker.terminate).toHaveBeenCalledTimes(1);
  });
});
