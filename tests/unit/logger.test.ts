import { afterEach, describe, it, expect, vi } from 'vitest';
import { createLogger, formatLogLine, getLogLevel, isLogLevel, setLogLevel } from '../../src/lib/logger';

describe('formatLogLine', () => {
  it('prefixes the scope', () => {
    expect(formatLogLine('OCR', 'Worker ready')).toBe('[OCR] Worker ready');
  });

  it('appends context as JSON', () => {
    expect(formatLogLine('Pipeline', 'Pipeline completed', { source: 'ocr', processingTimeMs: 12 })).toBe(
      '[Pipeline] Pipeline completed {"source":"ocr","processingTimeMs":12}'
    );
  });

  it('omits empty context', () => {
    expect(formatLogLine('Pipeline', 'Started', {})).toBe('[Pipeline] Started');
  });
});

describe('createLogger', () => {
  const initialLevel = getLogLevel();

  afterEach(() => {
    setLogLevel(initialLevel);
    vi.restoreAllMocks();
  });

  it('drops messages below the current level', () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => {});
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
    setLogLevel('warn');

    const logger = createLogger('Loader');
    logger.info('hidden');
    logger.warn('Rejected upload', { filename: 'a.txt' });

    expect(log).not.toHaveBeenCalled();
    expect(warn).toHaveBeenCalledWith('[Loader] Rejected upload {"filename":"a.txt"}');
  });

  it('writes nothing when silent', () => {
    const error = vi.spyOn(console, 'error').mockImplementation(() => {});
    setLogLevel('silent');

    createLogger('Loader').error('boom');

    expect(error).not.toHaveBeenCalled();
  });

  it('routes debug output to console.debug', () => {
    const debug = vi.spyOn(console, 'debug').mockImplementation(() => {});
    setLogLevel('debug');

    createLogger('OCR').debug('Recognized image', { image: 1 });

    expect(debug).toHaveBeenCalledWith('[OCR] Recognized image {"image":1}');
  });
});

describe('isLogLevel', () => {
  it('accepts known levels only', () => {
    expect(isLogLevel('warn')).toBe(true);
    expect(isLogLevel('verbose')).toBe(false);
    expect(isLogLevel(undefined)).toBe(false);
  });
});
