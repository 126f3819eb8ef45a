import { z } from 'zod';
import { ConfigError } from './errors';

const DEFAULT_CORS_ORIGINS = 'http://localhost:3001,http://localhost:3000,http://localhost:5173';

const booleanString = z
  .enum(['true', 'false', '1', '0', 'yes', 'no'])
  .transform((value) => value === 'true' || value === '1' || value === 'yes');

// Empty strings in .env files count as unset.
const optionalString = z
  .string()
  .optional()
  .transform((value) => (value && value.trim() !== '' ? value.trim() : undefined));

const EnvSchema = z.object({
  OPENAI_API_KEY: optionalString,
  OPENAI_MODEL: z.string().min(1).default('gpt-4'),
  OPENAI_BASE_URL: optionalString,
  LLM_TIMEOUT_MS: z.coerce.number().int().positive().default(600_000),
  PORT: z.coerce.number().int().min(0).max(65535).default(3000),
  CORS_ORIGINS: z.string().default(DEFAULT_CORS_ORIGINS),
  MAX_UPLOAD_BYTES: z.coerce.number().int().positive().default(20 * 1024 * 1024),
  PDF_RENDER_SCALE: z.coerce.number().positive().max(10).default(1.5),
  OCR_LANG: z.string().min(1).default('eng'),
  OCR_LANG_PATH: optionalString,
  SKIP_EMPTY_TEXT: booleanString.default('true'),
  LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error', 'silent']).default('info'),
  STATIC_DIR: z.string().default('invoice-extractor-frontend/dist'),
}).superRefine((vars, ctx) => {
  // Only English data ships with the package.
  if (vars.OCR_LANG !== 'eng' && !vars.OCR_LANG_PATH) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      path: ['OCR_LANG_PATH'],
      message: 'required when OCR_LANG is not "eng"',
    });
  }
});

export interface AppConfig {
  openaiApiKey?: string;
  openaiModel: string;
  openaiBaseUrl?: string;
  llmTimeoutMs: number;
  port: number;
  corsOrigins: string[];
  maxUploadBytes: number;
  pdfRenderScale: number;
  ocrLang: string;
  ocrLangPath?: string;
  skipEmptyText: boolean;
  logLevel: 'debug' | 'info' | 'warn' | 'error' | 'silent';
  staticDir: string;
}

/**
 * Builds the application configuration from environment variables.
 * Call `dotenv.config()` first when a `.env` file should be honoured.
 *
 * @throws {ConfigError} when a variable is present but invalid
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    const details = parsed.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new ConfigError(`Invalid configuration: ${details}`);
  }

  const vars = parsed.data;
  return {
    openaiApiKey: vars.OPENAI_API_KEY,
    openaiModel: vars.OPENAI_MODEL,
    openaiBaseUrl: vars.OPENAI_BASE_URL,
    llmTimeoutMs: vars.LLM_TIMEOUT_MS,
    port: vars.PORT,
    corsOrigins: vars.CORS_ORIGINS.split(',')
      .map((origin) => origin.trim())
      .filter((origin) => origin.length > 0),
    maxUploadBytes: vars.MAX_UPLOAD_BYTES,
    pdfRenderScale: vars.PDF_RENDER_SCALE,
    ocrLang: vars.OCR_LANG,
    ocrLangPath: vars.OCR_LANG_PATH,
    skipEmptyText: vars.SKIP_EMPTY_TEXT,
    logLevel: vars.LOG_LEVEL,
    staticDir: vars.STATIC_DIR,
  };
}
