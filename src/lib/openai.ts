import OpenAI from 'openai';
import type { AppConfig } from './config';
import type { ChatClient } from './field-extractor';
import { createLogger } from './logger';

const logger = createLogger('OpenAI');

/**
 * Builds the chat client shared by every request in this process. The SDK
 * client holds only connection settings, so concurrent calls through one
 * instance are safe.
 *
 * Without an API key the client is still built: each call then fails with an
 * authentication error that surfaces as `LLMRequestError`.
 */
export function createOpenAIClient(config: AppConfig): ChatClient {
  if (!config.openaiApiKey) {
    logger.warn('OPENAI_API_KEY is not set; field extraction requests will fail');
  }

  return new OpenAI({
    apiKey: config.openaiApiKey ?? '',
    baseURL: config.openaiBaseUrl,
    timeout: config.llmTimeoutMs,
    maxRetries: 0,
  });
}
