import { PipelineError, wrapError } from './errors';
import { type ExtractedInvoice, parseInvoiceFields } from './invoice-schema';
import { createLogger } from './logger';

const logger = createLogger('Field Extractor');

export interface ChatMessage {
  role: 'user';
  content: string;
}

export interface ChatCompletionRequest {
  model: string;
  messages: ChatMessage[];
  temperature: number;
}

export interface ChatCompletionReply {
  choices: Array<{ message: { content: string | null } }>;
}

/**
 * The slice of a chat-completions client the extractor needs. The OpenAI SDK
 * client satisfies it; tests pass a fake.
 */
export interface ChatClient {
  chat: {
    completions: {
      create(request: ChatCompletionRequest): Promise<ChatCompletionReply>;
    };
  };
}

export interface FieldExtractorOptions {
  model: string;
}

export interface FieldExtractor {
  extractFields(text: string): Promise<ExtractedInvoice>;
}

/**
 * Builds the single instruction sent to the model. The raw text is embedded
 * verbatim; nothing is truncated, so oversized documents fail at the API.
 */
export function buildPrompt(text: string): string {
  return (
    'You are an invoice-processing assistant.\n' +
    'Extract exactly the following into a JSON object:\n' +
    '  • invoice_number (string)\n' +
    '  • invoice_date (YYYY-MM-DD)\n' +
    '  • vendor_name (string)\n' +
    '  • total_amount (numeric with currency)\n' +
    '  • products (array of objects, each with description, quantity, unit_price, line_total)\n' +
    'If any field is missing, use an empty string or empty array. Do not return any extra keys.\n\n' +
    'Here is the raw invoice text:\n```\n' +
    text +
    '\n```\n\n' +
    'Respond *only* with the JSON.'
  );
}

const FENCED_JSON = /^```(?:json)?\s*\n?([\s\S]*?)\n?```$/i;

/**
 * Drops a surrounding markdown code fence, if the model added one.
 */
export function stripCodeFence(content: string): string {
  const trimmed = content.trim();
  const match = FENCED_JSON.exec(trimmed);
  return match ? match[1].trim() : trimmed;
}

/**
 * Parses the model's message content into invoice fields.
 *
 * @throws {PipelineError} of kind `LLMParseError` for empty, non-JSON or off-schema content
 */
export function parseModelReply(content: string | null | undefined): ExtractedInvoice {
  if (content === null || content === undefined || content.trim() === '') {
    throw new PipelineError('LLMParseError', 'Model returned an empty reply');
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(stripCodeFence(content));
  } catch (error) {
    throw wrapError(error, 'LLMParseError', 'Model reply is not valid JSON');
  }
  return parseInvoiceFields(parsed);
}

/**
 * One chat completion per document at temperature 0. No streaming, no
 * fallback model, no retry.
 */
export function createFieldExtractor(client: ChatClient, options: FieldExtractorOptions): FieldExtractor {
  return {
    async extractFields(text) {
      const prompt = buildPrompt(text);
      logger.debug('Requesting field extraction', { model: options.model, promptLength: prompt.length });

      let reply: ChatCompletionReply;
      try {
        reply = await client.chat.completions.create({
          model: options.model,
          messages: [{ role: 'user', content: prompt }],
          temperature: 0,
        });
      } catch (error) {
        throw wrapError(error, 'LLMRequestError', 'LLM request failed');
      }

      const fields = parseModelReply(reply.choices[0]?.message.content);
      logger.info('Extracted invoice fields', {
        model: options.model,
        productCount: fields.products.length,
      });
      return fields;
    },
  };
}
