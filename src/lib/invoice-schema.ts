/**
 * Invoice Field Schema
 *
 * The model is told to answer with exactly five keys. This module checks
 * that it did: absent or null values get their documented defaults (empty
 * string, or empty array for `products`) and any key outside the schema is
 * rejected. Values are not reformatted: dates and amounts stay as written.
 *
 * @module invoice-schema
 */

import { z } from 'zod';
import { PipelineError } from './errors';

// Amounts and quantities arrive as either "12.50" or 12.5 depending on the model's mood.
const scalarField = z
  .union([z.string(), z.number()])
  .nullish()
  .transform((value) => value ?? '');

const textField = z
  .string()
  .nullish()
  .transform((value) => value ?? '');

export const ProductSchema = z
  .object({
    description: textField,
    quantity: scalarField,
    unit_price: scalarField,
    line_total: scalarField,
  })
  .strict();

export const InvoiceFieldsSchema = z
  .object({
    invoice_number: scalarField,
    invoice_date: textField,
    vendor_name: textField,
    total_amount: scalarField,
    products: z
      .array(ProductSchema)
      .nullish()
      .transform((value) => value ?? []),
  })
  .strict();

export type ExtractedInvoice = z.output<typeof InvoiceFieldsSchema>;

export const INVOICE_FIELD_KEYS = ['invoice_number', 'invoice_date', 'vendor_name', 'total_amount', 'products'] as const;

export function emptyInvoice(): ExtractedInvoice {
  return {
    invoice_number: '',
    invoice_date: '',
    vendor_name: '',
    total_amount: '',
    products: [],
  };
}

/**
 * Validates a parsed model reply and fills in missing fields.
 *
 * @throws {PipelineError} of kind `LLMParseError` naming every offending path
 */
export function parseInvoiceFields(raw: unknown): ExtractedInvoice {
  const result = InvoiceFieldsSchema.safeParse(raw);
  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `${issue.path.length > 0 ? issue.path.join('.') : '(root)'}: ${issue.message}`)
      .join('; ');
    throw new PipelineError('LLMParseError', `Model reply does not match the invoice schema: ${issues}`, {
      cause: result.error,
    });
  }
  return result.data;
}
