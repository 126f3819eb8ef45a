import { describe, it, expect } from 'vitest';
import { PipelineError } from '../../src/lib/errors';
import { INVOICE_FIELD_KEYS, emptyInvoice, parseInvoiceFields } from '../../src/lib/invoice-schema';

describe('parseInvoiceFields', () => {
  it('keeps exactly the five keys of a complete reply', () => {
    const raw = {
      invoice_number: 'INV-7',
      invoice_date: '2024-03-01',
      vendor_name: 'Northwind Supplies',
      total_amount: '$120.00',
      products: [{ description: 'Paper', quantity: 4, unit_price: '$30.00', line_total: '$120.00' }],
    };

    const fields = parseInvoiceFields(raw);

    expect(Object.keys(fields).sort()).toEqual([...INVOICE_FIELD_KEYS].sort());
    expect(fields).toEqual(raw);
  });

  it('defaults a missing products array to []', () => {
    const fields = parseInvoiceFields({
      invoice_number: '1',
      invoice_date: '',
      vendor_name: 'Acme',
      total_amount: 10,
    });

    expect(fields.products).toEqual([]);
    expect(fields.total_amount).toBe(10);
  });

  it('fills missing and null scalars with empty strings', () => {
    expect(parseInvoiceFields({ vendor_name: null })).toEqual(emptyInvoice());
  });

  it('fills missing product fields', () => {
    const fields = parseInvoiceFields({ products: [{ description: 'Bolts' }] });

    expect(fields.products).toEqual([{ description: 'Bolts', quantity: '', unit_price: '', line_total: '' }]);
  });

  it('does not reformat dates or amounts', () => {
    const fields = parseInvoiceFields({ invoice_date: '03/01/2024', total_amount: 'EUR 1.234,50' });

    expect(fields.invoice_date).toBe('03/01/2024');
    expect(fields.total_amount).toBe('EUR 1.234,50');
  });

  it('rejects extra top-level keys', () => {
    expect(() => parseInvoiceFields({ ...emptyInvoice(), currency: 'USD' })).toThrow(
      "Model reply does not match the invoice schema: (root): Unrecognized key(s) in object: 'currency'"
    );
  });

  it('rejects extra keys inside a product', () => {
    expect(() => parseInvoiceFields({ products: [{ description: 'x', sku: 'A1' }] })).toThrow(
      "Model reply does not match the invoice schema: products.0: Unrecognized key(s) in object: 'sku'"
    );
  });

  it('rejects non-object replies as LLMParseError', () => {
    let caught: unknown;
    try {
      parseInvoiceFields(['not', 'an', 'object']);
    } catch (error) {
      caught = error;
    }
    expect(caught).toBeInstanceOf(PipelineError);
    expect(caught).toMatchObject({ kind: 'LLMParseError' });
  });
});
