/**
 * Quotation engine: totals with discount and exemptions, the status
 * lifecycle, automatic expiry and conversion to an invoice.
 */

import { describe, it, expect, beforeEach } from 'vitest';
import { cleanAllData, getTestDb } from './setup';
import { createCustomer, createProduct, createQuotation, resetCounters, TEST_USER_ID } from './helpers/factory';
import { quotationService, DEFAULT_VALIDITY_DAYS } from '../server/services/quotation.service';
import { auditService } from '../server/services/audit.service';
import { PolicyViolationError, ValidationError } from '../server/lib/errors';
import { addDays, formatLocalDate } from '../server/lib/dates';
import type { Customer } from '../shared/types';

let customer: Customer;

beforeEach(async () => {
  await cleanAllData();
  resetCounters();
  customer = await createCustomer();
});

async function acceptedQuotation(overrides: Parameters<typeof createQuotation>[1] = {}) {
  const quotation = await createQuotation(customer.id, overrides);
  await quotationService.updateStatus(quotation.id, 'sent', TEST_USER_ID);
  await quotationService.updateStatus(quotation.id, 'accepted', TEST_USER_ID);
  return quotation;
}

describe('createQuotation', () => {
  it('numbers the quotation and starts in draft', async () => {
    const quotation = await createQuotation(customer.id);
    expect(quotation.number).toBe(`Q-${new Date().getFullYear()}-00001`);
    expect(quotation.status).toBe('draft');
    expect(quotation.tax_enabled).toBe(true);
  });

  it('defaults validity to two weeks from today', async () => {
    const quotation = await createQuotation(customer.id);
    expect(quotation.valid_until).toBe(formatLocalDate(addDays(new Date(), DEFAULT_VALIDITY_DAYS)));
  });

  it('accepts an explicit null validity as never expiring', async () => {
    const quotation = await createQuotation(customer.id, { valid_until: null });
    expect(quotation.valid_until).toBeNull();
  });

  it('rejects a validity date in the past', async () => {
    await expect(createQuotation(customer.id, { valid_until: '2000-01-01' })).rejects.toBeInstanceOf(ValidationError);
  });

  it('rejects a negative discount and an out-of-range tax rate', async () => {
    await expect(createQuotation(customer.id, { discount_amount: -1 })).rejects.toMatchObject({ field: 'discount_amount' });
    await expect(createQuotation(customer.id, { tax_rate: 1.5 })).rejects.toMatchObject({ field: 'tax_rate' });
  });

  it('refuses negative prices on quotation lines', async () => {
    await expect(
      createQuotation(customer.id, { lines: [{ item_name: 'Goodwill', quantity: 1, unit_price: -500 }] }),
    ).rejects.toMatchObject({ field: 'unit_price' });
  });
});

describe('quotation totals', () => {
  it('takes the discount off the subtotal before tax', async () => {
    const quotation = await createQuotation(customer.id, {
      discount_amount: 10000,
      lines: [{ item_name: 'Installation', quantity: 1, unit_price: 100000 }],
    });

    expect(quotation.subtotal_amount).toBe(100000);
    expect(quotation.tax_amount).toBe(16200);
    expect(quotation.total_amount).toBe(106200);
  });

  it('taxes only the non-exempt lines', async () => {
    const quotation = await createQuotation(customer.id, {
      lines: [
        { item_name: 'Hardware', quantity: 1, unit_price: 100000 },
        { item_name: 'Training', quantity: 1, unit_price: 50000, tax_exempt: true },
      ],
    });

    expect(quotation.subtotal_amount).toBe(150000);
    expect(quotation.tax_amount).toBe(18000);
    expect(quotation.total_amount).toBe(168000);
  });

  it('never taxes a negative base when the discount exceeds the taxable part', async () => {
    const quotation = await createQuotation(customer.id, {
      discount_amount: 120000,
      lines: [
        { item_name: 'Hardware', quantity: 1, unit_price: 100000 },
        { item_name: 'Training', quantity: 1, unit_price: 50000, tax_exempt: true },
      ],
    });

    expect(quotation.tax_amount).toBe(0);
    expect(quotation.total_amount).toBe(30000);
  });

  it('skips tax entirely when tax is disabled', async () => {
    const quotation = await createQuotation(customer.id, {
      tax_enabled: false,
      lines: [{ item_name: 'Hardware', quantity: 2, unit_price: 25000 }],
    });

    expect(quotation.tax_amount).toBe(0);
    expect(quotation.total_amount).toBe(50000);
  });

  it('recalculates after line edits', async () => {
    const product = await createProduct({ unit_price: 2000 });
    const quotation = await createQuotation(customer.id, { lines: [{ product_id: product.id, quantity: 1 }] });
    const lineId = quotation.lines[0].id;

    const updated = await quotationService.updateLine(quotation.id, lineId, { quantity: 3 });
    expect(updated.lines[0].line_total).toBe(6000);
    expect(updated.subtotal_amount).toBe(6000);
    expect(updated.tax_amount).toBe(1080);

    const emptied = await quotationService.removeLine(quotation.id, lineId);
    expect(emptied.lines).toHaveLength(0);
    expect(emptied.total_amount).toBe(0);
  });
});

describe('status lifecycle', () => {
  it('follows draft → sent → accepted and audits each step', async () => {
    const quotation = await createQuotation(customer.id);

    await quotationService.updateStatus(quotation.id, 'sent', TEST_USER_ID);
    const accepted = await quotationService.updateStatus(quotation.id, 'accepted', TEST_USER_ID);

    expect(accepted.status).toBe('accepted');
    const events = await auditService.listForEntity('quotation', quotation.id);
    expect(events.map((e) => e.meta.to)).toEqual(expect.arrayContaining(['sent', 'accepted']));
  });

  it('refuses skipping from draft to accepted', async () => {
    const quotation = await createQuotation(customer.id);
    await expect(quotationService.updateStatus(quotation.id, 'accepted', null)).rejects.toMatchObject({
      rule: 'invalid_transition',
    });
  });

  it('refuses setting converted or expired by hand', async () => {
    const quotation = await createQuotation(customer.id);
    await expect(quotationService.updateStatus(quotation.id, 'converted', null)).rejects.toMatchObject({
      rule: 'use_conversion',
    });
    await expect(quotationService.updateStatus(quotation.id, 'expired', null)).rejects.toMatchObject({
      rule: 'expiry_is_automatic',
    });
  });

  it('cancels a draft without a reason', async () => {
    const quotation = await createQuotation(customer.id);
    const cancelled = await quotationService.cancelQuotation(quotation.id, '', TEST_USER_ID);
    expect(cancelled.status).toBe('cancelled');
    expect(cancelled.cancelled_by).toBe(TEST_USER_ID);
  });

  it('requires a reason to cancel a sent quotation', async () => {
    const quotation = await createQuotation(customer.id);
    await quotationService.updateStatus(quotation.id, 'sent', null);

    await expect(quotationService.cancelQuotation(quotation.id, '  ', null)).rejects.toMatchObject({ field: 'reason' });

    const cancelled = await quotationService.updateStatus(quotation.id, 'cancelled', null, ' Customer went elsewhere ');
    expect(cancelled.cancel_reason).toBe('Customer went elsewhere');
  });

  it('locks lines and header once cancelled', async () => {
    const quotation = await createQuotation(customer.id);
    await quotationService.cancelQuotation(quotation.id, '', null);

    await expect(
      quotationService.addLine(quotation.id, { item_name: 'Late addition', quantity: 1, unit_price: 100 }),
    ).rejects.toMatchObject({ rule: 'quotation_locked' });
    await expect(quotationService.updateQuotation(quotation.id, { notes: 'too late' })).rejects.toBeInstanceOf(
      PolicyViolationError,
    );
  });
});

describe('expiry', () => {
  it('is still valid on its last day', async () => {
    const validUntil = formatLocalDate(addDays(new Date(), 1));
    const quotation = await createQuotation(customer.id, { valid_until: validUntil });

    const refreshed = await quotationService.refreshExpiry(quotation.id, validUntil);
    expect(refreshed.status).toBe('draft');
  });

  it('expires draft and sent quotations once the date has passed', async () => {
    const draft = await createQuotation(customer.id);
    const sent = await createQuotation(customer.id);
    await quotationService.updateStatus(sent.id, 'sent', null);
    const accepted = await acceptedQuotation();
    const open = await createQuotation(customer.id, { valid_until: null });

    const expired = await quotationService.expireOverdueQuotations('2999-01-01');

    expect(expired).toBe(2);
    expect((await quotationService.getQuotation(draft.id)).status).toBe('expired');
    expect((await quotationService.getQuotation(sent.id)).status).toBe('expired');
    expect((await quotationService.getQuotation(accepted.id)).status).toBe('accepted');
    expect((await quotationService.getQuotation(open.id)).status).toBe('draft');
  });

  it('blocks transitions out of expired', async () => {
    const quotation = await createQuotation(customer.id);
    await quotationService.updateStatus(quotation.id, 'sent', null);
    await quotationService.refreshExpiry(quotation.id, '2999-01-01');

    await expect(quotationService.updateStatus(quotation.id, 'accepted', null)).rejects.toMatchObject({
      rule: 'invalid_transition',
    });
  });
});

describe('convertToInvoice', () => {
  it('copies the lines and carries the discount as a negative line', async () => {
    const product = await createProduct({ unit_price: 1000, cost_price: 600 });
    const quotation = await acceptedQuotation({
      discount_amount: 10000,
      lines: [{ product_id: product.id, quantity: 100 }],
    });

    const { invoice, created } = await quotationService.convertToInvoice(quotation.id, TEST_USER_ID);

    expect(created).toBe(true);
    expect(invoice.quotation_id).toBe(quotation.id);
    expect(invoice.status).toBe('draft');
    expect(invoice.lines).toHaveLength(2);
    expect(invoice.lines[0]).toMatchObject({
      catalog: { kind: 'product', product_id: product.id },
      quantity: 100,
      unit_price: 1000,
      line_total: 100000,
      cost: { unit_cost: 600 },
    });
    expect(invoice.lines[1]).toMatchObject({
      catalog: { kind: 'free_text' },
      description: 'Discount',
      quantity: 1,
      unit_price: -10000,
      tax_exempt: false,
    });
    expect(invoice.subtotal_amount).toBe(90000);
    expect(invoice.tax_amount).toBe(16200);
    expect(invoice.total_amount).toBe(106200);

    expect((await quotationService.getQuotation(quotation.id)).status).toBe('converted');
  });

  it('caps a discount larger than the subtotal on both documents', async () => {
    const quotation = await acceptedQuotation({
      discount_amount: 150000,
      lines: [{ item_name: 'Consulting', quantity: 1, unit_price: 100000 }],
    });
    expect((await quotationService.getQuotation(quotation.id)).total_amount).toBe(0);

    const { invoice } = await quotationService.convertToInvoice(quotation.id, null);

    expect(invoice.lines[1]).toMatchObject({ description: 'Discount', unit_price: -100000 });
    expect(invoice.subtotal_amount).toBe(0);
    expect(invoice.tax_amount).toBe(0);
    expect(invoice.total_amount).toBe(0);
  });

  it('uses a zero tax rate when the quotation had tax disabled', async () => {
    const quotation = await acceptedQuotation({
      tax_enabled: false,
      lines: [{ item_name: 'Consulting', quantity: 1, unit_price: 40000 }],
    });

    const { invoice } = await quotationService.convertToInvoice(quotation.id, null);
    expect(invoice.tax_rate).toBe(0);
    expect(invoice.total_amount).toBe(40000);
  });

  it('returns the same invoice when converted again', async () => {
    const quotation = await acceptedQuotation({ lines: [{ item_name: 'Consulting', quantity: 1, unit_price: 40000 }] });

    const first = await quotationService.convertToInvoice(quotation.id, null);
    const second = await quotationService.convertToInvoice(quotation.id, null);

    expect(second.created).toBe(false);
    expect(second.invoice.id).toBe(first.invoice.id);
  });

  it('creates one invoice under concurrent conversions', async () => {
    const quotation = await acceptedQuotation({ lines: [{ item_name: 'Consulting', quantity: 1, unit_price: 40000 }] });

    const results = await Promise.all([
      quotationService.convertToInvoice(quotation.id, null),
      quotationService.convertToInvoice(quotation.id, null),
    ]);

    expect(results.filter((r) => r.created)).toHaveLength(1);
    expect(results[0].invoice.id).toBe(results[1].invoice.id);
    const invoices = await getTestDb()('invoices').where({ quotation_id: quotation.id });
    expect(invoices).toHaveLength(1);
  });

  it('refuses quotations that were not accepted', async () => {
    const quotation = await createQuotation(customer.id);
    await expect(quotationService.convertToInvoice(quotation.id, null)).rejects.toMatchObject({
      rule: 'quotation_not_accepted',
    });
  });
});
