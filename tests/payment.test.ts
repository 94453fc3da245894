/**
 * Payment ledger: validation, receipt numbers, the paid transition and
 * the side effects it triggers.
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { cleanAllData, getTestDb } from './setup';
import { createCustomer, createInvoice, createReferenceInvoice, resetCounters, TEST_USER_ID } from './helpers/factory';
import { buildReceiptNumber, paymentService } from '../server/services/payment.service';
import { invoiceService } from '../server/services/invoice.service';
import { productService } from '../server/services/product.service';
import { profitRecordService } from '../server/services/profit-record.service';
import { stockDeductionService } from '../server/services/stock-deduction.service';
import { PolicyViolationError, ValidationError } from '../server/lib/errors';

beforeEach(async () => {
  await cleanAllData();
  resetCounters();
});

afterEach(() => {
  vi.restoreAllMocks();
});

describe('buildReceiptNumber', () => {
  it('combines the local payment date with the first 12 hex digits of the id', () => {
    const paidAt = new Date(2025, 5, 15, 10, 30);
    expect(buildReceiptNumber('3f2a9c1e-77b4-4d2e-9a10-5c6d7e8f9a0b', paidAt)).toBe('RCPT-20250615-3F2A9C1E77B4');
  });
});

describe('recordPayment validation', () => {
  it('rejects zero, negative and fractional amounts', async () => {
    const { invoice } = await createReferenceInvoice();

    await expect(paymentService.recordPayment({ invoice_id: invoice.id, amount: 0, method: 'cash' })).rejects.toBeInstanceOf(
      ValidationError,
    );
    await expect(
      paymentService.recordPayment({ invoice_id: invoice.id, amount: -100, method: 'cash' }),
    ).rejects.toBeInstanceOf(ValidationError);
    await expect(
      paymentService.recordPayment({ invoice_id: invoice.id, amount: 100.5, method: 'cash' }),
    ).rejects.toMatchObject({ field: 'amount' });
  });

  it('requires a description for the "other" method', async () => {
    const { invoice } = await createReferenceInvoice();

    await expect(
      paymentService.recordPayment({ invoice_id: invoice.id, amount: 1000, method: 'other', method_other: '  ' }),
    ).rejects.toMatchObject({ field: 'method_other' });

    const payment = await paymentService.recordPayment({
      invoice_id: invoice.id,
      amount: 1000,
      method: 'other',
      method_other: ' Cheque ',
    });
    expect(payment.method_other).toBe('Cheque');
    expect(payment.method_label).toBe('Cheque');
  });

  it('drops the description for named methods', async () => {
    const { invoice } = await createReferenceInvoice();
    const payment = await paymentService.recordPayment({
      invoice_id: invoice.id,
      amount: 1000,
      method: 'mobile_money',
      method_other: 'ignored',
    });
    expect(payment.method_other).toBe('');
    expect(payment.method_label).toBe('Mobile Money');
  });

  it('refuses more than the outstanding balance', async () => {
    const { invoice } = await createReferenceInvoice();
    await expect(
      paymentService.recordPayment({ invoice_id: invoice.id, amount: 295001, method: 'cash' }),
    ).rejects.toMatchObject({ field: 'amount' });
  });

  it('refuses payments on cancelled invoices', async () => {
    const { invoice } = await createReferenceInvoice();
    await invoiceService.cancelInvoice(invoice.id, '', null);

    await expect(
      paymentService.recordPayment({ invoice_id: invoice.id, amount: 1000, method: 'cash' }),
    ).rejects.toBeInstanceOf(PolicyViolationError);
  });

  it('rejects an unparseable payment date', async () => {
    const { invoice } = await createReferenceInvoice();
    await expect(
      paymentService.recordPayment({ invoice_id: invoice.id, amount: 1000, method: 'cash', paid_at: 'yesterday' }),
    ).rejects.toMatchObject({ field: 'paid_at' });
  });

  it('rejects a payment dated in the future', async () => {
    const { invoice } = await createReferenceInvoice();
    const nextWeek = new Date(Date.now() + 7 * 24 * 60 * 60 * 1000).toISOString();

    await expect(
      paymentService.recordPayment({ invoice_id: invoice.id, amount: 1000, method: 'cash', paid_at: nextWeek }),
    ).rejects.toMatchObject({ field: 'paid_at', message: 'paid_at cannot be in the future' });
    expect((await invoiceService.getInvoiceWithDetails(invoice.id)).payments).toHaveLength(0);
  });
});

describe('recordPayment', () => {
  it('assigns a receipt number derived from the payment', async () => {
    const { invoice } = await createReferenceInvoice();

    const payment = await paymentService.recordPayment({
      invoice_id: invoice.id,
      amount: 1000,
      method: 'cash',
      recorded_by: TEST_USER_ID,
    });

    expect(payment.receipt_number).toMatch(/^RCPT-\d{8}-[0-9A-F]{12}$/);
    expect(payment.receipt_number).toBe(buildReceiptNumber(payment.id, new Date(payment.paid_at)));
    expect(payment.recorded_by).toBe(TEST_USER_ID);
  });

  it('settles the reference invoice, deducts stock once and records profit', async () => {
    const { invoice, product } = await createReferenceInvoice();

    const payment = await paymentService.recordPayment({ invoice_id: invoice.id, amount: 295000, method: 'bank' });

    const paid = await invoiceService.getInvoice(invoice.id);
    expect(paid.status).toBe('paid');
    expect(paid.stock_deducted_at).not.toBeNull();

    expect((await productService.getProduct(product.id)).stock_quantity).toBe(5);
    const movements = await productService.listMovements(product.id);
    expect(movements).toHaveLength(1);
    expect(movements[0]).toMatchObject({
      movement_type: 'out',
      quantity: 5,
      reference: invoice.number,
      source_type: 'invoice',
      source_id: invoice.id,
    });

    const record = await profitRecordService.getByInvoice(invoice.id);
    expect(record).toMatchObject({
      product_sales_total: 250000,
      product_cost_total: 150000,
      product_profit_total: 100000,
      service_sales_total: 0,
      service_cost_total: 0,
      service_profit_total: 0,
      trigger_payment_id: payment.id,
      paid_at: payment.paid_at,
    });

    await invoiceService.refreshStatusFromPayments(invoice.id);
    expect((await productService.getProduct(product.id)).stock_quantity).toBe(5);
  });

  it('lets a fractional outstanding be settled with the next whole unit', async () => {
    const customer = await createCustomer();
    const invoice = await createInvoice(customer.id, {
      tax_rate: 0,
      lines: [{ description: 'Photocopies', quantity: 1, unit_price: 10.4 }],
    });

    await paymentService.recordPayment({ invoice_id: invoice.id, amount: 11, method: 'cash' });

    const details = await invoiceService.getInvoiceWithDetails(invoice.id);
    expect(details.status).toBe('paid');
    expect(details.balance.balance).toBe(-0.6);
    expect(details.balance.outstanding).toBe(0);
  });

  it('treats a shortfall within the rounding band as paid', async () => {
    const customer = await createCustomer();
    const invoice = await createInvoice(customer.id, {
      tax_rate: 0,
      lines: [{ description: 'Binding', quantity: 1, unit_price: 100.04 }],
    });

    await paymentService.recordPayment({ invoice_id: invoice.id, amount: 100, method: 'cash' });

    expect((await invoiceService.getInvoice(invoice.id)).status).toBe('paid');
  });

  it('keeps the payment when a side effect fails', async () => {
    const { invoice, product } = await createReferenceInvoice();
    vi.spyOn(stockDeductionService, 'deductStockIfNeeded').mockRejectedValueOnce(new Error('stock ledger offline'));

    const payment = await paymentService.recordPayment({ invoice_id: invoice.id, amount: 295000, method: 'cash' });

    expect((await paymentService.getPayment(payment.id)).amount).toBe(295000);
    expect((await invoiceService.getInvoice(invoice.id)).status).toBe('paid');
    expect((await productService.getProduct(product.id)).stock_quantity).toBe(10);
    expect(await profitRecordService.getByInvoice(invoice.id)).not.toBeNull();
  });

  it('accepts only one of two competing payments for the full balance', async () => {
    const { invoice } = await createReferenceInvoice();

    const results = await Promise.allSettled([
      paymentService.recordPayment({ invoice_id: invoice.id, amount: 200000, method: 'cash' }),
      paymentService.recordPayment({ invoice_id: invoice.id, amount: 200000, method: 'bank' }),
    ]);

    expect(results.filter((r) => r.status === 'fulfilled')).toHaveLength(1);
    const rows = await getTestDb()('payments').where({ invoice_id: invoice.id });
    expect(rows).toHaveLength(1);
  });
});
