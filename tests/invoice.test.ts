/**
 * Invoice engine: totals, line editing, status derivation and the
 * issue / cancel / sign operations.
 */

import { describe, it, expect, beforeEach } from 'vitest';
import { cleanAllData } from './setup';
import {
  createCustomer,
  createInvoice,
  createProduct,
  createReferenceInvoice,
  createServiceItem,
  resetCounters,
  TEST_USER_ID,
} from './helpers/factory';
import { invoiceService } from '../server/services/invoice.service';
import { paymentService } from '../server/services/payment.service';
import { auditService } from '../server/services/audit.service';
import { productService } from '../server/services/product.service';
import { profitRecordService } from '../server/services/profit-record.service';
import { NotFoundError, ValidationError } from '../server/lib/errors';
import { todayIso } from '../server/lib/dates';

beforeEach(async () => {
  await cleanAllData();
  resetCounters();
});

describe('createInvoice', () => {
  it('prices the reference invoice', async () => {
    const { invoice, product } = await createReferenceInvoice();

    expect(invoice.number).toBe(`INV-${new Date().getFullYear()}-00001`);
    expect(invoice.status).toBe('draft');
    expect(invoice.subtotal_amount).toBe(250000);
    expect(invoice.tax_amount).toBe(45000);
    expect(invoice.total_amount).toBe(295000);
    expect(invoice.lines[0]).toMatchObject({
      catalog: { kind: 'product', product_id: product.id },
      unit_price: 50000,
      cost: { unit_cost: 30000 },
      position: 1,
    });
  });

  it('snapshots the service charge as the line cost', async () => {
    const customer = await createCustomer();
    const service = await createServiceItem({ unit_price: 500, service_charge: 200 });

    const invoice = await createInvoice(customer.id, { lines: [{ service_id: service.id, quantity: 2 }] });

    expect(invoice.lines[0].line_total).toBe(1000);
    expect(invoice.lines[0].cost.unit_cost).toBe(200);
  });

  it('exempts flagged lines from tax', async () => {
    const customer = await createCustomer();
    const invoice = await createInvoice(customer.id, {
      lines: [
        { description: 'Parts', quantity: 1, unit_price: 10000 },
        { description: 'Labour', quantity: 1, unit_price: 5000, tax_exempt: true },
      ],
    });

    expect(invoice.subtotal_amount).toBe(15000);
    expect(invoice.tax_amount).toBe(1800);
    expect(invoice.total_amount).toBe(16800);
  });

  it('rejects a line that references both a product and a service', async () => {
    const customer = await createCustomer();
    const product = await createProduct();
    const service = await createServiceItem();

    await expect(
      createInvoice(customer.id, { lines: [{ product_id: product.id, service_id: service.id, quantity: 1 }] }),
    ).rejects.toMatchObject({ field: 'product_id' });
  });

  it('rejects negative prices on catalog lines and free text without a price', async () => {
    const customer = await createCustomer();
    const product = await createProduct();

    await expect(
      createInvoice(customer.id, { lines: [{ product_id: product.id, quantity: 1, unit_price: -1 }] }),
    ).rejects.toMatchObject({ field: 'unit_price' });
    await expect(
      createInvoice(customer.id, { lines: [{ description: 'Mystery item', quantity: 1 }] }),
    ).rejects.toMatchObject({ field: 'unit_price' });
  });

  it('rejects an unknown customer or product', async () => {
    const customer = await createCustomer();
    await expect(createInvoice('00000000-0000-4000-8000-00000000ffff')).rejects.toBeInstanceOf(NotFoundError);
    await expect(
      createInvoice(customer.id, { lines: [{ product_id: '00000000-0000-4000-8000-00000000ffff', quantity: 1 }] }),
    ).rejects.toBeInstanceOf(NotFoundError);
  });
});

describe('invoice lines', () => {
  it('accepts a negative free-text discount line', async () => {
    const { invoice } = await createReferenceInvoice();

    const updated = await invoiceService.addLine(invoice.id, {
      description: 'Loyalty discount',
      quantity: 1,
      unit_price: -5000,
    });

    expect(updated.lines).toHaveLength(2);
    expect(updated.lines[1].position).toBe(2);
    expect(updated.subtotal_amount).toBe(245000);
    expect(updated.tax_amount).toBe(44100);
    expect(updated.total_amount).toBe(289100);
  });

  it('keeps the cost snapshot when the catalog cost changes later', async () => {
    const { invoice, product } = await createReferenceInvoice();

    const updated = await invoiceService.updateLine(invoice.id, invoice.lines[0].id, { quantity: 2 });

    expect(updated.lines[0].cost.unit_cost).toBe(30000);
    expect(updated.lines[0].catalog).toEqual({ kind: 'product', product_id: product.id });
    expect(updated.total_amount).toBe(118000);
  });

  it('refuses a zero quantity', async () => {
    const { invoice } = await createReferenceInvoice();
    await expect(invoiceService.updateLine(invoice.id, invoice.lines[0].id, { quantity: 0 })).rejects.toBeInstanceOf(
      ValidationError,
    );
  });

  it('locks lines once the invoice is paid', async () => {
    const { invoice } = await createReferenceInvoice();
    await paymentService.recordPayment({ invoice_id: invoice.id, amount: 295000, method: 'cash' });

    await expect(invoiceService.removeLine(invoice.id, invoice.lines[0].id)).rejects.toMatchObject({
      rule: 'invoice_locked',
    });
  });
});

describe('status derivation', () => {
  it('leaves an untouched draft in draft', async () => {
    const { invoice } = await createReferenceInvoice();
    const refreshed = await invoiceService.refreshStatusFromPayments(invoice.id);
    expect(refreshed.status).toBe('draft');
    expect(refreshed.issued_at).toBeNull();
  });

  it('moves to issued on a partial payment and to paid when settled', async () => {
    const { invoice } = await createReferenceInvoice();

    await paymentService.recordPayment({ invoice_id: invoice.id, amount: 100000, method: 'cash' });
    const partial = await invoiceService.getInvoiceWithDetails(invoice.id);
    expect(partial.status).toBe('issued');
    expect(partial.issued_at).toBe(todayIso());
    expect(partial.balance).toEqual({
      total: 295000,
      paid: 100000,
      refunded: 0,
      net_paid: 100000,
      balance: 195000,
      outstanding: 195000,
    });
    expect(partial.profit_record).toBeNull();

    await paymentService.recordPayment({ invoice_id: invoice.id, amount: 195000, method: 'bank' });
    const settled = await invoiceService.getInvoiceWithDetails(invoice.id);
    expect(settled.status).toBe('paid');
    expect(settled.payments).toHaveLength(2);
    expect(settled.balance.outstanding).toBe(0);
  });

  it('stays issued when a line is added after a partial payment', async () => {
    const { invoice } = await createReferenceInvoice();
    await invoiceService.issueInvoice(invoice.id, null);
    await paymentService.recordPayment({ invoice_id: invoice.id, amount: 100000, method: 'cash' });

    const grown = await invoiceService.addLine(invoice.id, { description: 'Delivery', quantity: 1, unit_price: 20000 });

    expect(grown.status).toBe('issued');
    expect(grown.total_amount).toBe(318600);
  });
});

describe('zero-total invoices', () => {
  async function fullyDiscountedInvoice() {
    const customer = await createCustomer();
    const product = await createProduct({ unit_price: 1000, cost_price: 600, stock_quantity: 10 });
    const invoice = await createInvoice(customer.id, {
      lines: [
        { product_id: product.id, quantity: 2 },
        { description: 'Discount', quantity: 1, unit_price: -2000 },
      ],
    });
    return { product, invoice };
  }

  it('stays in draft until issued', async () => {
    const { invoice } = await fullyDiscountedInvoice();
    expect(invoice.total_amount).toBe(0);

    const refreshed = await invoiceService.refreshStatusFromPayments(invoice.id);
    expect(refreshed.status).toBe('draft');
  });

  it('is settled on issue, deducting stock and recording profit', async () => {
    const { invoice, product } = await fullyDiscountedInvoice();

    const issued = await invoiceService.issueInvoice(invoice.id, TEST_USER_ID);

    expect(issued.status).toBe('paid');
    expect((await productService.getProduct(product.id)).stock_quantity).toBe(8);
    expect(await profitRecordService.getByInvoice(invoice.id)).toMatchObject({
      invoice_id: invoice.id,
      trigger_payment_id: null,
    });
  });
});

describe('issueInvoice', () => {
  it('issues a draft once', async () => {
    const { invoice } = await createReferenceInvoice();

    const issued = await invoiceService.issueInvoice(invoice.id, TEST_USER_ID);
    expect(issued.status).toBe('issued');
    expect(issued.issued_at).toBe(todayIso());

    await expect(invoiceService.issueInvoice(invoice.id, TEST_USER_ID)).rejects.toMatchObject({
      rule: 'invoice_not_draft',
    });
    const events = await auditService.listForEntity('invoice', invoice.id);
    expect(events.filter((e) => e.action === 'invoice_issued')).toHaveLength(1);
  });
});

describe('cancelInvoice', () => {
  it('cancels a draft without a reason', async () => {
    const { invoice } = await createReferenceInvoice();
    const cancelled = await invoiceService.cancelInvoice(invoice.id, '', TEST_USER_ID);
    expect(cancelled.status).toBe('cancelled');
    expect(cancelled.cancelled_by).toBe(TEST_USER_ID);
  });

  it('requires a reason once issued', async () => {
    const { invoice } = await createReferenceInvoice();
    await invoiceService.issueInvoice(invoice.id, null);

    await expect(invoiceService.cancelInvoice(invoice.id, '', null)).rejects.toMatchObject({ field: 'reason' });

    const cancelled = await invoiceService.cancelInvoice(invoice.id, 'Raised in error', null);
    expect(cancelled.cancel_reason).toBe('Raised in error');
  });

  it('refuses while net payments remain', async () => {
    const { invoice } = await createReferenceInvoice();
    await paymentService.recordPayment({ invoice_id: invoice.id, amount: 1000, method: 'cash' });

    await expect(invoiceService.cancelInvoice(invoice.id, 'Customer left', null)).rejects.toMatchObject({
      rule: 'invoice_has_payments',
    });
  });

  it('refuses paid and already cancelled invoices', async () => {
    const { invoice } = await createReferenceInvoice();
    await paymentService.recordPayment({ invoice_id: invoice.id, amount: 295000, method: 'cash' });
    await expect(invoiceService.cancelInvoice(invoice.id, 'Too late', null)).rejects.toMatchObject({
      rule: 'invoice_paid',
    });

    const { invoice: other } = await createReferenceInvoice();
    await invoiceService.cancelInvoice(other.id, '', null);
    await expect(invoiceService.cancelInvoice(other.id, '', null)).rejects.toMatchObject({
      rule: 'invoice_already_cancelled',
    });
  });

  it('keeps a cancelled invoice cancelled on refresh', async () => {
    const { invoice } = await createReferenceInvoice();
    await invoiceService.cancelInvoice(invoice.id, '', null);

    const refreshed = await invoiceService.refreshStatusFromPayments(invoice.id);
    expect(refreshed.status).toBe('cancelled');
  });
});

describe('signInvoice', () => {
  it('records the signer', async () => {
    const { invoice } = await createReferenceInvoice();
    const signed = await invoiceService.signInvoice(invoice.id, '  Jane Okello ', TEST_USER_ID);
    expect(signed.signed_by_name).toBe('Jane Okello');
    expect(signed.signed_at).not.toBeNull();
  });

  it('requires a name and refuses cancelled invoices', async () => {
    const { invoice } = await createReferenceInvoice();
    await expect(invoiceService.signInvoice(invoice.id, ' ', null)).rejects.toMatchObject({ field: 'signed_by_name' });

    await invoiceService.cancelInvoice(invoice.id, '', null);
    await expect(invoiceService.signInvoice(invoice.id, 'Jane Okello', null)).rejects.toMatchObject({
      rule: 'invoice_cancelled',
    });
  });
});
