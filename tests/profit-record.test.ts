/**
 * Profit records: product and service margins per paid invoice, and the
 * period summary.
 */

import { describe, it, expect, beforeEach } from 'vitest';
import { cleanAllData, getTestDb } from './setup';
import {
  createCustomer,
  createInvoice,
  createProduct,
  createReferenceInvoice,
  createServiceItem,
  resetCounters,
} from './helpers/factory';
import { profitRecordService } from '../server/services/profit-record.service';
import { paymentService } from '../server/services/payment.service';

beforeEach(async () => {
  await cleanAllData();
  resetCounters();
});

describe('syncProfitRecord', () => {
  it('returns null and stores nothing for an unpaid invoice', async () => {
    const { invoice } = await createReferenceInvoice();
    expect(await profitRecordService.syncProfitRecord(invoice.id)).toBeNull();
    expect(await profitRecordService.getByInvoice(invoice.id)).toBeNull();
  });

  it('splits product and service margins and ignores free-text lines', async () => {
    const customer = await createCustomer();
    const product = await createProduct({ unit_price: 1000, cost_price: 600 });
    const service = await createServiceItem({ unit_price: 500, service_charge: 200 });
    const invoice = await createInvoice(customer.id, {
      lines: [
        { product_id: product.id, quantity: 10 },
        { service_id: service.id, quantity: 4 },
        { description: 'Discount', quantity: 1, unit_price: -1000 },
      ],
    });
    expect(invoice.total_amount).toBe(12980);

    await paymentService.recordPayment({ invoice_id: invoice.id, amount: 12980, method: 'cash' });

    expect(await profitRecordService.getByInvoice(invoice.id)).toMatchObject({
      product_sales_total: 10000,
      product_cost_total: 6000,
      product_profit_total: 4000,
      service_sales_total: 2000,
      service_cost_total: 800,
      service_profit_total: 1200,
      currency: 'UGX',
    });
  });

  it('reads the current service charge at sync time', async () => {
    const customer = await createCustomer();
    const service = await createServiceItem({ unit_price: 500, service_charge: 200 });
    const invoice = await createInvoice(customer.id, { tax_rate: 0, lines: [{ service_id: service.id, quantity: 2 }] });
    await getTestDb()('service_items').where({ id: service.id }).update({ service_charge: 300 });

    await paymentService.recordPayment({ invoice_id: invoice.id, amount: 1000, method: 'cash' });

    expect(await profitRecordService.getByInvoice(invoice.id)).toMatchObject({
      service_cost_total: 600,
      service_profit_total: 400,
    });
  });

  it('falls back to the catalog cost when the line snapshot is zero', async () => {
    const customer = await createCustomer();
    const product = await createProduct({ unit_price: 1000, cost_price: 0 });
    const invoice = await createInvoice(customer.id, { tax_rate: 0, lines: [{ product_id: product.id, quantity: 3 }] });
    await getTestDb()('products').where({ id: product.id }).update({ cost_price: 400 });

    await paymentService.recordPayment({ invoice_id: invoice.id, amount: 3000, method: 'cash' });

    expect(await profitRecordService.getByInvoice(invoice.id)).toMatchObject({
      product_cost_total: 1200,
      product_profit_total: 1800,
    });
  });

  it('keeps one record per invoice across repeated syncs', async () => {
    const { invoice } = await createReferenceInvoice();
    await paymentService.recordPayment({ invoice_id: invoice.id, amount: 295000, method: 'cash' });

    await profitRecordService.syncProfitRecord(invoice.id);
    await profitRecordService.syncProfitRecord(invoice.id);

    const rows = await getTestDb()('profit_records').where({ invoice_id: invoice.id });
    expect(rows).toHaveLength(1);
  });
});

describe('summarize', () => {
  async function paidInvoiceOn(paidAt: string) {
    const { invoice } = await createReferenceInvoice();
    await paymentService.recordPayment({ invoice_id: invoice.id, amount: 295000, method: 'cash', paid_at: paidAt });
    return invoice;
  }

  it('totals every record without a period', async () => {
    await paidInvoiceOn('2025-01-10T12:00:00.000Z');
    await paidInvoiceOn('2025-02-10T12:00:00.000Z');

    expect(await profitRecordService.summarize()).toEqual({
      invoice_count: 2,
      product_sales_total: 500000,
      product_cost_total: 300000,
      product_profit_total: 200000,
      service_sales_total: 0,
      service_cost_total: 0,
      service_profit_total: 0,
      profit_total: 200000,
    });
  });

  it('includes the whole last day of the period', async () => {
    await paidInvoiceOn('2025-01-10T12:00:00.000Z');
    await paidInvoiceOn('2025-02-10T12:00:00.000Z');

    const february = await profitRecordService.summarize({ from: '2025-02-01', to: '2025-02-10' });
    expect(february.invoice_count).toBe(1);
    expect(february.profit_total).toBe(100000);

    const listed = await profitRecordService.listProfitRecords({ from: '2025-01-01', to: '2025-01-31' });
    expect(listed.total).toBe(1);
    expect(listed.data[0].paid_at).toBe('2025-01-10T12:00:00.000Z');
  });
});
