/**
 * Stock deduction for paid invoices: once per invoice, repairable, and
 * limited to stock-tracked products.
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
import { stockDeductionService } from '../server/services/stock-deduction.service';
import { paymentService } from '../server/services/payment.service';
import { invoiceService } from '../server/services/invoice.service';
import { productService } from '../server/services/product.service';

beforeEach(async () => {
  await cleanAllData();
  resetCounters();
});

describe('deductStockIfNeeded', () => {
  it('does nothing before the invoice is paid', async () => {
    const { invoice, product } = await createReferenceInvoice();

    const result = await stockDeductionService.deductStockIfNeeded(invoice.id);

    expect(result).toEqual({ invoice_id: invoice.id, outcome: 'not_paid', lines_deducted: 0 });
    expect((await productService.getProduct(product.id)).stock_quantity).toBe(10);
  });

  it('reports an earlier deduction instead of repeating it', async () => {
    const { invoice, product } = await createReferenceInvoice();
    await paymentService.recordPayment({ invoice_id: invoice.id, amount: 295000, method: 'cash' });

    const result = await stockDeductionService.deductStockIfNeeded(invoice.id);

    expect(result.outcome).toBe('already_deducted');
    expect((await productService.getProduct(product.id)).stock_quantity).toBe(5);
  });

  it('restores a missing marker from the recorded movements', async () => {
    const { invoice, product } = await createReferenceInvoice();
    await paymentService.recordPayment({ invoice_id: invoice.id, amount: 295000, method: 'cash' });
    await getTestDb()('invoices').where({ id: invoice.id }).update({ stock_deducted_at: null });

    const result = await stockDeductionService.deductStockIfNeeded(invoice.id);

    expect(result.outcome).toBe('already_deducted');
    expect((await invoiceService.getInvoice(invoice.id)).stock_deducted_at).not.toBeNull();
    expect((await productService.getProduct(product.id)).stock_quantity).toBe(5);
  });

  it('deducts when movements are missing even though the marker is set', async () => {
    const { invoice, product } = await createReferenceInvoice();
    await paymentService.recordPayment({ invoice_id: invoice.id, amount: 295000, method: 'cash' });
    await getTestDb()('stock_movements').where({ source_id: invoice.id }).delete();

    const result = await stockDeductionService.deductStockIfNeeded(invoice.id);

    expect(result).toEqual({ invoice_id: invoice.id, outcome: 'deducted', lines_deducted: 1 });
    expect((await productService.getProduct(product.id)).stock_quantity).toBe(0);
  });

  it('skips untracked products, services and free-text lines', async () => {
    const customer = await createCustomer();
    const untracked = await createProduct({ unit_price: 1000, track_stock: false, stock_quantity: 3 });
    const service = await createServiceItem({ unit_price: 500 });
    const invoice = await createInvoice(customer.id, {
      tax_rate: 0,
      lines: [
        { product_id: untracked.id, quantity: 2 },
        { service_id: service.id, quantity: 1 },
        { description: 'Call-out fee', quantity: 1, unit_price: 500 },
      ],
    });
    await paymentService.recordPayment({ invoice_id: invoice.id, amount: 3000, method: 'cash' });

    const result = await stockDeductionService.deductStockIfNeeded(invoice.id);

    expect(result.outcome).toBe('nothing_to_deduct');
    expect((await productService.getProduct(untracked.id)).stock_quantity).toBe(3);
    expect((await invoiceService.getInvoice(invoice.id)).stock_deducted_at).toBeNull();
  });

  it('lets stock go negative rather than block the sale', async () => {
    const customer = await createCustomer();
    const product = await createProduct({ unit_price: 1000, stock_quantity: 2 });
    const invoice = await createInvoice(customer.id, { tax_rate: 0, lines: [{ product_id: product.id, quantity: 5 }] });

    await paymentService.recordPayment({ invoice_id: invoice.id, amount: 5000, method: 'cash' });

    expect((await productService.getProduct(product.id)).stock_quantity).toBe(-3);
  });
});

describe('adjustStock', () => {
  it('records manual adjustments as movements', async () => {
    const product = await createProduct({ stock_quantity: 4 });

    const result = await productService.adjustStock(product.id, 6, { reference: 'Delivery note 17', sourceType: 'manual' });

    expect(result.stock_quantity).toBe(10);
    expect(result.movement).toMatchObject({ movement_type: 'in', quantity: 6, reference: 'Delivery note 17' });
    await expect(productService.adjustStock(product.id, 0)).rejects.toMatchObject({ field: 'delta' });
  });
});
