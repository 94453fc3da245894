// =============================================================
// File: server/services/profit-record.service.ts
// Description: Keeps exactly one profit record per PAID
//              invoice, split into product and service sales,
//              cost and profit. Also serves the profit reports.
// =============================================================

import { randomUUID } from 'crypto';
import { Knex } from 'knex';
import { BaseService, ListOptions } from './base.service';
import { productService } from './product.service';
import { serviceCatalogService } from './service-catalog.service';
import { mapInvoiceLineRow, mapProfitRecordRow, parseInvoiceStatus } from './document-rows';
import type { InvoiceLine, PaginatedResponse, ProfitRecord, ProfitSummary } from '../../shared/types';
import { INVOICE_STATUS } from '../../shared/constants';
import { NotFoundError } from '../lib/errors';
import { lineTotal, round2, toNumber } from '../lib/money';
import { Row, str, strOrNull } from '../lib/rows';

// ────────────────────────────────────────────────────────────
// Interfaces
// ────────────────────────────────────────────────────────────

export interface SyncProfitOptions {
  trx?: Knex.Transaction;
  triggerPaymentId?: string | null;
}

export interface ProfitPeriod {
  from?: string;
  to?: string;
  branchId?: string;
}

interface ProfitTotals {
  product_sales_total: number;
  product_cost_total: number;
  product_profit_total: number;
  service_sales_total: number;
  service_cost_total: number;
  service_profit_total: number;
}

// ────────────────────────────────────────────────────────────
// Helpers
// ────────────────────────────────────────────────────────────

function dayAfter(date: string): string {
  const next = new Date(`${date}T00:00:00.000Z`);
  next.setUTCDate(next.getUTCDate() + 1);
  return next.toISOString().slice(0, 10);
}

function applyPeriod(query: Knex.QueryBuilder, period: ProfitPeriod): void {
  if (period.from) query.where('paid_at', '>=', period.from);
  if (period.to) query.where('paid_at', '<', dayAfter(period.to));
  if (period.branchId) query.where('branch_id', period.branchId);
}

// ────────────────────────────────────────────────────────────
// Service
// ────────────────────────────────────────────────────────────

class ProfitRecordService extends BaseService {
  constructor() {
    super('profit_records');
  }

  /**
   * Sales and cost per line. Free-text lines (including discount lines) and
   * non-positive quantities carry no profit.
   */
  async computeTotals(lines: InvoiceLine[], trx?: Knex.Transaction): Promise<ProfitTotals> {
    let productSales = 0;
    let productCost = 0;
    let serviceSales = 0;
    let serviceCost = 0;

    for (const line of lines) {
      if (line.quantity <= 0) continue;
      const sales = lineTotal(line.quantity, line.unit_price);

      if (line.catalog.kind === 'product') {
        let unitCost = line.cost.unit_cost;
        if (unitCost === 0) {
          const product = await productService.findProduct(line.catalog.product_id, trx);
          unitCost = product?.cost_price ?? 0;
        }
        productSales += sales;
        productCost += round2(line.quantity * unitCost);
      } else if (line.catalog.kind === 'service') {
        const service = await serviceCatalogService.findServiceItem(line.catalog.service_id, trx);
        serviceSales += sales;
        serviceCost += round2(line.quantity * (service?.service_charge ?? 0));
      }
    }

    return {
      product_sales_total: round2(productSales),
      product_cost_total: round2(productCost),
      product_profit_total: round2(productSales - productCost),
      service_sales_total: round2(serviceSales),
      service_cost_total: round2(serviceCost),
      service_profit_total: round2(serviceSales - serviceCost),
    };
  }

  /**
   * Upsert the record when the invoice is PAID, delete it otherwise.
   * Returns the record now stored, or null.
   */
  async syncProfitRecord(invoiceId: string, options: SyncProfitOptions = {}): Promise<ProfitRecord | null> {
    return this.inTransaction(options.trx, async (tx) => {
      const invoice: Row | undefined = await tx('invoices').where({ id: invoiceId }).first();
      if (!invoice) throw new NotFoundError('Invoice', invoiceId);

      if (parseInvoiceStatus(invoice.status) !== INVOICE_STATUS.PAID) {
        await tx(this.tableName).where({ invoice_id: invoiceId }).delete();
        return null;
      }

      const lineRows: Row[] = await tx('invoice_lines').where({ invoice_id: invoiceId }).orderBy('position', 'asc');
      const totals = await this.computeTotals(lineRows.map(mapInvoiceLineRow), tx);

      const latestPayment: Row | undefined = await tx('payments')
        .where({ invoice_id: invoiceId })
        .orderBy('paid_at', 'desc')
        .orderBy('created_at', 'desc')
        .first();

      const values = {
        ...totals,
        branch_id: strOrNull(invoice.branch_id),
        currency: str(invoice.currency),
        recorded_at: new Date().toISOString(),
        paid_at: latestPayment ? latestPayment.paid_at : null,
        trigger_payment_id: options.triggerPaymentId ?? strOrNull(latestPayment?.id),
      };

      const existing: Row | undefined = await tx(this.tableName).where({ invoice_id: invoiceId }).first();
      if (existing) {
        await tx(this.tableName).where({ invoice_id: invoiceId }).update(values);
      } else {
        await tx(this.tableName).insert({ id: randomUUID(), invoice_id: invoiceId, ...values });
      }

      const stored: Row | undefined = await tx(this.tableName).where({ invoice_id: invoiceId }).first();
      return stored ? mapProfitRecordRow(stored) : null;
    });
  }

  // ──────── REPORTING ────────

  async getByInvoice(invoiceId: string, trx?: Knex.Transaction): Promise<ProfitRecord | null> {
    const row: Row | undefined = await this.conn(trx)(this.tableName).where({ invoice_id: invoiceId }).first();
    return row ? mapProfitRecordRow(row) : null;
  }

  async listProfitRecords(options: ListOptions & ProfitPeriod): Promise<PaginatedResponse<ProfitRecord>> {
    return this.paginate(
      { ...options, sortBy: 'paid_at', search: undefined },
      mapProfitRecordRow,
      (query) => applyPeriod(query, options),
    );
  }

  async summarize(period: ProfitPeriod = {}): Promise<ProfitSummary> {
    const query = this.db(this.tableName);
    applyPeriod(query, period);

    const row: Row | undefined = await query
      .count({ invoice_count: '*' })
      .sum({
        product_sales_total: 'product_sales_total',
        product_cost_total: 'product_cost_total',
        product_profit_total: 'product_profit_total',
        service_sales_total: 'service_sales_total',
        service_cost_total: 'service_cost_total',
        service_profit_total: 'service_profit_total',
      })
      .first();

    const productProfit = round2(toNumber(row?.product_profit_total));
    const serviceProfit = round2(toNumber(row?.service_profit_total));

    return {
      invoice_count: toNumber(row?.invoice_count),
      product_sales_total: round2(toNumber(row?.product_sales_total)),
      product_cost_total: round2(toNumber(row?.product_cost_total)),
      product_profit_total: productProfit,
      service_sales_total: round2(toNumber(row?.service_sales_total)),
      service_cost_total: round2(toNumber(row?.service_cost_total)),
      service_profit_total: serviceProfit,
      profit_total: round2(productProfit + serviceProfit),
    };
  }
}

export const profitRecordService = new ProfitRecordService();
