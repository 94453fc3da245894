// =============================================================
// File: server/services/stock-deduction.service.ts
// Description: Deducts inventory for a paid invoice, exactly
//              once. Outbound movements tagged with the invoice
//              are the source of truth; stock_deducted_at is a
//              marker that gets repaired in either direction.
// =============================================================

import { Knex } from 'knex';
import { BaseService } from './base.service';
import { productService } from './product.service';
import { mapInvoiceLineRow, parseInvoiceStatus } from './document-rows';
import { INVOICE_STATUS, STOCK_MOVEMENT_TYPES } from '../../shared/constants';
import { NotFoundError } from '../lib/errors';
import { toNumber } from '../lib/money';
import { Row, str } from '../lib/rows';

export const INVOICE_SOURCE_TYPE = 'invoice';

export type StockDeductionOutcome = 'deducted' | 'not_paid' | 'already_deducted' | 'nothing_to_deduct';

export interface StockDeductionResult {
  invoice_id: string;
  outcome: StockDeductionOutcome;
  lines_deducted: number;
}

class StockDeductionService extends BaseService {
  constructor() {
    super('invoices');
  }

  async hasInvoiceMovements(invoiceId: string, trx?: Knex.Transaction): Promise<boolean> {
    const result: Row | undefined = await this.conn(trx)('stock_movements')
      .where({
        source_type: INVOICE_SOURCE_TYPE,
        source_id: invoiceId,
        movement_type: STOCK_MOVEMENT_TYPES.OUT,
      })
      .count({ total: '*' })
      .first();
    return toNumber(result?.total) > 0;
  }

  async deductStockIfNeeded(invoiceId: string, trx?: Knex.Transaction): Promise<StockDeductionResult> {
    return this.inTransaction(trx, async (tx) => {
      await this.applyLockTimeout(tx);
      const invoice = await this.lockRow(invoiceId, tx);
      if (!invoice) throw new NotFoundError('Invoice', invoiceId);

      if (parseInvoiceStatus(invoice.status) !== INVOICE_STATUS.PAID) {
        return { invoice_id: invoiceId, outcome: 'not_paid', lines_deducted: 0 };
      }

      if (await this.hasInvoiceMovements(invoiceId, tx)) {
        if (!invoice.stock_deducted_at) {
          await tx(this.tableName).where({ id: invoiceId }).update({ stock_deducted_at: new Date().toISOString() });
        }
        return { invoice_id: invoiceId, outcome: 'already_deducted', lines_deducted: 0 };
      }

      const invoiceNumber = str(invoice.number);
      const lineRows: Row[] = await tx('invoice_lines')
        .where({ invoice_id: invoiceId })
        .orderBy('position', 'asc')
        .orderBy('id', 'asc');

      let linesDeducted = 0;
      for (const line of lineRows.map(mapInvoiceLineRow)) {
        if (line.catalog.kind !== 'product' || line.quantity <= 0) continue;
        const product = await productService.findProduct(line.catalog.product_id, tx);
        if (!product || !product.track_stock) continue;

        await productService.adjustStock(
          product.id,
          -line.quantity,
          {
            reference: invoiceNumber,
            sourceType: INVOICE_SOURCE_TYPE,
            sourceId: invoiceId,
            notes: `Sold on invoice ${invoiceNumber}`,
          },
          tx,
        );
        linesDeducted++;
      }

      if (linesDeducted === 0) {
        return { invoice_id: invoiceId, outcome: 'nothing_to_deduct', lines_deducted: 0 };
      }

      await tx(this.tableName).where({ id: invoiceId }).update({ stock_deducted_at: new Date().toISOString() });
      return { invoice_id: invoiceId, outcome: 'deducted', lines_deducted: linesDeducted };
    });
  }
}

export const stockDeductionService = new StockDeductionService();
