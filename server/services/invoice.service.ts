// =============================================================
// File: server/services/invoice.service.ts
// Description: Invoice engine. Lines and totals, the balance
//              against payments and refunds, and the single
//              status re-derivation that every money movement
//              funnels through (refreshStatusFromPayments).
// =============================================================

import { randomUUID } from 'crypto';
import { Knex } from 'knex';
import { BaseService, ListOptions } from './base.service';
import { auditService } from './audit.service';
import { customerService } from './customer.service';
import { documentSequenceService } from './document-sequence.service';
import { profitRecordService } from './profit-record.service';
import { stockDeductionService } from './stock-deduction.service';
import { LineItemInput, assertValidQuantity, assertValidUnitPrice, resolveLineItem } from './line-items';
import {
  catalogRefColumns,
  mapInvoiceLineRow,
  mapInvoiceRow,
  mapPaymentRow,
  mapRefundRow,
} from './document-rows';
import type {
  Invoice,
  InvoiceBalance,
  InvoiceDetails,
  InvoiceStatus,
  InvoiceWithLines,
  LiveCatalogRef,
  PaginatedResponse,
  QuotationWithLines,
} from '../../shared/types';
import {
  AUDIT_ACTIONS,
  DOCUMENT_KINDS,
  INVOICE_EDITABLE_STATUSES,
  INVOICE_STATUS,
} from '../../shared/constants';
import { loadConfig } from '../config';
import { NotFoundError, PolicyViolationError, ValidationError } from '../lib/errors';
import { logger } from '../lib/logger';
import { lineTotal, round2, settleBalance, sumBy, toNumber } from '../lib/money';
import { todayIso } from '../lib/dates';
import { Row } from '../lib/rows';

// ────────────────────────────────────────────────────────────
// Interfaces
// ────────────────────────────────────────────────────────────

export interface InvoiceLineInput extends LineItemInput {
  /** Overrides the catalog cost snapshot; used when copying lines from a quotation. */
  unit_cost?: number;
}

export interface CreateInvoiceInput {
  customer_id: string;
  quotation_id?: string | null;
  branch_id?: string | null;
  currency?: string;
  tax_rate?: number;
  due_at?: string | null;
  notes?: string;
  prepared_by_name?: string;
  lines?: InvoiceLineInput[];
  created_by?: string | null;
}

export interface UpdateInvoiceInput {
  tax_rate?: number;
  due_at?: string | null;
  notes?: string;
  prepared_by_name?: string;
}

export interface UpdateInvoiceLineInput {
  description?: string;
  quantity?: number;
  unit_price?: number;
  tax_exempt?: boolean;
}

export interface RefreshStatusOptions {
  trx?: Knex.Transaction;
  triggerPaymentId?: string | null;
}

export interface ListInvoicesOptions extends ListOptions {
  customer_id?: string;
  branch_id?: string;
}

export interface InvoiceTotals {
  subtotal_amount: number;
  tax_amount: number;
  total_amount: number;
}

type SideEffect = 'stock_deduction' | 'profit_sync';

// ────────────────────────────────────────────────────────────
// Helpers
// ────────────────────────────────────────────────────────────

function assertTaxRate(rate: number): void {
  if (!Number.isFinite(rate) || rate < 0 || rate > 1) {
    throw new ValidationError('Tax rate must be a fraction between 0 and 1', 'tax_rate');
  }
}

function isEditable(status: InvoiceStatus): boolean {
  return INVOICE_EDITABLE_STATUSES.some((s) => s === status);
}

function assertEditable(invoice: Invoice): void {
  if (!isEditable(invoice.status)) {
    throw new PolicyViolationError(
      'invoice_locked',
      `Invoice ${invoice.number} is ${invoice.status}; its lines can no longer be changed`,
    );
  }
}

// ────────────────────────────────────────────────────────────
// Service
// ────────────────────────────────────────────────────────────

class InvoiceService extends BaseService {
  constructor() {
    super('invoices');
  }

  // ──────── CREATE ────────

  async createInvoice(input: CreateInvoiceInput, trx?: Knex.Transaction): Promise<InvoiceWithLines> {
    const config = loadConfig();
    const taxRate = input.tax_rate ?? config.defaultTaxRate;
    assertTaxRate(taxRate);

    return this.inTransaction(trx, async (tx) => {
      const customer = await customerService.getCustomer(input.customer_id, tx);
      const { number } = await documentSequenceService.nextNumberOrFallback(
        DOCUMENT_KINDS.INVOICE,
        new Date().getFullYear(),
        tx,
      );

      const id = randomUUID();
      const now = new Date().toISOString();
      await tx(this.tableName).insert({
        id,
        number,
        customer_id: customer.id,
        quotation_id: input.quotation_id ?? null,
        branch_id: input.branch_id ?? customer.branch_id,
        status: INVOICE_STATUS.DRAFT,
        currency: input.currency || config.defaultCurrency,
        tax_rate: taxRate,
        due_at: input.due_at || null,
        notes: input.notes ?? '',
        prepared_by_name: input.prepared_by_name ?? '',
        created_by: input.created_by ?? null,
        created_at: now,
        updated_at: now,
      });

      let position = 0;
      for (const line of input.lines ?? []) {
        await this.insertLine(id, line, ++position, tx);
      }
      await this.recalculateTotals(id, tx);

      return this.getInvoiceWithLines(id, tx);
    });
  }

  /**
   * Build the invoice for an accepted quotation. The caller holds the
   * quotation lock and marks it converted.
   */
  async createFromQuotation(
    quotation: QuotationWithLines,
    actorId: string | null,
    trx: Knex.Transaction,
  ): Promise<InvoiceWithLines> {
    const lines: InvoiceLineInput[] = quotation.lines.map((line) => ({
      ...catalogInput(line.catalog),
      item_name: line.item_name,
      description: line.description,
      quantity: line.quantity,
      unit_price: line.unit_price,
      tax_exempt: line.tax_exempt,
    }));

    const discount = Math.min(quotation.discount_amount, Math.max(0, sumBy(quotation.lines, (l) => l.line_total)));
    if (discount > 0) {
      lines.push({
        description: 'Discount',
        quantity: 1,
        unit_price: -discount,
        tax_exempt: false,
      });
    }

    return this.createInvoice(
      {
        customer_id: quotation.customer_id,
        quotation_id: quotation.id,
        branch_id: quotation.branch_id,
        currency: quotation.currency,
        tax_rate: quotation.tax_enabled ? quotation.tax_rate : 0,
        notes: quotation.notes,
        lines,
        created_by: actorId,
      },
      trx,
    );
  }

  // ──────── LINES ────────

  private async insertLine(
    invoiceId: string,
    input: InvoiceLineInput,
    position: number,
    tx: Knex.Transaction,
  ): Promise<string> {
    const resolved = await resolveLineItem(input, { allowNegativeFreeText: true }, tx);
    const id = randomUUID();
    await tx('invoice_lines').insert({
      id,
      invoice_id: invoiceId,
      ...catalogRefColumns(resolved.catalog),
      description: resolved.description || resolved.item_name,
      quantity: resolved.quantity,
      unit_price: resolved.unit_price,
      tax_exempt: resolved.tax_exempt,
      line_total: resolved.line_total,
      unit_cost: input.unit_cost ?? resolved.catalog_cost,
      position,
    });
    return id;
  }

  private async lockEditable(invoiceId: string, tx: Knex.Transaction): Promise<Invoice> {
    await this.applyLockTimeout(tx);
    const row = await this.lockRow(invoiceId, tx);
    if (!row) throw new NotFoundError('Invoice', invoiceId);
    const invoice = mapInvoiceRow(row);
    assertEditable(invoice);
    return invoice;
  }

  async addLine(invoiceId: string, input: InvoiceLineInput, trx?: Knex.Transaction): Promise<InvoiceWithLines> {
    return this.inTransaction(trx, async (tx) => {
      await this.lockEditable(invoiceId, tx);
      const last: Row | undefined = await tx('invoice_lines')
        .where({ invoice_id: invoiceId })
        .max({ position: 'position' })
        .first();
      await this.insertLine(invoiceId, input, toNumber(last?.position) + 1, tx);
      await this.recalculateTotals(invoiceId, tx);
      await this.refreshStatusFromPayments(invoiceId, { trx: tx });
      return this.getInvoiceWithLines(invoiceId, tx);
    });
  }

  async updateLine(
    invoiceId: string,
    lineId: string,
    patch: UpdateInvoiceLineInput,
    trx?: Knex.Transaction,
  ): Promise<InvoiceWithLines> {
    return this.inTransaction(trx, async (tx) => {
      await this.lockEditable(invoiceId, tx);
      const row: Row | undefined = await tx('invoice_lines').where({ id: lineId, invoice_id: invoiceId }).first();
      if (!row) throw new NotFoundError('Invoice line', lineId);
      const line = mapInvoiceLineRow(row);

      const quantity = patch.quantity ?? line.quantity;
      const unitPrice = patch.unit_price ?? line.unit_price;
      assertValidQuantity(quantity);
      assertValidUnitPrice(unitPrice, line.catalog.kind === 'free_text', { allowNegativeFreeText: true });

      await tx('invoice_lines')
        .where({ id: lineId })
        .update({
          description: patch.description?.trim() ?? line.description,
          quantity,
          unit_price: unitPrice,
          tax_exempt: patch.tax_exempt ?? line.tax_exempt,
          line_total: lineTotal(quantity, unitPrice),
        });

      await this.recalculateTotals(invoiceId, tx);
      await this.refreshStatusFromPayments(invoiceId, { trx: tx });
      return this.getInvoiceWithLines(invoiceId, tx);
    });
  }

  async removeLine(invoiceId: string, lineId: string, trx?: Knex.Transaction): Promise<InvoiceWithLines> {
    return this.inTransaction(trx, async (tx) => {
      await this.lockEditable(invoiceId, tx);
      const deleted = await tx('invoice_lines').where({ id: lineId, invoice_id: invoiceId }).delete();
      if (!deleted) throw new NotFoundError('Invoice line', lineId);
      await this.recalculateTotals(invoiceId, tx);
      await this.refreshStatusFromPayments(invoiceId, { trx: tx });
      return this.getInvoiceWithLines(invoiceId, tx);
    });
  }

  // ──────── UPDATE ────────

  async updateInvoice(invoiceId: string, patch: UpdateInvoiceInput, trx?: Knex.Transaction): Promise<InvoiceWithLines> {
    if (patch.tax_rate !== undefined) assertTaxRate(patch.tax_rate);

    return this.inTransaction(trx, async (tx) => {
      await this.lockEditable(invoiceId, tx);

      const updates: Record<string, unknown> = {};
      if (patch.tax_rate !== undefined) updates.tax_rate = patch.tax_rate;
      if (patch.due_at !== undefined) updates.due_at = patch.due_at || null;
      if (patch.notes !== undefined) updates.notes = patch.notes;
      if (patch.prepared_by_name !== undefined) updates.prepared_by_name = patch.prepared_by_name.trim();

      if (Object.keys(updates).length > 0) {
        updates.updated_at = new Date().toISOString();
        await tx(this.tableName).where({ id: invoiceId }).update(updates);
      }
      if (patch.tax_rate !== undefined) {
        await this.recalculateTotals(invoiceId, tx);
        await this.refreshStatusFromPayments(invoiceId, { trx: tx });
      }
      return this.getInvoiceWithLines(invoiceId, tx);
    });
  }

  // ──────── TOTALS & BALANCE ────────

  /** Tax applies to the non-exempt lines only; a negative taxable base is taxed as zero. */
  async recalculateTotals(invoiceId: string, trx?: Knex.Transaction): Promise<InvoiceTotals> {
    const db = this.conn(trx);
    const invoice: Row | undefined = await db(this.tableName).where({ id: invoiceId }).first();
    if (!invoice) throw new NotFoundError('Invoice', invoiceId);

    const lineRows: Row[] = await db('invoice_lines').where({ invoice_id: invoiceId });
    const lines = lineRows.map(mapInvoiceLineRow);

    const subtotal = sumBy(lines, (l) => l.line_total);
    const taxable = sumBy(lines.filter((l) => !l.tax_exempt), (l) => l.line_total);
    const tax = round2(Math.max(0, taxable) * toNumber(invoice.tax_rate));
    const totals: InvoiceTotals = {
      subtotal_amount: subtotal,
      tax_amount: tax,
      total_amount: round2(subtotal + tax),
    };

    await db(this.tableName)
      .where({ id: invoiceId })
      .update({ ...totals, updated_at: new Date().toISOString() });

    return totals;
  }

  async computeBalance(invoiceId: string, trx?: Knex.Transaction): Promise<InvoiceBalance> {
    const db = this.conn(trx);
    const invoice: Row | undefined = await db(this.tableName).where({ id: invoiceId }).first();
    if (!invoice) throw new NotFoundError('Invoice', invoiceId);

    const paidRow: Row | undefined = await db('payments').where({ invoice_id: invoiceId }).sum({ amount: 'amount' }).first();
    const refundedRow: Row | undefined = await db('payment_refunds')
      .where({ invoice_id: invoiceId })
      .sum({ amount: 'amount' })
      .first();

    const total = toNumber(invoice.total_amount);
    const paid = round2(toNumber(paidRow?.amount));
    const refunded = round2(toNumber(refundedRow?.amount));
    const netPaid = round2(paid - refunded);
    const balance = settleBalance(total - netPaid);

    return {
      total,
      paid,
      refunded,
      net_paid: netPaid,
      balance,
      outstanding: Math.max(0, balance),
    };
  }

  // ──────── STATUS ────────

  /**
   * Re-derive the invoice status from its payments and refunds, then bring
   * stock and the profit ledger in line with it. Side effects run in their
   * own savepoints; a failure there is logged and never undoes the money
   * movement that triggered the refresh.
   */
  async refreshStatusFromPayments(invoiceId: string, options: RefreshStatusOptions = {}): Promise<Invoice> {
    return this.inTransaction(options.trx, async (tx) => {
      await this.applyLockTimeout(tx);
      const row = await this.lockRow(invoiceId, tx);
      if (!row) throw new NotFoundError('Invoice', invoiceId);
      const invoice = mapInvoiceRow(row);

      if (invoice.status === INVOICE_STATUS.CANCELLED) return invoice;

      const balance = await this.computeBalance(invoiceId, tx);
      const paymentCount = await this.countRows('payments', invoiceId, tx);
      const refundCount = await this.countRows('payment_refunds', invoiceId, tx);

      const wasIssued = invoice.status === INVOICE_STATUS.ISSUED
        || invoice.status === INVOICE_STATUS.PAID
        || invoice.issued_at !== null;
      const settledWithoutPayment = wasIssued && (await this.countRows('invoice_lines', invoiceId, tx)) > 0;

      let next: InvoiceStatus;
      if (balance.balance <= 0 && (paymentCount > 0 || settledWithoutPayment)) {
        next = INVOICE_STATUS.PAID;
      } else if (balance.net_paid > 0) {
        next = INVOICE_STATUS.ISSUED;
      } else if (wasIssued || paymentCount > 0 || refundCount > 0) {
        next = INVOICE_STATUS.ISSUED;
      } else {
        next = INVOICE_STATUS.DRAFT;
      }

      const updates: Record<string, unknown> = {};
      if (next !== invoice.status) updates.status = next;
      if (next !== INVOICE_STATUS.DRAFT && !invoice.issued_at) updates.issued_at = todayIso();

      if (Object.keys(updates).length > 0) {
        updates.updated_at = new Date().toISOString();
        await tx(this.tableName).where({ id: invoiceId }).update(updates);
        logger.debug({ invoiceId, from: invoice.status, to: next }, 'Invoice status re-derived');
      }

      await this.runSideEffect(invoice, 'stock_deduction', tx, (inner) =>
        stockDeductionService.deductStockIfNeeded(invoiceId, inner),
      );
      await this.runSideEffect(invoice, 'profit_sync', tx, (inner) =>
        profitRecordService.syncProfitRecord(invoiceId, { trx: inner, triggerPaymentId: options.triggerPaymentId }),
      );

      return this.getInvoice(invoiceId, tx);
    });
  }

  private async runSideEffect(
    invoice: Invoice,
    sideEffect: SideEffect,
    tx: Knex.Transaction,
    effect: (inner: Knex.Transaction) => Promise<unknown>,
  ): Promise<void> {
    try {
      await tx.transaction(async (inner) => {
        await effect(inner);
      });
    } catch (err) {
      logger.error(
        { err, event: 'invoice.side_effect_failed', invoiceId: invoice.id, invoiceNumber: invoice.number, sideEffect },
        'Invoice side effect failed',
      );
    }
  }

  private async countRows(table: 'payments' | 'payment_refunds' | 'invoice_lines', invoiceId: string, tx: Knex.Transaction): Promise<number> {
    const result: Row | undefined = await tx(table).where({ invoice_id: invoiceId }).count({ total: '*' }).first();
    return toNumber(result?.total);
  }

  async issueInvoice(invoiceId: string, actorId: string | null, trx?: Knex.Transaction): Promise<Invoice> {
    return this.inTransaction(trx, async (tx) => {
      await this.applyLockTimeout(tx);
      const row = await this.lockRow(invoiceId, tx);
      if (!row) throw new NotFoundError('Invoice', invoiceId);
      const invoice = mapInvoiceRow(row);

      if (invoice.status !== INVOICE_STATUS.DRAFT) {
        throw new PolicyViolationError('invoice_not_draft', `Invoice ${invoice.number} is already ${invoice.status}`);
      }

      await tx(this.tableName)
        .where({ id: invoiceId })
        .update({
          status: INVOICE_STATUS.ISSUED,
          issued_at: invoice.issued_at ?? todayIso(),
          updated_at: new Date().toISOString(),
        });

      await auditService.log(
        {
          action: AUDIT_ACTIONS.INVOICE_ISSUED,
          actorId,
          entityType: 'invoice',
          entityId: invoiceId,
          summary: `Invoice ${invoice.number} issued`,
        },
        tx,
      );

      // A fully discounted invoice is settled the moment it is issued.
      return this.refreshStatusFromPayments(invoiceId, { trx: tx });
    });
  }

  async cancelInvoice(
    invoiceId: string,
    reason: string,
    actorId: string | null,
    trx?: Knex.Transaction,
  ): Promise<Invoice> {
    return this.inTransaction(trx, async (tx) => {
      await this.applyLockTimeout(tx);
      const row = await this.lockRow(invoiceId, tx);
      if (!row) throw new NotFoundError('Invoice', invoiceId);
      const invoice = mapInvoiceRow(row);

      if (invoice.status === INVOICE_STATUS.CANCELLED) {
        throw new PolicyViolationError('invoice_already_cancelled', `Invoice ${invoice.number} is already cancelled`);
      }
      if (invoice.status === INVOICE_STATUS.PAID) {
        throw new PolicyViolationError('invoice_paid', `Invoice ${invoice.number} is paid and cannot be cancelled`);
      }

      const balance = await this.computeBalance(invoiceId, tx);
      if (balance.net_paid !== 0) {
        throw new PolicyViolationError(
          'invoice_has_payments',
          `Invoice ${invoice.number} has ${balance.net_paid} in net payments; refund them before cancelling`,
        );
      }

      const trimmed = reason.trim();
      if (!trimmed && invoice.status !== INVOICE_STATUS.DRAFT) {
        throw new ValidationError('A reason is required to cancel an issued invoice', 'reason');
      }

      const now = new Date().toISOString();
      await tx(this.tableName)
        .where({ id: invoiceId })
        .update({
          status: INVOICE_STATUS.CANCELLED,
          cancelled_at: now,
          cancelled_by: actorId,
          cancel_reason: trimmed,
          updated_at: now,
        });

      await auditService.log(
        {
          action: AUDIT_ACTIONS.INVOICE_CANCELLED,
          actorId,
          entityType: 'invoice',
          entityId: invoiceId,
          summary: `Invoice ${invoice.number} cancelled`,
          meta: { reason: trimmed, previous_status: invoice.status },
        },
        tx,
      );

      return this.getInvoice(invoiceId, tx);
    });
  }

  async signInvoice(
    invoiceId: string,
    signedByName: string,
    actorId: string | null,
    trx?: Knex.Transaction,
  ): Promise<Invoice> {
    const name = signedByName.trim();
    if (!name) throw new ValidationError('Signer name is required', 'signed_by_name');

    return this.inTransaction(trx, async (tx) => {
      const row = await this.lockRow(invoiceId, tx);
      if (!row) throw new NotFoundError('Invoice', invoiceId);
      const invoice = mapInvoiceRow(row);
      if (invoice.status === INVOICE_STATUS.CANCELLED) {
        throw new PolicyViolationError('invoice_cancelled', `Invoice ${invoice.number} is cancelled`);
      }

      const now = new Date().toISOString();
      await tx(this.tableName)
        .where({ id: invoiceId })
        .update({ signed_by_name: name, signed_at: now, updated_at: now });

      await auditService.log(
        {
          action: AUDIT_ACTIONS.INVOICE_SIGNED,
          actorId,
          entityType: 'invoice',
          entityId: invoiceId,
          summary: `Invoice ${invoice.number} signed by ${name}`,
        },
        tx,
      );

      return this.getInvoice(invoiceId, tx);
    });
  }

  // ──────── READ ────────

  async getInvoice(invoiceId: string, trx?: Knex.Transaction): Promise<Invoice> {
    const row = await this.findRow(invoiceId, trx);
    if (!row) throw new NotFoundError('Invoice', invoiceId);
    return mapInvoiceRow(row);
  }

  async findByQuotation(quotationId: string, trx?: Knex.Transaction): Promise<Invoice | null> {
    const row: Row | undefined = await this.conn(trx)(this.tableName).where({ quotation_id: quotationId }).first();
    return row ? mapInvoiceRow(row) : null;
  }

  async getInvoiceWithLines(invoiceId: string, trx?: Knex.Transaction): Promise<InvoiceWithLines> {
    const invoice = await this.getInvoice(invoiceId, trx);
    const lineRows: Row[] = await this.conn(trx)('invoice_lines')
      .where({ invoice_id: invoiceId })
      .orderBy('position', 'asc')
      .orderBy('id', 'asc');
    return { ...invoice, lines: lineRows.map(mapInvoiceLineRow) };
  }

  async getInvoiceWithDetails(invoiceId: string, trx?: Knex.Transaction): Promise<InvoiceDetails> {
    const db = this.conn(trx);
    const invoice = await this.getInvoiceWithLines(invoiceId, trx);

    const paymentRows: Row[] = await db('payments')
      .where({ invoice_id: invoiceId })
      .orderBy('paid_at', 'asc')
      .orderBy('created_at', 'asc');
    const refundRows: Row[] = await db('payment_refunds')
      .where({ invoice_id: invoiceId })
      .orderBy('refunded_at', 'asc')
      .orderBy('created_at', 'asc');

    return {
      ...invoice,
      payments: paymentRows.map(mapPaymentRow),
      refunds: refundRows.map(mapRefundRow),
      balance: await this.computeBalance(invoiceId, trx),
      profit_record: await profitRecordService.getByInvoice(invoiceId, trx),
    };
  }

  async listInvoices(options: ListInvoicesOptions): Promise<PaginatedResponse<Invoice>> {
    return this.paginate(
      {
        ...options,
        searchFields: ['number'],
        filters: { customer_id: options.customer_id, branch_id: options.branch_id },
      },
      mapInvoiceRow,
    );
  }

  async listActiveInvoiceIds(): Promise<string[]> {
    const rows: Row[] = await this.db(this.tableName)
      .whereNot({ status: INVOICE_STATUS.CANCELLED })
      .orderBy('created_at', 'asc')
      .select('id');
    return rows.map((r) => String(r.id));
  }
}

function catalogInput(ref: LiveCatalogRef): Pick<LineItemInput, 'product_id' | 'service_id'> {
  switch (ref.kind) {
    case 'product':
      return { product_id: ref.product_id };
    case 'service':
      return { service_id: ref.service_id };
    case 'free_text':
      return {};
  }
}

export const invoiceService = new InvoiceService();
