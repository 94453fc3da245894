// =============================================================
// File: server/services/quotation.service.ts
// Description: Quotation engine. Header+lines editing with
//              stored totals, the status lifecycle (including
//              automatic expiry) and conversion to an invoice.
// =============================================================

import { randomUUID } from 'crypto';
import { Knex } from 'knex';
import { BaseService, ListOptions } from './base.service';
import { auditService } from './audit.service';
import { customerService } from './customer.service';
import { documentSequenceService } from './document-sequence.service';
import { invoiceService } from './invoice.service';
import { LineItemInput, assertValidQuantity, assertValidUnitPrice, resolveLineItem } from './line-items';
import { catalogRefColumns, mapQuotationLineRow, mapQuotationRow } from './document-rows';
import type {
  InvoiceWithLines,
  PaginatedResponse,
  Quotation,
  QuotationStatus,
  QuotationWithLines,
} from '../../shared/types';
import {
  AUDIT_ACTIONS,
  DOCUMENT_KINDS,
  QUOTATION_LOCKED_STATUSES,
  QUOTATION_STATUS,
} from '../../shared/constants';
import { loadConfig } from '../config';
import { NotFoundError, PolicyViolationError, ValidationError } from '../lib/errors';
import { logger } from '../lib/logger';
import { lineTotal, round2, sumBy, toNumber } from '../lib/money';
import { addDays, formatLocalDate, todayIso } from '../lib/dates';
import { Row } from '../lib/rows';

// ────────────────────────────────────────────────────────────
// Interfaces
// ────────────────────────────────────────────────────────────

export interface CreateQuotationInput {
  customer_id: string;
  branch_id?: string | null;
  currency?: string;
  tax_enabled?: boolean;
  tax_rate?: number;
  discount_amount?: number;
  /** Omitted: valid for the default period. Null: never expires. */
  valid_until?: string | null;
  notes?: string;
  lines?: LineItemInput[];
  created_by?: string | null;
}

export interface UpdateQuotationInput {
  discount_amount?: number;
  tax_enabled?: boolean;
  tax_rate?: number;
  valid_until?: string | null;
  notes?: string;
}

export interface UpdateQuotationLineInput {
  item_name?: string;
  description?: string;
  quantity?: number;
  unit_price?: number;
  tax_exempt?: boolean;
}

export interface ListQuotationsOptions extends ListOptions {
  customer_id?: string;
  branch_id?: string;
}

export interface QuotationTotals {
  subtotal_amount: number;
  tax_amount: number;
  total_amount: number;
}

export interface ConversionResult {
  invoice: InvoiceWithLines;
  /** False when the quotation had already been converted. */
  created: boolean;
}

// ────────────────────────────────────────────────────────────
// Helpers
// ────────────────────────────────────────────────────────────

export const DEFAULT_VALIDITY_DAYS = 14;

const ALLOWED_TRANSITIONS: Record<QuotationStatus, readonly QuotationStatus[]> = {
  draft: ['sent', 'cancelled'],
  sent: ['accepted', 'rejected', 'cancelled'],
  accepted: ['cancelled'],
  rejected: ['cancelled'],
  converted: [],
  expired: [],
  cancelled: [],
};

function isLocked(status: QuotationStatus): boolean {
  return QUOTATION_LOCKED_STATUSES.some((s) => s === status);
}

function assertEditable(quotation: Quotation): void {
  if (isLocked(quotation.status)) {
    throw new PolicyViolationError(
      'quotation_locked',
      `Quotation ${quotation.number} is ${quotation.status} and can no longer be edited`,
    );
  }
}

function assertTaxRate(rate: number): void {
  if (!Number.isFinite(rate) || rate < 0 || rate > 1) {
    throw new ValidationError('Tax rate must be a fraction between 0 and 1', 'tax_rate');
  }
}

function assertDiscount(discount: number): void {
  if (!Number.isFinite(discount) || discount < 0) {
    throw new ValidationError('Discount cannot be negative', 'discount_amount');
  }
}

function assertValidityDate(validUntil: string | null | undefined, today: string): void {
  if (!validUntil) return;
  if (!/^\d{4}-\d{2}-\d{2}$/.test(validUntil)) {
    throw new ValidationError('valid_until must be a YYYY-MM-DD date', 'valid_until');
  }
  if (validUntil < today) {
    throw new ValidationError('valid_until cannot be in the past', 'valid_until');
  }
}

function isUniqueViolation(error: unknown): boolean {
  if (typeof error !== 'object' || error === null) return false;
  const code: unknown = Reflect.get(error, 'code');
  return code === '23505' || code === 'SQLITE_CONSTRAINT_UNIQUE';
}

function isOverdue(quotation: Quotation, today: string): boolean {
  return (
    (quotation.status === QUOTATION_STATUS.DRAFT || quotation.status === QUOTATION_STATUS.SENT)
    && quotation.valid_until !== null
    && today > quotation.valid_until
  );
}

// ────────────────────────────────────────────────────────────
// Service
// ────────────────────────────────────────────────────────────

class QuotationService extends BaseService {
  constructor() {
    super('quotations');
  }

  // ──────── CREATE ────────

  async createQuotation(input: CreateQuotationInput, trx?: Knex.Transaction): Promise<QuotationWithLines> {
    const config = loadConfig();
    const today = todayIso();
    const taxRate = input.tax_rate ?? config.defaultTaxRate;
    const discount = input.discount_amount ?? 0;
    assertTaxRate(taxRate);
    assertDiscount(discount);

    const validUntil = input.valid_until === undefined
      ? formatLocalDate(addDays(new Date(), DEFAULT_VALIDITY_DAYS))
      : input.valid_until;
    assertValidityDate(validUntil, today);

    return this.inTransaction(trx, async (tx) => {
      const customer = await customerService.getCustomer(input.customer_id, tx);
      const { number } = await documentSequenceService.nextNumberOrFallback(
        DOCUMENT_KINDS.QUOTATION,
        new Date().getFullYear(),
        tx,
      );

      const id = randomUUID();
      const now = new Date().toISOString();
      await tx(this.tableName).insert({
        id,
        number,
        customer_id: customer.id,
        branch_id: input.branch_id ?? customer.branch_id,
        status: QUOTATION_STATUS.DRAFT,
        currency: input.currency || config.defaultCurrency,
        tax_enabled: input.tax_enabled ?? true,
        tax_rate: taxRate,
        discount_amount: discount,
        valid_until: validUntil,
        notes: input.notes ?? '',
        created_by: input.created_by ?? null,
        created_at: now,
        updated_at: now,
      });

      let position = 0;
      for (const line of input.lines ?? []) {
        await this.insertLine(id, line, ++position, tx);
      }
      await this.recalculateAmounts(id, tx);

      return this.getQuotationWithDetails(id, tx);
    });
  }

  // ──────── UPDATE ────────

  async updateQuotation(id: string, patch: UpdateQuotationInput, trx?: Knex.Transaction): Promise<QuotationWithLines> {
    if (patch.discount_amount !== undefined) assertDiscount(patch.discount_amount);
    if (patch.tax_rate !== undefined) assertTaxRate(patch.tax_rate);
    assertValidityDate(patch.valid_until, todayIso());

    return this.inTransaction(trx, async (tx) => {
      await this.lockEditable(id, tx);

      const updates: Record<string, unknown> = { updated_at: new Date().toISOString() };
      if (patch.discount_amount !== undefined) updates.discount_amount = patch.discount_amount;
      if (patch.tax_enabled !== undefined) updates.tax_enabled = patch.tax_enabled;
      if (patch.tax_rate !== undefined) updates.tax_rate = patch.tax_rate;
      if (patch.valid_until !== undefined) updates.valid_until = patch.valid_until;
      if (patch.notes !== undefined) updates.notes = patch.notes;

      await tx(this.tableName).where({ id }).update(updates);
      await this.recalculateAmounts(id, tx);
      return this.getQuotationWithDetails(id, tx);
    });
  }

  // ──────── LINES ────────

  private async insertLine(quotationId: string, input: LineItemInput, position: number, tx: Knex.Transaction): Promise<string> {
    const resolved = await resolveLineItem(input, { allowNegativeFreeText: false }, tx);
    const id = randomUUID();
    await tx('quotation_lines').insert({
      id,
      quotation_id: quotationId,
      ...catalogRefColumns(resolved.catalog),
      item_name: resolved.item_name,
      description: resolved.description,
      quantity: resolved.quantity,
      unit_price: resolved.unit_price,
      tax_exempt: resolved.tax_exempt,
      line_total: resolved.line_total,
      position,
    });
    return id;
  }

  private async lockEditable(id: string, tx: Knex.Transaction): Promise<Quotation> {
    await this.applyLockTimeout(tx);
    const row = await this.lockRow(id, tx);
    if (!row) throw new NotFoundError('Quotation', id);
    const quotation = mapQuotationRow(row);
    assertEditable(quotation);
    return quotation;
  }

  async addLine(quotationId: string, input: LineItemInput, trx?: Knex.Transaction): Promise<QuotationWithLines> {
    return this.inTransaction(trx, async (tx) => {
      await this.lockEditable(quotationId, tx);
      const last: Row | undefined = await tx('quotation_lines')
        .where({ quotation_id: quotationId })
        .max({ position: 'position' })
        .first();
      await this.insertLine(quotationId, input, toNumber(last?.position) + 1, tx);
      await this.recalculateAmounts(quotationId, tx);
      return this.getQuotationWithDetails(quotationId, tx);
    });
  }

  async updateLine(
    quotationId: string,
    lineId: string,
    patch: UpdateQuotationLineInput,
    trx?: Knex.Transaction,
  ): Promise<QuotationWithLines> {
    return this.inTransaction(trx, async (tx) => {
      await this.lockEditable(quotationId, tx);
      const row: Row | undefined = await tx('quotation_lines').where({ id: lineId, quotation_id: quotationId }).first();
      if (!row) throw new NotFoundError('Quotation line', lineId);
      const line = mapQuotationLineRow(row);

      const quantity = patch.quantity ?? line.quantity;
      const unitPrice = patch.unit_price ?? line.unit_price;
      assertValidQuantity(quantity);
      assertValidUnitPrice(unitPrice, line.catalog.kind === 'free_text', { allowNegativeFreeText: false });

      await tx('quotation_lines')
        .where({ id: lineId })
        .update({
          item_name: patch.item_name?.trim() ?? line.item_name,
          description: patch.description?.trim() ?? line.description,
          quantity,
          unit_price: unitPrice,
          tax_exempt: patch.tax_exempt ?? line.tax_exempt,
          line_total: lineTotal(quantity, unitPrice),
        });

      await this.recalculateAmounts(quotationId, tx);
      return this.getQuotationWithDetails(quotationId, tx);
    });
  }

  async removeLine(quotationId: string, lineId: string, trx?: Knex.Transaction): Promise<QuotationWithLines> {
    return this.inTransaction(trx, async (tx) => {
      await this.lockEditable(quotationId, tx);
      const deleted = await tx('quotation_lines').where({ id: lineId, quotation_id: quotationId }).delete();
      if (!deleted) throw new NotFoundError('Quotation line', lineId);
      await this.recalculateAmounts(quotationId, tx);
      return this.getQuotationWithDetails(quotationId, tx);
    });
  }

  // ──────── TOTALS ────────

  /**
   * The discount, capped at the subtotal, comes off the whole subtotal and
   * off the taxable part; neither base goes below zero.
   */
  async recalculateAmounts(id: string, trx?: Knex.Transaction): Promise<QuotationTotals> {
    const db = this.conn(trx);
    const row: Row | undefined = await db(this.tableName).where({ id }).first();
    if (!row) throw new NotFoundError('Quotation', id);
    const quotation = mapQuotationRow(row);

    const lineRows: Row[] = await db('quotation_lines').where({ quotation_id: id });
    const lines = lineRows.map(mapQuotationLineRow);

    const subtotal = sumBy(lines, (l) => l.line_total);
    const taxableSubtotal = sumBy(lines.filter((l) => !l.tax_exempt), (l) => l.line_total);
    const discount = Math.min(Math.max(0, quotation.discount_amount), Math.max(0, subtotal));
    const preTax = Math.max(0, round2(subtotal - discount));
    const taxableBase = Math.max(0, round2(taxableSubtotal - discount));
    const tax = quotation.tax_enabled ? round2(taxableBase * quotation.tax_rate) : 0;

    const totals: QuotationTotals = {
      subtotal_amount: subtotal,
      tax_amount: tax,
      total_amount: round2(preTax + tax),
    };

    await db(this.tableName).where({ id }).update(totals);
    return totals;
  }

  // ──────── STATUS ────────

  private async expireIfOverdue(quotation: Quotation, today: string, tx: Knex.Transaction): Promise<Quotation> {
    if (!isOverdue(quotation, today)) return quotation;

    await tx(this.tableName)
      .where({ id: quotation.id })
      .update({ status: QUOTATION_STATUS.EXPIRED, updated_at: new Date().toISOString() });
    await auditService.log(
      {
        action: AUDIT_ACTIONS.QUOTATION_STATUS_CHANGED,
        entityType: 'quotation',
        entityId: quotation.id,
        summary: `Quotation ${quotation.number} expired`,
        meta: { from: quotation.status, to: QUOTATION_STATUS.EXPIRED, valid_until: quotation.valid_until },
      },
      tx,
    );
    return { ...quotation, status: QUOTATION_STATUS.EXPIRED };
  }

  /** Draft and sent quotations past their validity date become expired. */
  async refreshExpiry(id: string, today: string = todayIso(), trx?: Knex.Transaction): Promise<Quotation> {
    return this.inTransaction(trx, async (tx) => {
      const row = await this.lockRow(id, tx);
      if (!row) throw new NotFoundError('Quotation', id);
      return this.expireIfOverdue(mapQuotationRow(row), today, tx);
    });
  }

  async expireOverdueQuotations(today: string = todayIso()): Promise<number> {
    const rows: Row[] = await this.db(this.tableName)
      .whereIn('status', [QUOTATION_STATUS.DRAFT, QUOTATION_STATUS.SENT])
      .whereNotNull('valid_until')
      .where('valid_until', '<', today)
      .select('id');

    let expired = 0;
    for (const row of rows) {
      const quotation = await this.refreshExpiry(String(row.id), today);
      if (quotation.status === QUOTATION_STATUS.EXPIRED) expired++;
    }
    if (expired > 0) logger.info({ expired, today }, 'Expired overdue quotations');
    return expired;
  }

  async updateStatus(
    id: string,
    status: QuotationStatus,
    actorId: string | null,
    reason = '',
    trx?: Knex.Transaction,
  ): Promise<Quotation> {
    if (status === QUOTATION_STATUS.CONVERTED) {
      throw new PolicyViolationError('use_conversion', 'Quotations become converted only by converting them to an invoice');
    }
    if (status === QUOTATION_STATUS.EXPIRED) {
      throw new PolicyViolationError('expiry_is_automatic', 'Quotations expire automatically after their validity date');
    }
    if (status === QUOTATION_STATUS.CANCELLED) {
      return this.cancelQuotation(id, reason, actorId, trx);
    }

    await this.refreshExpiry(id, todayIso(), trx);
    return this.inTransaction(trx, async (tx) => {
      await this.applyLockTimeout(tx);
      const row = await this.lockRow(id, tx);
      if (!row) throw new NotFoundError('Quotation', id);
      const quotation = mapQuotationRow(row);

      if (quotation.status === status) return quotation;
      if (!ALLOWED_TRANSITIONS[quotation.status].includes(status)) {
        throw new PolicyViolationError(
          'invalid_transition',
          `Quotation ${quotation.number} cannot move from ${quotation.status} to ${status}`,
        );
      }

      await tx(this.tableName).where({ id }).update({ status, updated_at: new Date().toISOString() });
      await auditService.log(
        {
          action: AUDIT_ACTIONS.QUOTATION_STATUS_CHANGED,
          actorId,
          entityType: 'quotation',
          entityId: id,
          summary: `Quotation ${quotation.number} marked ${status}`,
          meta: { from: quotation.status, to: status },
        },
        tx,
      );
      return this.getQuotation(id, tx);
    });
  }

  async cancelQuotation(id: string, reason: string, actorId: string | null, trx?: Knex.Transaction): Promise<Quotation> {
    await this.refreshExpiry(id, todayIso(), trx);
    return this.inTransaction(trx, async (tx) => {
      await this.applyLockTimeout(tx);
      const row = await this.lockRow(id, tx);
      if (!row) throw new NotFoundError('Quotation', id);
      const quotation = mapQuotationRow(row);

      if (!ALLOWED_TRANSITIONS[quotation.status].includes(QUOTATION_STATUS.CANCELLED)) {
        throw new PolicyViolationError(
          'invalid_transition',
          `Quotation ${quotation.number} is ${quotation.status} and cannot be cancelled`,
        );
      }

      const trimmed = reason.trim();
      if (!trimmed && quotation.status !== QUOTATION_STATUS.DRAFT) {
        throw new ValidationError('A reason is required to cancel a quotation that was sent', 'reason');
      }

      const now = new Date().toISOString();
      await tx(this.tableName)
        .where({ id })
        .update({
          status: QUOTATION_STATUS.CANCELLED,
          cancelled_at: now,
          cancelled_by: actorId,
          cancel_reason: trimmed,
          updated_at: now,
        });
      await auditService.log(
        {
          action: AUDIT_ACTIONS.QUOTATION_STATUS_CHANGED,
          actorId,
          entityType: 'quotation',
          entityId: id,
          summary: `Quotation ${quotation.number} cancelled`,
          meta: { from: quotation.status, to: QUOTATION_STATUS.CANCELLED, reason: trimmed },
        },
        tx,
      );
      return this.getQuotation(id, tx);
    });
  }

  // ──────── CONVERSION ────────

  /**
   * Turn an accepted quotation into an invoice. Converting again returns the
   * invoice created the first time.
   */
  async convertToInvoice(id: string, actorId: string | null): Promise<ConversionResult> {
    // Expiry is committed on its own so a refused conversion still records it.
    await this.refreshExpiry(id);
    try {
      return await this.db.transaction(async (tx) => {
        await this.applyLockTimeout(tx);
        const row = await this.lockRow(id, tx);
        if (!row) throw new NotFoundError('Quotation', id);
        const quotation = mapQuotationRow(row);

        const existing = await invoiceService.findByQuotation(id, tx);
        if (existing) {
          return { invoice: await invoiceService.getInvoiceWithLines(existing.id, tx), created: false };
        }

        if (quotation.status !== QUOTATION_STATUS.ACCEPTED) {
          throw new PolicyViolationError(
            'quotation_not_accepted',
            `Quotation ${quotation.number} is ${quotation.status}; only accepted quotations can be converted`,
          );
        }

        const withLines = await this.getQuotationWithDetails(id, tx);
        const invoice = await invoiceService.createFromQuotation(withLines, actorId, tx);

        await tx(this.tableName)
          .where({ id })
          .update({ status: QUOTATION_STATUS.CONVERTED, updated_at: new Date().toISOString() });
        await auditService.log(
          {
            action: AUDIT_ACTIONS.QUOTATION_CONVERTED,
            actorId,
            entityType: 'quotation',
            entityId: id,
            summary: `Quotation ${quotation.number} converted to invoice ${invoice.number}`,
            meta: { invoice_id: invoice.id, invoice_number: invoice.number },
          },
          tx,
        );

        return { invoice, created: true };
      });
    } catch (error) {
      if (!isUniqueViolation(error)) throw error;
      const existing = await invoiceService.findByQuotation(id);
      if (!existing) throw error;
      return { invoice: await invoiceService.getInvoiceWithLines(existing.id), created: false };
    }
  }

  // ──────── READ ────────

  async getQuotation(id: string, trx?: Knex.Transaction): Promise<Quotation> {
    const row = await this.findRow(id, trx);
    if (!row) throw new NotFoundError('Quotation', id);
    return mapQuotationRow(row);
  }

  async getQuotationWithDetails(id: string, trx?: Knex.Transaction): Promise<QuotationWithLines> {
    const quotation = await this.getQuotation(id, trx);
    const lineRows: Row[] = await this.conn(trx)('quotation_lines')
      .where({ quotation_id: id })
      .orderBy('position', 'asc')
      .orderBy('id', 'asc');
    return { ...quotation, lines: lineRows.map(mapQuotationLineRow) };
  }

  async listQuotations(options: ListQuotationsOptions): Promise<PaginatedResponse<Quotation>> {
    return this.paginate(
      {
        ...options,
        searchFields: ['number'],
        filters: { customer_id: options.customer_id, branch_id: options.branch_id },
      },
      mapQuotationRow,
    );
  }
}

export const quotationService = new QuotationService();
