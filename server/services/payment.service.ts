// =============================================================
// File: server/services/payment.service.ts
// Description: Payment ledger. Records whole-unit payments
//              against an invoice under an invoice row lock,
//              assigns the receipt number once, and re-derives
//              the invoice status with the payment as trigger.
// =============================================================

import { randomUUID } from 'crypto';
import { Knex } from 'knex';
import { BaseService } from './base.service';
import { auditService } from './audit.service';
import { invoiceService } from './invoice.service';
import { mapInvoiceRow, mapPaymentRow } from './document-rows';
import type { Payment, PaymentMethod } from '../../shared/types';
import { AUDIT_ACTIONS, INVOICE_STATUS, PAYMENT_METHODS } from '../../shared/constants';
import { NotFoundError, PolicyViolationError, ValidationError } from '../lib/errors';
import { isWholeUnit } from '../lib/money';
import { compactDate } from '../lib/dates';
import { Row } from '../lib/rows';

export interface RecordPaymentInput {
  invoice_id: string;
  amount: number;
  method: PaymentMethod;
  method_other?: string;
  reference?: string;
  /** Defaults to now. */
  paid_at?: string;
  notes?: string;
  recorded_by?: string | null;
}

/** RCPT-YYYYMMDD-<first 12 hex digits of the payment id>. */
export function buildReceiptNumber(paymentId: string, paidAt: Date): string {
  const hex = paymentId.replace(/-/g, '').slice(0, 12).toUpperCase();
  return `RCPT-${compactDate(paidAt)}-${hex}`;
}

function parsePaidAt(value: string | undefined): Date {
  if (!value) return new Date();
  const parsed = new Date(value);
  if (Number.isNaN(parsed.getTime())) throw new ValidationError('paid_at must be a valid date', 'paid_at');
  if (parsed.getTime() > Date.now()) throw new ValidationError('paid_at cannot be in the future', 'paid_at');
  return parsed;
}

class PaymentService extends BaseService {
  constructor() {
    super('payments');
  }

  async recordPayment(input: RecordPaymentInput, trx?: Knex.Transaction): Promise<Payment> {
    if (!Number.isFinite(input.amount) || input.amount <= 0) {
      throw new ValidationError('Payment amount must be greater than zero', 'amount');
    }
    if (!isWholeUnit(input.amount)) {
      throw new ValidationError('Payment amount must be in whole currency units', 'amount');
    }

    const methodOther = input.method === PAYMENT_METHODS.OTHER ? (input.method_other ?? '').trim() : '';
    if (input.method === PAYMENT_METHODS.OTHER && !methodOther) {
      throw new ValidationError('Describe the payment method when choosing "other"', 'method_other');
    }
    const paidAt = parsePaidAt(input.paid_at);

    return this.inTransaction(trx, async (tx) => {
      await this.applyLockTimeout(tx);
      const invoiceRow: Row | undefined = await tx('invoices').where({ id: input.invoice_id }).forUpdate().first();
      if (!invoiceRow) throw new NotFoundError('Invoice', input.invoice_id);
      const invoice = mapInvoiceRow(invoiceRow);

      if (invoice.status === INVOICE_STATUS.CANCELLED) {
        throw new PolicyViolationError('invoice_cancelled', `Invoice ${invoice.number} is cancelled`);
      }

      const balance = await invoiceService.computeBalance(invoice.id, tx);
      // A fractional outstanding (e.g. 10.40) can be settled with the next whole unit.
      const payable = Math.ceil(balance.outstanding);
      if (input.amount > payable) {
        throw new ValidationError(
          `Payment of ${input.amount} exceeds the outstanding balance of ${balance.outstanding}`,
          'amount',
        );
      }

      const id = randomUUID();
      await tx(this.tableName).insert({
        id,
        invoice_id: invoice.id,
        method: input.method,
        method_other: methodOther,
        amount: input.amount,
        receipt_number: null,
        reference: input.reference?.trim() ?? '',
        paid_at: paidAt.toISOString(),
        recorded_by: input.recorded_by ?? null,
        notes: input.notes ?? '',
        created_at: new Date().toISOString(),
      });

      await tx(this.tableName)
        .where({ id })
        .whereNull('receipt_number')
        .update({ receipt_number: buildReceiptNumber(id, paidAt) });

      await auditService.log(
        {
          action: AUDIT_ACTIONS.PAYMENT_RECORDED,
          actorId: input.recorded_by ?? null,
          entityType: 'invoice',
          entityId: invoice.id,
          summary: `Payment of ${input.amount} recorded on invoice ${invoice.number}`,
          meta: { payment_id: id, amount: input.amount, method: input.method },
        },
        tx,
      );

      await invoiceService.refreshStatusFromPayments(invoice.id, { trx: tx, triggerPaymentId: id });

      return this.getPayment(id, tx);
    });
  }

  async getPayment(id: string, trx?: Knex.Transaction): Promise<Payment> {
    const row = await this.findRow(id, trx);
    if (!row) throw new NotFoundError('Payment', id);
    return mapPaymentRow(row);
  }

  async listPaymentsForInvoice(invoiceId: string, trx?: Knex.Transaction): Promise<Payment[]> {
    const rows: Row[] = await this.conn(trx)(this.tableName)
      .where({ invoice_id: invoiceId })
      .orderBy('paid_at', 'asc')
      .orderBy('created_at', 'asc');
    return rows.map(mapPaymentRow);
  }
}

export const paymentService = new PaymentService();
