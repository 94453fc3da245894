// =============================================================
// File: server/services/refund.service.ts
// Description: Refund ledger. Refunds hang off a payment,
//              are limited to what is left of it, and must be
//              made within the refund window after payment.
// =============================================================

import { randomUUID } from 'crypto';
import { Knex } from 'knex';
import { BaseService } from './base.service';
import { auditService } from './audit.service';
import { invoiceService } from './invoice.service';
import { mapPaymentRow, mapRefundRow } from './document-rows';
import type { Payment, Refund } from '../../shared/types';
import { AUDIT_ACTIONS, REFUND_WINDOW_DAYS } from '../../shared/constants';
import { NotFoundError, PolicyViolationError, ValidationError } from '../lib/errors';
import { isWholeUnit, round2, toNumber } from '../lib/money';
import { addDays } from '../lib/dates';
import { Row } from '../lib/rows';

export interface RecordRefundInput {
  payment_id: string;
  /** When given, must be the invoice the payment belongs to. */
  invoice_id?: string;
  amount: number;
  reference?: string;
  notes?: string;
  refunded_by?: string | null;
}

export function refundDeadline(payment: Pick<Payment, 'paid_at'>): Date {
  return addDays(new Date(payment.paid_at), REFUND_WINDOW_DAYS);
}

class RefundService extends BaseService {
  constructor() {
    super('payment_refunds');
  }

  private async refundedTotal(paymentId: string, trx?: Knex.Transaction): Promise<number> {
    const row: Row | undefined = await this.conn(trx)(this.tableName)
      .where({ payment_id: paymentId })
      .sum({ amount: 'amount' })
      .first();
    return round2(toNumber(row?.amount));
  }

  async refundableAmount(paymentId: string, trx?: Knex.Transaction): Promise<number> {
    const row: Row | undefined = await this.conn(trx)('payments').where({ id: paymentId }).first();
    if (!row) throw new NotFoundError('Payment', paymentId);
    const payment = mapPaymentRow(row);
    return Math.max(0, round2(payment.amount - (await this.refundedTotal(paymentId, trx))));
  }

  async recordRefund(input: RecordRefundInput, trx?: Knex.Transaction): Promise<Refund> {
    if (!Number.isFinite(input.amount) || input.amount <= 0) {
      throw new ValidationError('Refund amount must be greater than zero', 'amount');
    }
    if (!isWholeUnit(input.amount)) {
      throw new ValidationError('Refund amount must be in whole currency units', 'amount');
    }

    return this.inTransaction(trx, async (tx) => {
      await this.applyLockTimeout(tx);
      const paymentRow: Row | undefined = await tx('payments').where({ id: input.payment_id }).forUpdate().first();
      if (!paymentRow) throw new NotFoundError('Payment', input.payment_id);
      const payment = mapPaymentRow(paymentRow);

      if (input.invoice_id && input.invoice_id !== payment.invoice_id) {
        throw new ValidationError('The payment does not belong to this invoice', 'invoice_id');
      }

      const now = new Date();
      const deadline = refundDeadline(payment);
      if (now.getTime() > deadline.getTime()) {
        throw new PolicyViolationError(
          'refund_window_expired',
          `Refunds are only possible within ${REFUND_WINDOW_DAYS} days of payment`,
          deadline,
        );
      }

      const remaining = round2(payment.amount - (await this.refundedTotal(payment.id, tx)));
      if (input.amount > remaining) {
        throw new PolicyViolationError(
          'over_refund',
          `Refund of ${input.amount} exceeds the ${remaining} still refundable on this payment`,
        );
      }

      const id = randomUUID();
      await tx(this.tableName).insert({
        id,
        payment_id: payment.id,
        invoice_id: payment.invoice_id,
        amount: input.amount,
        refunded_at: now.toISOString(),
        refunded_by: input.refunded_by ?? null,
        reference: input.reference?.trim() ?? '',
        notes: input.notes ?? '',
        created_at: now.toISOString(),
      });

      await auditService.log(
        {
          action: AUDIT_ACTIONS.REFUND_RECORDED,
          actorId: input.refunded_by ?? null,
          entityType: 'invoice',
          entityId: payment.invoice_id,
          summary: `Refund of ${input.amount} against payment ${payment.receipt_number ?? payment.id}`,
          meta: { refund_id: id, payment_id: payment.id, amount: input.amount },
        },
        tx,
      );

      await invoiceService.refreshStatusFromPayments(payment.invoice_id, { trx: tx });

      return this.getRefund(id, tx);
    });
  }

  async deleteRefund(id: string, actorId: string | null, trx?: Knex.Transaction): Promise<void> {
    await this.inTransaction(trx, async (tx) => {
      await this.applyLockTimeout(tx);
      const row = await this.lockRow(id, tx);
      if (!row) throw new NotFoundError('Refund', id);
      const refund = mapRefundRow(row);

      await tx(this.tableName).where({ id }).delete();
      await auditService.log(
        {
          action: AUDIT_ACTIONS.REFUND_DELETED,
          actorId,
          entityType: 'invoice',
          entityId: refund.invoice_id,
          summary: `Refund of ${refund.amount} removed`,
          meta: { refund_id: id, payment_id: refund.payment_id, amount: refund.amount },
        },
        tx,
      );

      await invoiceService.refreshStatusFromPayments(refund.invoice_id, { trx: tx });
    });
  }

  async getRefund(id: string, trx?: Knex.Transaction): Promise<Refund> {
    const row = await this.findRow(id, trx);
    if (!row) throw new NotFoundError('Refund', id);
    return mapRefundRow(row);
  }

  async listRefundsForPayment(paymentId: string, trx?: Knex.Transaction): Promise<Refund[]> {
    const rows: Row[] = await this.conn(trx)(this.tableName)
      .where({ payment_id: paymentId })
      .orderBy('refunded_at', 'asc')
      .orderBy('created_at', 'asc');
    return rows.map(mapRefundRow);
  }
}

export const refundService = new RefundService();
