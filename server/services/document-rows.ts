// Row mappers for quotations, invoices and the money that flows through
// them. Kept apart from the services so the ledgers can read invoices
// without importing the invoice engine.

import type {
  Invoice,
  InvoiceLine,
  InvoiceStatus,
  LiveCatalogRef,
  Payment,
  PaymentMethod,
  ProfitRecord,
  Quotation,
  QuotationLine,
  QuotationStatus,
  Refund,
} from '../../shared/types';
import { INVOICE_STATUS, PAYMENT_METHODS, PAYMENT_METHOD_LABELS, QUOTATION_STATUS } from '../../shared/constants';
import { toNumber } from '../lib/money';
import { toDateOnly, toTimestamp } from '../lib/dates';
import { Row, bool, str, strOrNull } from '../lib/rows';

function pickEnum<T extends string>(values: readonly T[], value: unknown, label: string): T {
  const found = values.find((candidate) => candidate === value);
  if (found === undefined) throw new Error(`Unexpected ${label} in storage: ${String(value)}`);
  return found;
}

export function parseQuotationStatus(value: unknown): QuotationStatus {
  return pickEnum(Object.values(QUOTATION_STATUS), value, 'quotation status');
}

export function parseInvoiceStatus(value: unknown): InvoiceStatus {
  return pickEnum(Object.values(INVOICE_STATUS), value, 'invoice status');
}

export function parsePaymentMethod(value: unknown): PaymentMethod {
  return pickEnum(Object.values(PAYMENT_METHODS), value, 'payment method');
}

export function catalogRefFromRow(row: Row): LiveCatalogRef {
  const productId = strOrNull(row.product_id);
  if (productId) return { kind: 'product', product_id: productId };
  const serviceId = strOrNull(row.service_id);
  if (serviceId) return { kind: 'service', service_id: serviceId };
  return { kind: 'free_text' };
}

export function catalogRefColumns(ref: LiveCatalogRef): { product_id: string | null; service_id: string | null } {
  switch (ref.kind) {
    case 'product':
      return { product_id: ref.product_id, service_id: null };
    case 'service':
      return { product_id: null, service_id: ref.service_id };
    case 'free_text':
      return { product_id: null, service_id: null };
  }
}

// ────────────────────────────────────────────────────────────
// Quotations
// ────────────────────────────────────────────────────────────

export function mapQuotationRow(row: Row): Quotation {
  return {
    id: str(row.id),
    number: str(row.number),
    customer_id: str(row.customer_id),
    branch_id: strOrNull(row.branch_id),
    status: parseQuotationStatus(row.status),
    currency: str(row.currency),
    tax_enabled: bool(row.tax_enabled),
    tax_rate: toNumber(row.tax_rate),
    discount_amount: toNumber(row.discount_amount),
    subtotal_amount: toNumber(row.subtotal_amount),
    tax_amount: toNumber(row.tax_amount),
    total_amount: toNumber(row.total_amount),
    valid_until: toDateOnly(row.valid_until),
    notes: str(row.notes),
    cancelled_at: toTimestamp(row.cancelled_at),
    cancelled_by: strOrNull(row.cancelled_by),
    cancel_reason: str(row.cancel_reason),
    created_by: strOrNull(row.created_by),
    created_at: toTimestamp(row.created_at) ?? '',
    updated_at: toTimestamp(row.updated_at) ?? '',
  };
}

export function mapQuotationLineRow(row: Row): QuotationLine {
  return {
    id: str(row.id),
    quotation_id: str(row.quotation_id),
    catalog: catalogRefFromRow(row),
    item_name: str(row.item_name),
    description: str(row.description),
    quantity: toNumber(row.quantity),
    unit_price: toNumber(row.unit_price),
    tax_exempt: bool(row.tax_exempt),
    line_total: toNumber(row.line_total),
    position: toNumber(row.position),
  };
}

// ────────────────────────────────────────────────────────────
// Invoices
// ────────────────────────────────────────────────────────────

export function mapInvoiceRow(row: Row): Invoice {
  return {
    id: str(row.id),
    number: str(row.number),
    customer_id: str(row.customer_id),
    quotation_id: strOrNull(row.quotation_id),
    branch_id: strOrNull(row.branch_id),
    status: parseInvoiceStatus(row.status),
    currency: str(row.currency),
    tax_rate: toNumber(row.tax_rate),
    subtotal_amount: toNumber(row.subtotal_amount),
    tax_amount: toNumber(row.tax_amount),
    total_amount: toNumber(row.total_amount),
    issued_at: toDateOnly(row.issued_at),
    due_at: toDateOnly(row.due_at),
    notes: str(row.notes),
    prepared_by_name: str(row.prepared_by_name),
    signed_by_name: str(row.signed_by_name),
    signed_at: toTimestamp(row.signed_at),
    cancelled_at: toTimestamp(row.cancelled_at),
    cancelled_by: strOrNull(row.cancelled_by),
    cancel_reason: str(row.cancel_reason),
    stock_deducted_at: toTimestamp(row.stock_deducted_at),
    created_by: strOrNull(row.created_by),
    created_at: toTimestamp(row.created_at) ?? '',
    updated_at: toTimestamp(row.updated_at) ?? '',
  };
}

export function mapInvoiceLineRow(row: Row): InvoiceLine {
  return {
    id: str(row.id),
    invoice_id: str(row.invoice_id),
    catalog: catalogRefFromRow(row),
    description: str(row.description),
    quantity: toNumber(row.quantity),
    unit_price: toNumber(row.unit_price),
    tax_exempt: bool(row.tax_exempt),
    line_total: toNumber(row.line_total),
    cost: { unit_cost: toNumber(row.unit_cost) },
    position: toNumber(row.position),
  };
}

// ────────────────────────────────────────────────────────────
// Payments, refunds, profit
// ────────────────────────────────────────────────────────────

export function methodLabel(method: PaymentMethod, methodOther: string): string {
  if (method === PAYMENT_METHODS.OTHER && methodOther.trim()) return methodOther.trim();
  return PAYMENT_METHOD_LABELS[method];
}

export function mapPaymentRow(row: Row): Payment {
  const method = parsePaymentMethod(row.method);
  const methodOther = str(row.method_other);
  return {
    id: str(row.id),
    invoice_id: str(row.invoice_id),
    method,
    method_other: methodOther,
    method_label: methodLabel(method, methodOther),
    amount: toNumber(row.amount),
    receipt_number: strOrNull(row.receipt_number),
    reference: str(row.reference),
    paid_at: toTimestamp(row.paid_at) ?? '',
    recorded_by: strOrNull(row.recorded_by),
    notes: str(row.notes),
    created_at: toTimestamp(row.created_at) ?? '',
  };
}

export function mapRefundRow(row: Row): Refund {
  return {
    id: str(row.id),
    payment_id: str(row.payment_id),
    invoice_id: str(row.invoice_id),
    amount: toNumber(row.amount),
    refunded_at: toTimestamp(row.refunded_at) ?? '',
    refunded_by: strOrNull(row.refunded_by),
    reference: str(row.reference),
    notes: str(row.notes),
    created_at: toTimestamp(row.created_at) ?? '',
  };
}

export function mapProfitRecordRow(row: Row): ProfitRecord {
  return {
    id: str(row.id),
    invoice_id: str(row.invoice_id),
    branch_id: strOrNull(row.branch_id),
    currency: str(row.currency),
    product_sales_total: toNumber(row.product_sales_total),
    product_cost_total: toNumber(row.product_cost_total),
    product_profit_total: toNumber(row.product_profit_total),
    service_sales_total: toNumber(row.service_sales_total),
    service_cost_total: toNumber(row.service_cost_total),
    service_profit_total: toNumber(row.service_profit_total),
    recorded_at: toTimestamp(row.recorded_at) ?? '',
    paid_at: toTimestamp(row.paid_at),
    trigger_payment_id: strOrNull(row.trigger_payment_id),
  };
}
