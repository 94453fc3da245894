import { z } from 'zod';
import { INVOICE_STATUS, PAYMENT_METHODS, QUOTATION_STATUS } from '../../shared/constants';
import { idSchema, isoDateSchema, lineItemSchema, listQuerySchema } from './common';

const taxRateSchema = z.number().min(0).max(1);

export const quotationStatusSchema = z.nativeEnum(QUOTATION_STATUS);
export const invoiceStatusSchema = z.nativeEnum(INVOICE_STATUS);
export const paymentMethodSchema = z.nativeEnum(PAYMENT_METHODS);

// ──────── Quotations ────────

export const createQuotationSchema = z.object({
  customer_id: idSchema,
  branch_id: idSchema.nullish(),
  currency: z.string().length(3).optional(),
  tax_enabled: z.boolean().optional(),
  tax_rate: taxRateSchema.optional(),
  discount_amount: z.number().min(0).optional(),
  valid_until: isoDateSchema.nullable().optional(),
  notes: z.string().max(20000).optional(),
  lines: z.array(lineItemSchema).default([]),
});

export const updateQuotationSchema = z.object({
  discount_amount: z.number().min(0).optional(),
  tax_enabled: z.boolean().optional(),
  tax_rate: taxRateSchema.optional(),
  valid_until: isoDateSchema.nullable().optional(),
  notes: z.string().max(20000).optional(),
});

export const updateQuotationLineSchema = z.object({
  item_name: z.string().trim().max(255).optional(),
  description: z.string().max(2000).optional(),
  quantity: z.number().positive().optional(),
  unit_price: z.number().min(0).optional(),
  tax_exempt: z.boolean().optional(),
});

export const quotationStatusBodySchema = z.object({
  status: quotationStatusSchema,
  reason: z.string().max(1000).default(''),
});

export const quotationListQuerySchema = listQuerySchema.extend({
  status: quotationStatusSchema.optional(),
  customer_id: idSchema.optional(),
  branch_id: idSchema.optional(),
});

export const expireQuerySchema = z.object({
  today: isoDateSchema.optional(),
});

// ──────── Invoices ────────

export const invoiceLineSchema = lineItemSchema;

export const createInvoiceSchema = z.object({
  customer_id: idSchema,
  branch_id: idSchema.nullish(),
  currency: z.string().length(3).optional(),
  tax_rate: taxRateSchema.optional(),
  due_at: isoDateSchema.nullish(),
  notes: z.string().max(20000).optional(),
  prepared_by_name: z.string().max(255).optional(),
  lines: z.array(invoiceLineSchema).default([]),
});

export const updateInvoiceSchema = z.object({
  tax_rate: taxRateSchema.optional(),
  due_at: isoDateSchema.nullable().optional(),
  notes: z.string().max(20000).optional(),
  prepared_by_name: z.string().max(255).optional(),
});

export const updateInvoiceLineSchema = z.object({
  description: z.string().max(2000).optional(),
  quantity: z.number().positive().optional(),
  unit_price: z.number().optional(),
  tax_exempt: z.boolean().optional(),
});

export const signInvoiceSchema = z.object({
  signed_by_name: z.string().trim().min(1).max(255),
});

export const invoiceListQuerySchema = listQuerySchema.extend({
  status: invoiceStatusSchema.optional(),
  customer_id: idSchema.optional(),
  branch_id: idSchema.optional(),
});

// ──────── Payments & refunds ────────

export const recordPaymentSchema = z.object({
  amount: z.number().positive(),
  method: paymentMethodSchema,
  method_other: z.string().max(100).optional(),
  reference: z.string().max(100).optional(),
  paid_at: z.string().datetime({ offset: true }).optional(),
  notes: z.string().max(2000).optional(),
});

export const recordRefundSchema = z.object({
  amount: z.number().positive(),
  invoice_id: idSchema.optional(),
  reference: z.string().max(100).optional(),
  notes: z.string().max(2000).optional(),
});

// ──────── Reports ────────

export const profitQuerySchema = listQuerySchema.extend({
  from: isoDateSchema.optional(),
  to: isoDateSchema.optional(),
  branch_id: idSchema.optional(),
});
