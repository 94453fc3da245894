export const APP_NAME = 'Business Desk';
export const APP_VERSION = '1.0.0';

export const DEFAULT_API_PORT = 3001;
export const DEFAULT_DB_PORT = 5432;

export const DOCUMENT_KINDS = {
  QUOTATION: 'quotation',
  INVOICE: 'invoice',
  BID: 'bid',
  PRODUCT_SKU: 'product_sku',
} as const;

export const DOCUMENT_PREFIXES = {
  quotation: 'Q',
  invoice: 'INV',
  bid: 'BID',
  product_sku: 'SKU',
} as const;

export const SEQUENCE_PAD_LENGTH = 5;

export const QUOTATION_STATUS = {
  DRAFT: 'draft',
  SENT: 'sent',
  ACCEPTED: 'accepted',
  REJECTED: 'rejected',
  CONVERTED: 'converted',
  EXPIRED: 'expired',
  CANCELLED: 'cancelled',
} as const;

// Line items and header fields are read-only in these states
export const QUOTATION_LOCKED_STATUSES = ['converted', 'expired', 'cancelled'] as const;

export const INVOICE_STATUS = {
  DRAFT: 'draft',
  ISSUED: 'issued',
  PAID: 'paid',
  CANCELLED: 'cancelled',
} as const;

export const INVOICE_EDITABLE_STATUSES = ['draft', 'issued'] as const;

export const PAYMENT_METHODS = {
  CASH: 'cash',
  BANK: 'bank',
  MOBILE_MONEY: 'mobile_money',
  OTHER: 'other',
} as const;

export const PAYMENT_METHOD_LABELS = {
  cash: 'Cash',
  bank: 'Bank',
  mobile_money: 'Mobile Money',
  other: 'Other',
} as const;

export const STOCK_MOVEMENT_TYPES = {
  IN: 'in',
  OUT: 'out',
} as const;

export const AUDIT_ACTIONS = {
  QUOTATION_STATUS_CHANGED: 'quotation_status_changed',
  QUOTATION_CONVERTED: 'quotation_converted',
  INVOICE_ISSUED: 'invoice_issued',
  INVOICE_CANCELLED: 'invoice_cancelled',
  INVOICE_SIGNED: 'invoice_signed',
  PAYMENT_RECORDED: 'payment_recorded',
  REFUND_RECORDED: 'refund_recorded',
  REFUND_DELETED: 'refund_deleted',
  SEQUENCE_FALLBACK: 'sequence_fallback',
} as const;

export const REFUND_WINDOW_DAYS = 21;

/**
 * Differences between total and net payments at or below this amount count
 * as settled. Chosen for whole-unit currencies; re-validate before using it
 * with currencies that have meaningful sub-units.
 */
export const PAID_ROUNDING_TOLERANCE = 0.05;

export const DEFAULT_TAX_RATE = 0.18;
export const DEFAULT_CURRENCY = 'UGX';

export const PAGINATION = {
  DEFAULT_PAGE: 1,
  DEFAULT_LIMIT: 50,
  MAX_LIMIT: 200,
} as const;
