import type {
  AUDIT_ACTIONS,
  DOCUMENT_KINDS,
  INVOICE_STATUS,
  PAYMENT_METHODS,
  QUOTATION_STATUS,
  STOCK_MOVEMENT_TYPES,
} from '../constants';

// ============================================================
// Enumerations
// ============================================================

export type DocumentKind = (typeof DOCUMENT_KINDS)[keyof typeof DOCUMENT_KINDS];
export type QuotationStatus = (typeof QUOTATION_STATUS)[keyof typeof QUOTATION_STATUS];
export type InvoiceStatus = (typeof INVOICE_STATUS)[keyof typeof INVOICE_STATUS];
export type PaymentMethod = (typeof PAYMENT_METHODS)[keyof typeof PAYMENT_METHODS];
export type StockMovementType = (typeof STOCK_MOVEMENT_TYPES)[keyof typeof STOCK_MOVEMENT_TYPES];
export type AuditAction = (typeof AUDIT_ACTIONS)[keyof typeof AUDIT_ACTIONS];

// ============================================================
// Pricing references
// ============================================================

/**
 * A line's link into the catalog. Re-read on every use: prices and charges
 * reached through it are whatever the catalog holds now.
 */
export type LiveCatalogRef =
  | { kind: 'product'; product_id: string }
  | { kind: 'service'; service_id: string }
  | { kind: 'free_text' };

/**
 * Cost copied onto an invoice line when the line is created. Later catalog
 * changes never touch it.
 */
export interface FrozenCostSnapshot {
  unit_cost: number;
}

// ============================================================
// Collaborators: clients and catalog
// ============================================================

export interface Customer {
  id: string;
  name: string;
  email: string | null;
  phone: string | null;
  branch_id: string | null;
  created_at: string;
}

export interface Product {
  id: string;
  sku: string;
  name: string;
  unit: string;
  unit_price: number;
  cost_price: number;
  stock_quantity: number;
  low_stock_threshold: number;
  track_stock: boolean;
  is_active: boolean;
  branch_id: string | null;
  created_at: string;
  updated_at: string;
}

export interface ServiceItem {
  id: string;
  name: string;
  unit_price: number;
  service_charge: number;
  is_active: boolean;
  branch_id: string | null;
  created_at: string;
}

export interface StockMovement {
  id: string;
  product_id: string;
  movement_type: StockMovementType;
  quantity: number;
  reference: string;
  source_type: string | null;
  source_id: string | null;
  notes: string;
  occurred_at: string;
}

// ============================================================
// Quotations
// ============================================================

export interface QuotationLine {
  id: string;
  quotation_id: string;
  catalog: LiveCatalogRef;
  item_name: string;
  description: string;
  quantity: number;
  unit_price: number;
  tax_exempt: boolean;
  line_total: number;
  position: number;
}

export interface Quotation {
  id: string;
  number: string;
  customer_id: string;
  branch_id: string | null;
  status: QuotationStatus;
  currency: string;
  tax_enabled: boolean;
  tax_rate: number;
  discount_amount: number;
  subtotal_amount: number;
  tax_amount: number;
  total_amount: number;
  valid_until: string | null;
  notes: string;
  cancelled_at: string | null;
  cancelled_by: string | null;
  cancel_reason: string;
  created_by: string | null;
  created_at: string;
  updated_at: string;
}

export interface QuotationWithLines extends Quotation {
  lines: QuotationLine[];
}

// ============================================================
// Invoices
// ============================================================

export interface InvoiceLine {
  id: string;
  invoice_id: string;
  catalog: LiveCatalogRef;
  description: string;
  quantity: number;
  unit_price: number;
  tax_exempt: boolean;
  line_total: number;
  cost: FrozenCostSnapshot;
  position: number;
}

export interface Invoice {
  id: string;
  number: string;
  customer_id: string;
  quotation_id: string | null;
  branch_id: string | null;
  status: InvoiceStatus;
  currency: string;
  tax_rate: number;
  subtotal_amount: number;
  tax_amount: number;
  total_amount: number;
  issued_at: string | null;
  due_at: string | null;
  notes: string;
  prepared_by_name: string;
  signed_by_name: string;
  signed_at: string | null;
  cancelled_at: string | null;
  cancelled_by: string | null;
  cancel_reason: string;
  stock_deducted_at: string | null;
  created_by: string | null;
  created_at: string;
  updated_at: string;
}

export interface InvoiceBalance {
  total: number;
  paid: number;
  refunded: number;
  net_paid: number;
  /** Signed, with the rounding band applied; negative when overpaid. */
  balance: number;
  outstanding: number;
}

export interface InvoiceWithLines extends Invoice {
  lines: InvoiceLine[];
}

export interface InvoiceDetails extends InvoiceWithLines {
  payments: Payment[];
  refunds: Refund[];
  balance: InvoiceBalance;
  profit_record: ProfitRecord | null;
}

// ============================================================
// Payments & refunds
// ============================================================

export interface Payment {
  id: string;
  invoice_id: string;
  method: PaymentMethod;
  method_other: string;
  method_label: string;
  amount: number;
  receipt_number: string | null;
  reference: string;
  paid_at: string;
  recorded_by: string | null;
  notes: string;
  created_at: string;
}

export interface Refund {
  id: string;
  payment_id: string;
  invoice_id: string;
  amount: number;
  refunded_at: string;
  refunded_by: string | null;
  reference: string;
  notes: string;
  created_at: string;
}

// ============================================================
// Reporting
// ============================================================

export interface ProfitRecord {
  id: string;
  invoice_id: string;
  branch_id: string | null;
  currency: string;
  product_sales_total: number;
  product_cost_total: number;
  product_profit_total: number;
  service_sales_total: number;
  service_cost_total: number;
  service_profit_total: number;
  recorded_at: string;
  paid_at: string | null;
  trigger_payment_id: string | null;
}

export interface ProfitSummary {
  invoice_count: number;
  product_sales_total: number;
  product_cost_total: number;
  product_profit_total: number;
  service_sales_total: number;
  service_cost_total: number;
  service_profit_total: number;
  profit_total: number;
}

export interface AuditEvent {
  id: string;
  action: AuditAction;
  actor_id: string | null;
  entity_type: string;
  entity_id: string | null;
  summary: string;
  meta: Record<string, unknown>;
  created_at: string;
}

// ============================================================
// API envelope
// ============================================================

export interface PaginatedResponse<T> {
  data: T[];
  total: number;
  page: number;
  limit: number;
  totalPages: number;
}

export interface ApiResponse<T> {
  success: boolean;
  data?: T;
  error?: string;
  message?: string;
}
