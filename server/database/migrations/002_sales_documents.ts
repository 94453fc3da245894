import { Knex } from 'knex';

const QUOTATION_STATUSES = ['draft', 'sent', 'accepted', 'rejected', 'converted', 'expired', 'cancelled'];
const INVOICE_STATUSES = ['draft', 'issued', 'paid', 'cancelled'];
const PAYMENT_METHODS = ['cash', 'bank', 'mobile_money', 'other'];

export async function up(knex: Knex): Promise<void> {
  // ============================================================
  // 1. quotations + quotation_lines
  // ============================================================

  await knex.schema.createTable('quotations', (t) => {
    t.uuid('id').primary();
    t.string('number', 50).notNullable().unique();
    t.uuid('customer_id').notNullable().references('id').inTable('customers');
    t.uuid('branch_id');
    t.enu('status', QUOTATION_STATUSES).notNullable().defaultTo('draft');
    t.string('currency', 3).notNullable();
    t.boolean('tax_enabled').notNullable().defaultTo(true);
    t.decimal('tax_rate', 6, 4).notNullable().defaultTo(0);
    t.decimal('discount_amount', 14, 2).notNullable().defaultTo(0);
    t.decimal('subtotal_amount', 14, 2).notNullable().defaultTo(0);
    t.decimal('tax_amount', 14, 2).notNullable().defaultTo(0);
    t.decimal('total_amount', 14, 2).notNullable().defaultTo(0);
    t.date('valid_until');
    t.text('notes').notNullable().defaultTo('');
    t.timestamp('cancelled_at', { useTz: true });
    t.uuid('cancelled_by');
    t.text('cancel_reason').notNullable().defaultTo('');
    t.uuid('created_by');
    t.timestamp('created_at', { useTz: true }).notNullable();
    t.timestamp('updated_at', { useTz: true }).notNullable();
    t.index(['status', 'valid_until']);
  });

  await knex.schema.createTable('quotation_lines', (t) => {
    t.uuid('id').primary();
    t.uuid('quotation_id').notNullable().references('id').inTable('quotations').onDelete('CASCADE');
    t.uuid('product_id').references('id').inTable('products');
    t.uuid('service_id').references('id').inTable('service_items');
    t.string('item_name', 255).notNullable().defaultTo('');
    t.text('description').notNullable().defaultTo('');
    t.decimal('quantity', 12, 2).notNullable();
    t.decimal('unit_price', 12, 2).notNullable();
    t.boolean('tax_exempt').notNullable().defaultTo(false);
    t.decimal('line_total', 14, 2).notNullable();
    t.integer('position').notNullable().defaultTo(0);
    t.index(['quotation_id']);
  });

  // ============================================================
  // 2. invoices + invoice_lines
  // ============================================================

  await knex.schema.createTable('invoices', (t) => {
    t.uuid('id').primary();
    t.string('number', 50).notNullable().unique();
    t.uuid('customer_id').notNullable().references('id').inTable('customers');
    t.uuid('quotation_id').unique().references('id').inTable('quotations');
    t.uuid('branch_id');
    t.enu('status', INVOICE_STATUSES).notNullable().defaultTo('draft');
    t.string('currency', 3).notNullable();
    t.decimal('tax_rate', 6, 4).notNullable().defaultTo(0);
    t.decimal('subtotal_amount', 14, 2).notNullable().defaultTo(0);
    t.decimal('tax_amount', 14, 2).notNullable().defaultTo(0);
    t.decimal('total_amount', 14, 2).notNullable().defaultTo(0);
    t.date('issued_at');
    t.date('due_at');
    t.text('notes').notNullable().defaultTo('');
    t.string('prepared_by_name', 255).notNullable().defaultTo('');
    t.string('signed_by_name', 255).notNullable().defaultTo('');
    t.timestamp('signed_at', { useTz: true });
    t.timestamp('cancelled_at', { useTz: true });
    t.uuid('cancelled_by');
    t.text('cancel_reason').notNullable().defaultTo('');
    t.timestamp('stock_deducted_at', { useTz: true });
    t.uuid('created_by');
    t.timestamp('created_at', { useTz: true }).notNullable();
    t.timestamp('updated_at', { useTz: true }).notNullable();
    t.index(['status']);
    t.index(['customer_id']);
  });

  await knex.schema.createTable('invoice_lines', (t) => {
    t.uuid('id').primary();
    t.uuid('invoice_id').notNullable().references('id').inTable('invoices').onDelete('CASCADE');
    t.uuid('product_id').references('id').inTable('products');
    t.uuid('service_id').references('id').inTable('service_items');
    t.text('description').notNullable().defaultTo('');
    t.decimal('quantity', 12, 2).notNullable();
    t.decimal('unit_price', 12, 2).notNullable();
    t.boolean('tax_exempt').notNullable().defaultTo(false);
    t.decimal('line_total', 14, 2).notNullable();
    t.decimal('unit_cost', 12, 2).notNullable().defaultTo(0);
    t.integer('position').notNullable().defaultTo(0);
    t.index(['invoice_id']);
  });

  // ============================================================
  // 3. payments + payment_refunds
  // ============================================================

  await knex.schema.createTable('payments', (t) => {
    t.uuid('id').primary();
    t.uuid('invoice_id').notNullable().references('id').inTable('invoices').onDelete('CASCADE');
    t.enu('method', PAYMENT_METHODS).notNullable();
    t.string('method_other', 100).notNullable().defaultTo('');
    t.decimal('amount', 14, 2).notNullable();
    t.string('receipt_number', 40).unique();
    t.string('reference', 100).notNullable().defaultTo('');
    t.timestamp('paid_at', { useTz: true }).notNullable();
    t.uuid('recorded_by');
    t.text('notes').notNullable().defaultTo('');
    t.timestamp('created_at', { useTz: true }).notNullable();
    t.index(['invoice_id']);
  });

  await knex.schema.createTable('payment_refunds', (t) => {
    t.uuid('id').primary();
    t.uuid('payment_id').notNullable().references('id').inTable('payments').onDelete('CASCADE');
    t.uuid('invoice_id').notNullable().references('id').inTable('invoices').onDelete('CASCADE');
    t.decimal('amount', 14, 2).notNullable();
    t.timestamp('refunded_at', { useTz: true }).notNullable();
    t.uuid('refunded_by');
    t.string('reference', 100).notNullable().defaultTo('');
    t.text('notes').notNullable().defaultTo('');
    t.timestamp('created_at', { useTz: true }).notNullable();
    t.index(['payment_id']);
    t.index(['invoice_id']);
  });

  // ============================================================
  // 4. profit_records
  // ============================================================

  await knex.schema.createTable('profit_records', (t) => {
    t.uuid('id').primary();
    t.uuid('invoice_id').notNullable().unique().references('id').inTable('invoices').onDelete('CASCADE');
    t.uuid('branch_id');
    t.string('currency', 3).notNullable();
    t.decimal('product_sales_total', 14, 2).notNullable().defaultTo(0);
    t.decimal('product_cost_total', 14, 2).notNullable().defaultTo(0);
    t.decimal('product_profit_total', 14, 2).notNullable().defaultTo(0);
    t.decimal('service_sales_total', 14, 2).notNullable().defaultTo(0);
    t.decimal('service_cost_total', 14, 2).notNullable().defaultTo(0);
    t.decimal('service_profit_total', 14, 2).notNullable().defaultTo(0);
    t.timestamp('recorded_at', { useTz: true }).notNullable();
    t.timestamp('paid_at', { useTz: true });
    t.uuid('trigger_payment_id').references('id').inTable('payments').onDelete('SET NULL');
    t.index(['paid_at']);
  });
}

export async function down(knex: Knex): Promise<void> {
  await knex.schema.dropTableIfExists('profit_records');
  await knex.schema.dropTableIfExists('payment_refunds');
  await knex.schema.dropTableIfExists('payments');
  await knex.schema.dropTableIfExists('invoice_lines');
  await knex.schema.dropTableIfExists('invoices');
  await knex.schema.dropTableIfExists('quotation_lines');
  await knex.schema.dropTableIfExists('quotations');
}
