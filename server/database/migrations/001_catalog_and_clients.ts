import { Knex } from 'knex';

export async function up(knex: Knex): Promise<void> {
  // ============================================================
  // 1. customers
  // ============================================================

  await knex.schema.createTable('customers', (t) => {
    t.uuid('id').primary();
    t.string('name', 255).notNullable();
    t.string('email', 255);
    t.string('phone', 30);
    t.uuid('branch_id');
    t.timestamp('created_at', { useTz: true }).notNullable();
    t.index(['branch_id']);
  });

  // ============================================================
  // 2. products
  // ============================================================

  await knex.schema.createTable('products', (t) => {
    t.uuid('id').primary();
    t.string('sku', 50).notNullable().unique();
    t.string('name', 255).notNullable();
    t.string('unit', 20).notNullable().defaultTo('pcs');
    t.decimal('unit_price', 14, 2).notNullable().defaultTo(0);
    t.decimal('cost_price', 14, 2).notNullable().defaultTo(0);
    t.decimal('stock_quantity', 14, 3).notNullable().defaultTo(0);
    t.decimal('low_stock_threshold', 14, 3).notNullable().defaultTo(0);
    t.boolean('track_stock').notNullable().defaultTo(true);
    t.boolean('is_active').notNullable().defaultTo(true);
    t.uuid('branch_id');
    t.timestamp('created_at', { useTz: true }).notNullable();
    t.timestamp('updated_at', { useTz: true }).notNullable();
    t.index(['branch_id']);
  });

  // ============================================================
  // 3. service_items
  // ============================================================

  await knex.schema.createTable('service_items', (t) => {
    t.uuid('id').primary();
    t.string('name', 255).notNullable();
    t.decimal('unit_price', 14, 2).notNullable().defaultTo(0);
    t.decimal('service_charge', 14, 2).notNullable().defaultTo(0);
    t.boolean('is_active').notNullable().defaultTo(true);
    t.uuid('branch_id');
    t.timestamp('created_at', { useTz: true }).notNullable();
  });

  // ============================================================
  // 4. stock_movements
  // ============================================================

  await knex.schema.createTable('stock_movements', (t) => {
    t.uuid('id').primary();
    t.uuid('product_id').notNullable().references('id').inTable('products').onDelete('CASCADE');
    t.enu('movement_type', ['in', 'out']).notNullable();
    t.decimal('quantity', 14, 3).notNullable();
    t.string('reference', 100).notNullable().defaultTo('');
    t.string('source_type', 30);
    t.uuid('source_id');
    t.text('notes').notNullable().defaultTo('');
    t.timestamp('occurred_at', { useTz: true }).notNullable();
    t.index(['source_type', 'source_id']);
    t.index(['product_id', 'occurred_at']);
  });

  // ============================================================
  // 5. document_sequences
  // ============================================================

  await knex.schema.createTable('document_sequences', (t) => {
    t.string('kind', 30).notNullable();
    t.integer('year').notNullable();
    t.integer('last_number').notNullable().defaultTo(0);
    t.primary(['kind', 'year']);
  });

  // ============================================================
  // 6. audit_events
  // ============================================================

  await knex.schema.createTable('audit_events', (t) => {
    t.uuid('id').primary();
    t.string('action', 50).notNullable();
    t.uuid('actor_id');
    t.string('entity_type', 50).notNullable();
    t.uuid('entity_id');
    t.text('summary').notNullable().defaultTo('');
    t.jsonb('meta');
    t.timestamp('created_at', { useTz: true }).notNullable();
    t.index(['entity_type', 'entity_id']);
  });
}

export async function down(knex: Knex): Promise<void> {
  await knex.schema.dropTableIfExists('audit_events');
  await knex.schema.dropTableIfExists('document_sequences');
  await knex.schema.dropTableIfExists('stock_movements');
  await knex.schema.dropTableIfExists('service_items');
  await knex.schema.dropTableIfExists('products');
  await knex.schema.dropTableIfExists('customers');
}
