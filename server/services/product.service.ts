// =============================================================
// File: server/services/product.service.ts
// Description: Product catalog and stock levels. Every change
//              to stock_quantity goes through adjustStock, which
//              locks the product row and writes a movement.
// =============================================================

import { randomUUID } from 'crypto';
import { Knex } from 'knex';
import { BaseService, ListOptions } from './base.service';
import { documentSequenceService } from './document-sequence.service';
import type { PaginatedResponse, Product, StockMovement, StockMovementType } from '../../shared/types';
import { DOCUMENT_KINDS, STOCK_MOVEMENT_TYPES } from '../../shared/constants';
import { NotFoundError, ValidationError } from '../lib/errors';
import { toNumber } from '../lib/money';
import { toTimestamp } from '../lib/dates';
import { Row, bool, str, strOrNull } from '../lib/rows';

// ────────────────────────────────────────────────────────────
// Interfaces
// ────────────────────────────────────────────────────────────

export interface CreateProductInput {
  sku?: string;
  name: string;
  unit?: string;
  unit_price?: number;
  cost_price?: number;
  stock_quantity?: number;
  low_stock_threshold?: number;
  track_stock?: boolean;
  branch_id?: string | null;
}

export interface StockAdjustmentContext {
  reference?: string;
  sourceType?: string | null;
  sourceId?: string | null;
  notes?: string;
}

export interface StockAdjustmentResult {
  product_id: string;
  stock_quantity: number;
  movement: StockMovement;
}

// ────────────────────────────────────────────────────────────
// DB Row Types
// ────────────────────────────────────────────────────────────

export function mapProductRow(row: Row): Product {
  return {
    id: str(row.id),
    sku: str(row.sku),
    name: str(row.name),
    unit: str(row.unit),
    unit_price: toNumber(row.unit_price),
    cost_price: toNumber(row.cost_price),
    stock_quantity: toNumber(row.stock_quantity),
    low_stock_threshold: toNumber(row.low_stock_threshold),
    track_stock: bool(row.track_stock),
    is_active: bool(row.is_active),
    branch_id: strOrNull(row.branch_id),
    created_at: toTimestamp(row.created_at) ?? '',
    updated_at: toTimestamp(row.updated_at) ?? '',
  };
}

function toMovementType(value: unknown): StockMovementType {
  return value === STOCK_MOVEMENT_TYPES.IN ? STOCK_MOVEMENT_TYPES.IN : STOCK_MOVEMENT_TYPES.OUT;
}

export function mapMovementRow(row: Row): StockMovement {
  return {
    id: str(row.id),
    product_id: str(row.product_id),
    movement_type: toMovementType(row.movement_type),
    quantity: toNumber(row.quantity),
    reference: str(row.reference),
    source_type: strOrNull(row.source_type),
    source_id: strOrNull(row.source_id),
    notes: str(row.notes),
    occurred_at: toTimestamp(row.occurred_at) ?? '',
  };
}

function requireNonNegative(value: number | undefined, field: string): number {
  const n = value ?? 0;
  if (!Number.isFinite(n) || n < 0) throw new ValidationError(`${field} must be zero or more`, field);
  return n;
}

// ────────────────────────────────────────────────────────────
// Service
// ────────────────────────────────────────────────────────────

class ProductService extends BaseService {
  constructor() {
    super('products');
  }

  // ──────── CREATE ────────

  async createProduct(input: CreateProductInput, trx?: Knex.Transaction): Promise<Product> {
    const name = input.name.trim();
    if (!name) throw new ValidationError('Product name is required', 'name');

    const unitPrice = requireNonNegative(input.unit_price, 'unit_price');
    const costPrice = requireNonNegative(input.cost_price, 'cost_price');
    const threshold = requireNonNegative(input.low_stock_threshold, 'low_stock_threshold');

    return this.inTransaction(trx, async (tx) => {
      const sku = input.sku?.trim()
        || (await documentSequenceService.nextNumber(DOCUMENT_KINDS.PRODUCT_SKU, new Date().getFullYear(), tx));

      const duplicate: Row | undefined = await tx(this.tableName).where({ sku }).first();
      if (duplicate) throw new ValidationError(`SKU already in use: ${sku}`, 'sku');

      const id = randomUUID();
      const now = new Date().toISOString();
      await tx(this.tableName).insert({
        id,
        sku,
        name,
        unit: input.unit?.trim() || 'pcs',
        unit_price: unitPrice,
        cost_price: costPrice,
        stock_quantity: input.stock_quantity ?? 0,
        low_stock_threshold: threshold,
        track_stock: input.track_stock ?? true,
        is_active: true,
        branch_id: input.branch_id || null,
        created_at: now,
        updated_at: now,
      });

      return this.getProduct(id, tx);
    });
  }

  // ──────── READ ────────

  async getProduct(id: string, trx?: Knex.Transaction): Promise<Product> {
    const row = await this.findRow(id, trx);
    if (!row) throw new NotFoundError('Product', id);
    return mapProductRow(row);
  }

  async findProduct(id: string, trx?: Knex.Transaction): Promise<Product | null> {
    const row = await this.findRow(id, trx);
    return row ? mapProductRow(row) : null;
  }

  async listProducts(options: ListOptions & { branch_id?: string; low_stock?: boolean }): Promise<PaginatedResponse<Product>> {
    return this.paginate(
      {
        ...options,
        searchFields: ['name', 'sku'],
        filters: { branch_id: options.branch_id },
      },
      mapProductRow,
      (query) => {
        if (options.low_stock) {
          query.where('track_stock', true).whereRaw('stock_quantity <= low_stock_threshold');
        }
      },
    );
  }

  async listMovements(productId: string, trx?: Knex.Transaction): Promise<StockMovement[]> {
    const rows: Row[] = await this.conn(trx)('stock_movements')
      .where({ product_id: productId })
      .orderBy('occurred_at', 'asc')
      .orderBy('id', 'asc');
    return rows.map(mapMovementRow);
  }

  // ──────── STOCK ────────

  /**
   * Apply a signed stock delta under a product row lock and record the
   * movement. Stock may go negative; sales are never blocked by it.
   */
  async adjustStock(
    productId: string,
    delta: number,
    context: StockAdjustmentContext = {},
    trx?: Knex.Transaction,
  ): Promise<StockAdjustmentResult> {
    if (!Number.isFinite(delta) || delta === 0) {
      throw new ValidationError('Stock adjustment must be a non-zero number', 'delta');
    }

    return this.inTransaction(trx, async (tx) => {
      await this.applyLockTimeout(tx);
      const row = await this.lockRow(productId, tx);
      if (!row) throw new NotFoundError('Product', productId);

      const stockQuantity = toNumber(row.stock_quantity) + delta;
      const now = new Date().toISOString();

      await tx(this.tableName)
        .where({ id: productId })
        .update({ stock_quantity: stockQuantity, updated_at: now });

      const movement: StockMovement = {
        id: randomUUID(),
        product_id: productId,
        movement_type: delta < 0 ? STOCK_MOVEMENT_TYPES.OUT : STOCK_MOVEMENT_TYPES.IN,
        quantity: Math.abs(delta),
        reference: context.reference ?? '',
        source_type: context.sourceType ?? null,
        source_id: context.sourceId ?? null,
        notes: context.notes ?? '',
        occurred_at: now,
      };
      await tx('stock_movements').insert(movement);

      return { product_id: productId, stock_quantity: stockQuantity, movement };
    });
  }
}

export const productService = new ProductService();
