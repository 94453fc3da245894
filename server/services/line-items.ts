import { Knex } from 'knex';
import { productService } from './product.service';
import { serviceCatalogService } from './service-catalog.service';
import type { LiveCatalogRef } from '../../shared/types';
import { NotFoundError, ValidationError } from '../lib/errors';
import { lineTotal } from '../lib/money';

export interface LineItemInput {
  product_id?: string | null;
  service_id?: string | null;
  item_name?: string;
  description?: string;
  quantity: number;
  /** Defaults to the catalog's current price. */
  unit_price?: number;
  tax_exempt?: boolean;
}

export interface ResolvedLineItem {
  catalog: LiveCatalogRef;
  item_name: string;
  description: string;
  quantity: number;
  unit_price: number;
  tax_exempt: boolean;
  line_total: number;
  /** Catalog cost at the moment of resolution: product cost price or service charge. */
  catalog_cost: number;
}

export interface ResolveLineOptions {
  /** Free-text lines may carry a negative price (manual discounts). */
  allowNegativeFreeText?: boolean;
}

export function assertValidQuantity(quantity: number): void {
  if (!Number.isFinite(quantity) || quantity <= 0) {
    throw new ValidationError('Quantity must be greater than zero', 'quantity');
  }
}

export function assertValidUnitPrice(unitPrice: number, freeText: boolean, options: ResolveLineOptions): void {
  if (!Number.isFinite(unitPrice)) throw new ValidationError('Unit price must be a number', 'unit_price');
  if (unitPrice < 0 && !(freeText && options.allowNegativeFreeText)) {
    throw new ValidationError('Unit price cannot be negative', 'unit_price');
  }
}

/**
 * Validate a line against the live catalog: at most one of product and
 * service, and prices defaulting to what the catalog charges today.
 */
export async function resolveLineItem(
  input: LineItemInput,
  options: ResolveLineOptions,
  trx?: Knex.Transaction,
): Promise<ResolvedLineItem> {
  if (input.product_id && input.service_id) {
    throw new ValidationError('A line can reference a product or a service, not both', 'product_id');
  }
  assertValidQuantity(input.quantity);

  let catalog: LiveCatalogRef = { kind: 'free_text' };
  let itemName = input.item_name?.trim() ?? '';
  let unitPrice = input.unit_price;
  let catalogCost = 0;

  if (input.product_id) {
    const product = await productService.findProduct(input.product_id, trx);
    if (!product) throw new NotFoundError('Product', input.product_id);
    catalog = { kind: 'product', product_id: product.id };
    itemName = itemName || product.name;
    unitPrice = unitPrice ?? product.unit_price;
    catalogCost = product.cost_price;
  } else if (input.service_id) {
    const service = await serviceCatalogService.findServiceItem(input.service_id, trx);
    if (!service) throw new NotFoundError('Service', input.service_id);
    catalog = { kind: 'service', service_id: service.id };
    itemName = itemName || service.name;
    unitPrice = unitPrice ?? service.unit_price;
    catalogCost = service.service_charge;
  } else {
    if (!itemName && !input.description?.trim()) {
      throw new ValidationError('A free-text line needs a name or description', 'description');
    }
    if (unitPrice === undefined) {
      throw new ValidationError('A free-text line needs a unit price', 'unit_price');
    }
  }

  const price = unitPrice ?? 0;
  assertValidUnitPrice(price, catalog.kind === 'free_text', options);

  return {
    catalog,
    item_name: itemName,
    description: input.description?.trim() ?? '',
    quantity: input.quantity,
    unit_price: price,
    tax_exempt: input.tax_exempt ?? false,
    line_total: lineTotal(input.quantity, price),
    catalog_cost: catalogCost,
  };
}
