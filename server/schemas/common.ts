import { z } from 'zod';
import { PAGINATION } from '../../shared/constants';

export const idSchema = z.string().uuid();
export const isoDateSchema = z.string().regex(/^\d{4}-\d{2}-\d{2}$/, 'Expected a YYYY-MM-DD date');

export const idParamsSchema = z.object({ id: idSchema });
export const lineParamsSchema = z.object({ id: idSchema, lineId: idSchema });

export const listQuerySchema = z.object({
  page: z.coerce.number().int().min(1).default(PAGINATION.DEFAULT_PAGE),
  limit: z.coerce.number().int().min(1).max(PAGINATION.MAX_LIMIT).default(PAGINATION.DEFAULT_LIMIT),
  search: z.string().trim().max(100).optional(),
  sortOrder: z.enum(['asc', 'desc']).default('desc'),
});

export const lineItemSchema = z.object({
  product_id: idSchema.nullish(),
  service_id: idSchema.nullish(),
  item_name: z.string().trim().max(255).optional(),
  description: z.string().max(2000).optional(),
  quantity: z.number().positive(),
  unit_price: z.number().optional(),
  tax_exempt: z.boolean().optional(),
});

export const reasonSchema = z.object({
  reason: z.string().max(1000).default(''),
});
