import { z } from 'zod';
import { idSchema, listQuerySchema } from './common';

export const createCustomerSchema = z.object({
  name: z.string().trim().min(1).max(255),
  email: z.string().trim().email().max(255).nullish(),
  phone: z.string().trim().max(30).nullish(),
  branch_id: idSchema.nullish(),
});

export const createProductSchema = z.object({
  sku: z.string().trim().min(1).max(50).optional(),
  name: z.string().trim().min(1).max(255),
  unit: z.string().trim().max(20).optional(),
  unit_price: z.number().min(0).optional(),
  cost_price: z.number().min(0).optional(),
  stock_quantity: z.number().optional(),
  low_stock_threshold: z.number().min(0).optional(),
  track_stock: z.boolean().optional(),
  branch_id: idSchema.nullish(),
});

export const stockAdjustmentSchema = z.object({
  delta: z.number().refine((n) => n !== 0, 'delta must not be zero'),
  reference: z.string().max(100).optional(),
  notes: z.string().max(2000).optional(),
});

export const createServiceItemSchema = z.object({
  name: z.string().trim().min(1).max(255),
  unit_price: z.number().min(0).optional(),
  service_charge: z.number().min(0).optional(),
  branch_id: idSchema.nullish(),
});

export const catalogListQuerySchema = listQuerySchema.extend({
  branch_id: idSchema.optional(),
  low_stock: z
    .enum(['true', 'false'])
    .transform((v) => v === 'true')
    .optional(),
});
