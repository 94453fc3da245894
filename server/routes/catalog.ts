// =============================================================
// File: server/routes/catalog.ts
// Description: Products (with stock adjustments and movement
//              history) and service items.
// =============================================================

import { FastifyInstance } from 'fastify';
import { authenticate, currentUser } from '../plugins/auth.plugin';
import { productService } from '../services/product.service';
import { serviceCatalogService } from '../services/service-catalog.service';
import {
  catalogListQuerySchema,
  createProductSchema,
  createServiceItemSchema,
  stockAdjustmentSchema,
} from '../schemas/catalog';
import { idParamsSchema } from '../schemas/common';
import { withContentionRetry } from '../lib/contention';

export async function catalogRoutes(server: FastifyInstance) {
  // ──────────────────────────────────────────────────────────
  // POST /products
  // ──────────────────────────────────────────────────────────
  server.post('/products', { preHandler: [authenticate] }, async (request, reply) => {
    const body = createProductSchema.parse(request.body);
    const user = currentUser(request);
    const product = await withContentionRetry(
      () => productService.createProduct({ ...body, branch_id: body.branch_id ?? user.branchId }),
      { operation: 'product.create' },
    );
    return reply.code(201).send({ success: true, data: product });
  });

  // ──────────────────────────────────────────────────────────
  // GET /products
  // ──────────────────────────────────────────────────────────
  server.get('/products', { preHandler: [authenticate] }, async (request) => {
    const query = catalogListQuerySchema.parse(request.query);
    const result = await productService.listProducts({ ...query, sortBy: 'name' });
    return { success: true, ...result };
  });

  // ──────────────────────────────────────────────────────────
  // GET /products/:id
  // ──────────────────────────────────────────────────────────
  server.get('/products/:id', { preHandler: [authenticate] }, async (request) => {
    const { id } = idParamsSchema.parse(request.params);
    return { success: true, data: await productService.getProduct(id) };
  });

  // ──────────────────────────────────────────────────────────
  // POST /products/:id/stock-adjustments — Manual stock in/out
  // ──────────────────────────────────────────────────────────
  server.post('/products/:id/stock-adjustments', { preHandler: [authenticate] }, async (request, reply) => {
    const { id } = idParamsSchema.parse(request.params);
    const body = stockAdjustmentSchema.parse(request.body);
    const result = await withContentionRetry(
      () =>
        productService.adjustStock(id, body.delta, {
          reference: body.reference,
          sourceType: 'manual',
          notes: body.notes,
        }),
      { operation: 'product.adjust_stock' },
    );
    return reply.code(201).send({ success: true, data: result });
  });

  // ──────────────────────────────────────────────────────────
  // GET /products/:id/movements
  // ──────────────────────────────────────────────────────────
  server.get('/products/:id/movements', { preHandler: [authenticate] }, async (request) => {
    const { id } = idParamsSchema.parse(request.params);
    await productService.getProduct(id);
    return { success: true, data: await productService.listMovements(id) };
  });

  // ──────────────────────────────────────────────────────────
  // POST /services
  // ──────────────────────────────────────────────────────────
  server.post('/services', { preHandler: [authenticate] }, async (request, reply) => {
    const body = createServiceItemSchema.parse(request.body);
    const user = currentUser(request);
    const service = await serviceCatalogService.createServiceItem({
      ...body,
      branch_id: body.branch_id ?? user.branchId,
    });
    return reply.code(201).send({ success: true, data: service });
  });

  // ──────────────────────────────────────────────────────────
  // GET /services
  // ──────────────────────────────────────────────────────────
  server.get('/services', { preHandler: [authenticate] }, async (request) => {
    const query = catalogListQuerySchema.parse(request.query);
    const result = await serviceCatalogService.listServiceItems({ ...query, sortBy: 'name' });
    return { success: true, ...result };
  });

  // ──────────────────────────────────────────────────────────
  // GET /services/:id
  // ──────────────────────────────────────────────────────────
  server.get('/services/:id', { preHandler: [authenticate] }, async (request) => {
    const { id } = idParamsSchema.parse(request.params);
    return { success: true, data: await serviceCatalogService.getServiceItem(id) };
  });
}
