// =============================================================
// File: server/routes/quotations.ts
// Description: Quotation endpoints: create, list, get, header
//              edits, line CRUD, status changes, cancellation,
//              conversion to invoice and the expiry sweep.
// =============================================================

import { FastifyInstance } from 'fastify';
import { authenticate, currentUser } from '../plugins/auth.plugin';
import { quotationService } from '../services/quotation.service';
import { idParamsSchema, lineItemSchema, lineParamsSchema, reasonSchema } from '../schemas/common';
import {
  createQuotationSchema,
  expireQuerySchema,
  quotationListQuerySchema,
  quotationStatusBodySchema,
  updateQuotationLineSchema,
  updateQuotationSchema,
} from '../schemas/documents';
import { withContentionRetry } from '../lib/contention';

export async function quotationRoutes(server: FastifyInstance) {
  // ──────────────────────────────────────────────────────────
  // POST /quotations
  // ──────────────────────────────────────────────────────────
  server.post('/quotations', { preHandler: [authenticate] }, async (request, reply) => {
    const body = createQuotationSchema.parse(request.body);
    const user = currentUser(request);
    const quotation = await withContentionRetry(
      () =>
        quotationService.createQuotation({
          ...body,
          branch_id: body.branch_id ?? user.branchId,
          created_by: user.userId,
        }),
      { operation: 'quotation.create' },
    );
    return reply.code(201).send({ success: true, data: quotation });
  });

  // ──────────────────────────────────────────────────────────
  // GET /quotations
  // ──────────────────────────────────────────────────────────
  server.get('/quotations', { preHandler: [authenticate] }, async (request) => {
    const query = quotationListQuerySchema.parse(request.query);
    const result = await quotationService.listQuotations(query);
    return { success: true, ...result };
  });

  // ──────────────────────────────────────────────────────────
  // POST /quotations/expire — Expire overdue draft/sent quotations
  // ──────────────────────────────────────────────────────────
  server.post('/quotations/expire', { preHandler: [authenticate] }, async (request) => {
    const { today } = expireQuerySchema.parse(request.query);
    const expired = await quotationService.expireOverdueQuotations(today);
    return { success: true, data: { expired } };
  });

  // ──────────────────────────────────────────────────────────
  // GET /quotations/:id
  // ──────────────────────────────────────────────────────────
  server.get('/quotations/:id', { preHandler: [authenticate] }, async (request) => {
    const { id } = idParamsSchema.parse(request.params);
    await quotationService.refreshExpiry(id);
    return { success: true, data: await quotationService.getQuotationWithDetails(id) };
  });

  // ──────────────────────────────────────────────────────────
  // PATCH /quotations/:id — Discount, tax, validity, notes
  // ──────────────────────────────────────────────────────────
  server.patch('/quotations/:id', { preHandler: [authenticate] }, async (request) => {
    const { id } = idParamsSchema.parse(request.params);
    const body = updateQuotationSchema.parse(request.body);
    return { success: true, data: await quotationService.updateQuotation(id, body) };
  });

  // ──────────────────────────────────────────────────────────
  // Lines
  // ──────────────────────────────────────────────────────────
  server.post('/quotations/:id/lines', { preHandler: [authenticate] }, async (request, reply) => {
    const { id } = idParamsSchema.parse(request.params);
    const body = lineItemSchema.parse(request.body);
    const quotation = await quotationService.addLine(id, body);
    return reply.code(201).send({ success: true, data: quotation });
  });

  server.patch('/quotations/:id/lines/:lineId', { preHandler: [authenticate] }, async (request) => {
    const { id, lineId } = lineParamsSchema.parse(request.params);
    const body = updateQuotationLineSchema.parse(request.body);
    return { success: true, data: await quotationService.updateLine(id, lineId, body) };
  });

  server.delete('/quotations/:id/lines/:lineId', { preHandler: [authenticate] }, async (request) => {
    const { id, lineId } = lineParamsSchema.parse(request.params);
    return { success: true, data: await quotationService.removeLine(id, lineId) };
  });

  // ──────────────────────────────────────────────────────────
  // POST /quotations/:id/status
  // ──────────────────────────────────────────────────────────
  server.post('/quotations/:id/status', { preHandler: [authenticate] }, async (request) => {
    const { id } = idParamsSchema.parse(request.params);
    const { status, reason } = quotationStatusBodySchema.parse(request.body);
    const user = currentUser(request);
    return { success: true, data: await quotationService.updateStatus(id, status, user.userId, reason) };
  });

  // ──────────────────────────────────────────────────────────
  // POST /quotations/:id/cancel
  // ──────────────────────────────────────────────────────────
  server.post('/quotations/:id/cancel', { preHandler: [authenticate] }, async (request) => {
    const { id } = idParamsSchema.parse(request.params);
    const { reason } = reasonSchema.parse(request.body ?? {});
    const user = currentUser(request);
    return { success: true, data: await quotationService.cancelQuotation(id, reason, user.userId) };
  });

  // ──────────────────────────────────────────────────────────
  // POST /quotations/:id/convert — Create (or return) the invoice
  // ──────────────────────────────────────────────────────────
  server.post('/quotations/:id/convert', { preHandler: [authenticate] }, async (request, reply) => {
    const { id } = idParamsSchema.parse(request.params);
    const user = currentUser(request);
    const result = await withContentionRetry(() => quotationService.convertToInvoice(id, user.userId), {
      operation: 'quotation.convert',
    });
    return reply.code(result.created ? 201 : 200).send({ success: true, data: result.invoice, created: result.created });
  });
}
