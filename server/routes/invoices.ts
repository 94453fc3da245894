// =============================================================
// File: server/routes/invoices.ts
// Description: Invoice endpoints: create, list, get (with
//              payments, refunds, balance and profit), header
//              edits, line CRUD, issue, cancel, sign, balance
//              and payments.
// =============================================================

import { FastifyInstance } from 'fastify';
import { authenticate, currentUser } from '../plugins/auth.plugin';
import { invoiceService } from '../services/invoice.service';
import { paymentService } from '../services/payment.service';
import { idParamsSchema, lineParamsSchema, reasonSchema } from '../schemas/common';
import {
  createInvoiceSchema,
  invoiceLineSchema,
  invoiceListQuerySchema,
  recordPaymentSchema,
  signInvoiceSchema,
  updateInvoiceLineSchema,
  updateInvoiceSchema,
} from '../schemas/documents';
import { withContentionRetry } from '../lib/contention';

export async function invoiceRoutes(server: FastifyInstance) {
  // ──────────────────────────────────────────────────────────
  // POST /invoices — Create standalone invoice
  // ──────────────────────────────────────────────────────────
  server.post('/invoices', { preHandler: [authenticate] }, async (request, reply) => {
    const body = createInvoiceSchema.parse(request.body);
    const user = currentUser(request);
    const invoice = await withContentionRetry(
      () =>
        invoiceService.createInvoice({
          ...body,
          branch_id: body.branch_id ?? user.branchId,
          prepared_by_name: body.prepared_by_name ?? user.name,
          created_by: user.userId,
        }),
      { operation: 'invoice.create' },
    );
    return reply.code(201).send({ success: true, data: invoice });
  });

  // ──────────────────────────────────────────────────────────
  // GET /invoices
  // ──────────────────────────────────────────────────────────
  server.get('/invoices', { preHandler: [authenticate] }, async (request) => {
    const query = invoiceListQuerySchema.parse(request.query);
    const result = await invoiceService.listInvoices(query);
    return { success: true, ...result };
  });

  // ──────────────────────────────────────────────────────────
  // GET /invoices/:id
  // ──────────────────────────────────────────────────────────
  server.get('/invoices/:id', { preHandler: [authenticate] }, async (request) => {
    const { id } = idParamsSchema.parse(request.params);
    return { success: true, data: await invoiceService.getInvoiceWithDetails(id) };
  });

  // ──────────────────────────────────────────────────────────
  // PATCH /invoices/:id
  // ──────────────────────────────────────────────────────────
  server.patch('/invoices/:id', { preHandler: [authenticate] }, async (request) => {
    const { id } = idParamsSchema.parse(request.params);
    const body = updateInvoiceSchema.parse(request.body);
    return { success: true, data: await invoiceService.updateInvoice(id, body) };
  });

  // ──────────────────────────────────────────────────────────
  // Lines
  // ──────────────────────────────────────────────────────────
  server.post('/invoices/:id/lines', { preHandler: [authenticate] }, async (request, reply) => {
    const { id } = idParamsSchema.parse(request.params);
    const body = invoiceLineSchema.parse(request.body);
    const invoice = await invoiceService.addLine(id, body);
    return reply.code(201).send({ success: true, data: invoice });
  });

  server.patch('/invoices/:id/lines/:lineId', { preHandler: [authenticate] }, async (request) => {
    const { id, lineId } = lineParamsSchema.parse(request.params);
    const body = updateInvoiceLineSchema.parse(request.body);
    return { success: true, data: await invoiceService.updateLine(id, lineId, body) };
  });

  server.delete('/invoices/:id/lines/:lineId', { preHandler: [authenticate] }, async (request) => {
    const { id, lineId } = lineParamsSchema.parse(request.params);
    return { success: true, data: await invoiceService.removeLine(id, lineId) };
  });

  // ──────────────────────────────────────────────────────────
  // POST /invoices/:id/issue
  // ──────────────────────────────────────────────────────────
  server.post('/invoices/:id/issue', { preHandler: [authenticate] }, async (request) => {
    const { id } = idParamsSchema.parse(request.params);
    const user = currentUser(request);
    return { success: true, data: await invoiceService.issueInvoice(id, user.userId) };
  });

  // ──────────────────────────────────────────────────────────
  // POST /invoices/:id/cancel
  // ──────────────────────────────────────────────────────────
  server.post('/invoices/:id/cancel', { preHandler: [authenticate] }, async (request) => {
    const { id } = idParamsSchema.parse(request.params);
    const { reason } = reasonSchema.parse(request.body ?? {});
    const user = currentUser(request);
    return { success: true, data: await invoiceService.cancelInvoice(id, reason, user.userId) };
  });

  // ──────────────────────────────────────────────────────────
  // POST /invoices/:id/sign
  // ──────────────────────────────────────────────────────────
  server.post('/invoices/:id/sign', { preHandler: [authenticate] }, async (request) => {
    const { id } = idParamsSchema.parse(request.params);
    const { signed_by_name } = signInvoiceSchema.parse(request.body);
    const user = currentUser(request);
    return { success: true, data: await invoiceService.signInvoice(id, signed_by_name, user.userId) };
  });

  // ──────────────────────────────────────────────────────────
  // GET /invoices/:id/balance
  // ──────────────────────────────────────────────────────────
  server.get('/invoices/:id/balance', { preHandler: [authenticate] }, async (request) => {
    const { id } = idParamsSchema.parse(request.params);
    return { success: true, data: await invoiceService.computeBalance(id) };
  });

  // ──────────────────────────────────────────────────────────
  // GET /invoices/:id/payments
  // ──────────────────────────────────────────────────────────
  server.get('/invoices/:id/payments', { preHandler: [authenticate] }, async (request) => {
    const { id } = idParamsSchema.parse(request.params);
    await invoiceService.getInvoice(id);
    return { success: true, data: await paymentService.listPaymentsForInvoice(id) };
  });

  // ──────────────────────────────────────────────────────────
  // POST /invoices/:id/payments — Record a payment
  // ──────────────────────────────────────────────────────────
  server.post('/invoices/:id/payments', { preHandler: [authenticate] }, async (request, reply) => {
    const { id } = idParamsSchema.parse(request.params);
    const body = recordPaymentSchema.parse(request.body);
    const user = currentUser(request);
    const payment = await withContentionRetry(
      () => paymentService.recordPayment({ ...body, invoice_id: id, recorded_by: user.userId }),
      { operation: 'payment.record' },
    );
    return reply.code(201).send({ success: true, data: payment });
  });
}
