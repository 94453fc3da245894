import { FastifyInstance } from 'fastify';
import { authenticate, currentUser } from '../plugins/auth.plugin';
import { paymentService } from '../services/payment.service';
import { refundService } from '../services/refund.service';
import { idParamsSchema } from '../schemas/common';
import { recordRefundSchema } from '../schemas/documents';
import { withContentionRetry } from '../lib/contention';

export async function paymentRoutes(server: FastifyInstance) {
  // ──────────────────────────────────────────────────────────
  // GET /payments/:id
  // ──────────────────────────────────────────────────────────
  server.get('/payments/:id', { preHandler: [authenticate] }, async (request) => {
    const { id } = idParamsSchema.parse(request.params);
    const payment = await paymentService.getPayment(id);
    const refundable = await refundService.refundableAmount(id);
    return { success: true, data: { ...payment, refundable_amount: refundable } };
  });

  // ──────────────────────────────────────────────────────────
  // GET /payments/:id/refunds
  // ──────────────────────────────────────────────────────────
  server.get('/payments/:id/refunds', { preHandler: [authenticate] }, async (request) => {
    const { id } = idParamsSchema.parse(request.params);
    await paymentService.getPayment(id);
    return { success: true, data: await refundService.listRefundsForPayment(id) };
  });

  // ──────────────────────────────────────────────────────────
  // POST /payments/:id/refunds — Refund part of a payment
  // ──────────────────────────────────────────────────────────
  server.post('/payments/:id/refunds', { preHandler: [authenticate] }, async (request, reply) => {
    const { id } = idParamsSchema.parse(request.params);
    const body = recordRefundSchema.parse(request.body);
    const user = currentUser(request);
    const refund = await withContentionRetry(
      () => refundService.recordRefund({ ...body, payment_id: id, refunded_by: user.userId }),
      { operation: 'refund.record' },
    );
    return reply.code(201).send({ success: true, data: refund });
  });

  // ──────────────────────────────────────────────────────────
  // DELETE /refunds/:id
  // ──────────────────────────────────────────────────────────
  server.delete('/refunds/:id', { preHandler: [authenticate] }, async (request) => {
    const { id } = idParamsSchema.parse(request.params);
    const user = currentUser(request);
    await withContentionRetry(() => refundService.deleteRefund(id, user.userId), { operation: 'refund.delete' });
    return { success: true, message: 'Refund deleted' };
  });
}
