import { FastifyInstance } from 'fastify';
import { authenticate, currentUser } from '../plugins/auth.plugin';
import { customerService } from '../services/customer.service';
import { createCustomerSchema, catalogListQuerySchema } from '../schemas/catalog';
import { idParamsSchema } from '../schemas/common';

export async function customerRoutes(server: FastifyInstance) {
  // ──────────────────────────────────────────────────────────
  // POST /customers
  // ──────────────────────────────────────────────────────────
  server.post('/customers', { preHandler: [authenticate] }, async (request, reply) => {
    const body = createCustomerSchema.parse(request.body);
    const user = currentUser(request);
    const customer = await customerService.createCustomer({
      ...body,
      branch_id: body.branch_id ?? user.branchId,
    });
    return reply.code(201).send({ success: true, data: customer });
  });

  // ──────────────────────────────────────────────────────────
  // GET /customers
  // ──────────────────────────────────────────────────────────
  server.get('/customers', { preHandler: [authenticate] }, async (request) => {
    const query = catalogListQuerySchema.parse(request.query);
    const result = await customerService.listCustomers({ ...query, sortBy: 'name' });
    return { success: true, ...result };
  });

  // ──────────────────────────────────────────────────────────
  // GET /customers/:id
  // ──────────────────────────────────────────────────────────
  server.get('/customers/:id', { preHandler: [authenticate] }, async (request) => {
    const { id } = idParamsSchema.parse(request.params);
    return { success: true, data: await customerService.getCustomer(id) };
  });
}
