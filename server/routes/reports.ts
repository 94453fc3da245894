import { FastifyInstance } from 'fastify';
import { authenticate } from '../plugins/auth.plugin';
import { profitRecordService } from '../services/profit-record.service';
import { reconciliationService } from '../services/reconciliation.service';
import { profitQuerySchema } from '../schemas/documents';

export async function reportRoutes(server: FastifyInstance) {
  // ──────────────────────────────────────────────────────────
  // GET /profit-records
  // ──────────────────────────────────────────────────────────
  server.get('/profit-records', { preHandler: [authenticate] }, async (request) => {
    const { branch_id, ...query } = profitQuerySchema.parse(request.query);
    const result = await profitRecordService.listProfitRecords({ ...query, branchId: branch_id });
    return { success: true, ...result };
  });

  // ──────────────────────────────────────────────────────────
  // GET /profit-records/summary
  // ──────────────────────────────────────────────────────────
  server.get('/profit-records/summary', { preHandler: [authenticate] }, async (request) => {
    const { from, to, branch_id } = profitQuerySchema.parse(request.query);
    const summary = await profitRecordService.summarize({ from, to, branchId: branch_id });
    return { success: true, data: summary };
  });

  // ──────────────────────────────────────────────────────────
  // POST /reconciliation/run — Repair stock and profit drift
  // ──────────────────────────────────────────────────────────
  server.post('/reconciliation/run', { preHandler: [authenticate] }, async () => {
    return { success: true, data: await reconciliationService.runSweep() };
  });
}
