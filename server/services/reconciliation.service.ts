import { invoiceService } from './invoice.service';
import { profitRecordService } from './profit-record.service';
import { stockDeductionService } from './stock-deduction.service';
import { logger } from '../lib/logger';

export interface SweepFailure {
  invoice_id: string;
  error: string;
}

export interface SweepResult {
  checked: number;
  failures: SweepFailure[];
}

/**
 * Re-runs status derivation, stock deduction and profit sync for every
 * live invoice. Repairs whatever a swallowed side effect left behind;
 * unlike the inline path, failures here are reported per invoice.
 */
class ReconciliationService {
  async runSweep(): Promise<SweepResult> {
    const invoiceIds = await invoiceService.listActiveInvoiceIds();
    const failures: SweepFailure[] = [];

    for (const invoiceId of invoiceIds) {
      try {
        await invoiceService.refreshStatusFromPayments(invoiceId);
        await stockDeductionService.deductStockIfNeeded(invoiceId);
        await profitRecordService.syncProfitRecord(invoiceId);
      } catch (err) {
        logger.error({ err, event: 'reconciliation.invoice_failed', invoiceId }, 'Reconciliation failed for invoice');
        failures.push({ invoice_id: invoiceId, error: err instanceof Error ? err.message : String(err) });
      }
    }

    logger.info({ checked: invoiceIds.length, failed: failures.length }, 'Reconciliation sweep finished');
    return { checked: invoiceIds.length, failures };
  }
}

export const reconciliationService = new ReconciliationService();
