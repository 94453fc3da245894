// =============================================================
// File: server/services/document-sequence.service.ts
// Description: Per-kind, per-year document numbering
//              ("INV-2025-00042"). Counters are created lazily
//              and only ever incremented under a row lock.
// =============================================================

import { Knex } from 'knex';
import { BaseService } from './base.service';
import { auditService } from './audit.service';
import { AUDIT_ACTIONS, DOCUMENT_PREFIXES, SEQUENCE_PAD_LENGTH } from '../../shared/constants';
import type { DocumentKind } from '../../shared/types';
import { logger } from '../lib/logger';
import { toNumber } from '../lib/money';
import { Row } from '../lib/rows';

export interface IssuedNumber {
  number: string;
  /** True when the counter could not be used and a timestamp number was issued instead. */
  degraded: boolean;
}

export function formatDocumentNumber(kind: DocumentKind, year: number, value: number): string {
  return `${DOCUMENT_PREFIXES[kind]}-${year}-${String(value).padStart(SEQUENCE_PAD_LENGTH, '0')}`;
}

class DocumentSequenceService extends BaseService {
  constructor() {
    super('document_sequences');
  }

  /**
   * Reserve the next number for (kind, year). Runs in a savepoint of the
   * caller's transaction so the reservation commits or rolls back with the
   * document that uses it.
   */
  async nextNumber(kind: DocumentKind, year: number = new Date().getFullYear(), trx?: Knex.Transaction): Promise<string> {
    return this.inSavepoint(trx, async (inner) => {
      await this.applyLockTimeout(inner);

      await inner(this.tableName)
        .insert({ kind, year, last_number: 0 })
        .onConflict(['kind', 'year'])
        .ignore();

      const counter: Row | undefined = await inner(this.tableName)
        .where({ kind, year })
        .forUpdate()
        .first();
      if (!counter) {
        throw new Error(`Sequence counter missing for ${kind}/${year}`);
      }

      const next = toNumber(counter.last_number) + 1;
      await inner(this.tableName).where({ kind, year }).update({ last_number: next });

      return formatDocumentNumber(kind, year, next);
    });
  }

  /**
   * Never throws. When the counter is unavailable, issues a timestamp-based
   * number so the document can still be saved, and records the event.
   */
  async nextNumberOrFallback(
    kind: DocumentKind,
    year: number = new Date().getFullYear(),
    trx?: Knex.Transaction,
  ): Promise<IssuedNumber> {
    try {
      return { number: await this.nextNumber(kind, year, trx), degraded: false };
    } catch (err) {
      const number = `${DOCUMENT_PREFIXES[kind]}-${year}-T${Date.now()}`;
      logger.warn({ err, event: 'sequence.fallback', kind, year, number }, 'Sequence unavailable, issued fallback number');
      await auditService.log(
        {
          action: AUDIT_ACTIONS.SEQUENCE_FALLBACK,
          entityType: 'document_sequence',
          summary: `Fallback number ${number} issued for ${kind}`,
          meta: { kind, year, number, error: err instanceof Error ? err.message : String(err) },
        },
        trx,
      );
      return { number, degraded: true };
    }
  }

  async peek(kind: DocumentKind, year: number = new Date().getFullYear(), trx?: Knex.Transaction): Promise<number> {
    const counter: Row | undefined = await this.conn(trx)(this.tableName).where({ kind, year }).first();
    return counter ? toNumber(counter.last_number) : 0;
  }
}

export const documentSequenceService = new DocumentSequenceService();
