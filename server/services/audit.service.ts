// =============================================================
// File: server/services/audit.service.ts
// Description: Lightweight audit trail for document lifecycle
//              events (status changes, conversions, payments,
//              refunds, numbering fallbacks). Writing an event
//              never fails the operation that triggered it.
// =============================================================

import { randomUUID } from 'crypto';
import { Knex } from 'knex';
import { BaseService } from './base.service';
import type { AuditAction, AuditEvent } from '../../shared/types';
import { AUDIT_ACTIONS } from '../../shared/constants';
import { logger } from '../lib/logger';
import { toTimestamp } from '../lib/dates';
import { Row, jsonObject, str, strOrNull } from '../lib/rows';

// ────────────────────────────────────────────────────────────
// Interfaces
// ────────────────────────────────────────────────────────────

export interface AuditEntry {
  action: AuditAction;
  actorId?: string | null;
  entityType: string;
  entityId?: string | null;
  summary?: string;
  meta?: Record<string, unknown>;
}

function toAction(value: unknown): AuditAction {
  const action = str(value);
  for (const known of Object.values(AUDIT_ACTIONS)) {
    if (known === action) return known;
  }
  throw new Error(`Unknown audit action in storage: ${action}`);
}

function mapAuditRow(row: Row): AuditEvent {
  return {
    id: str(row.id),
    action: toAction(row.action),
    actor_id: strOrNull(row.actor_id),
    entity_type: str(row.entity_type),
    entity_id: strOrNull(row.entity_id),
    summary: str(row.summary),
    meta: jsonObject(row.meta),
    created_at: toTimestamp(row.created_at) ?? '',
  };
}

// ────────────────────────────────────────────────────────────
// Service
// ────────────────────────────────────────────────────────────

class AuditService extends BaseService {
  constructor() {
    super('audit_events');
  }

  /**
   * Record an audit event. Runs in its own savepoint when a transaction is
   * given so a failed insert leaves the caller's transaction usable.
   */
  async log(entry: AuditEntry, trx?: Knex.Transaction): Promise<void> {
    try {
      await this.inSavepoint(trx, async (inner) => {
        await inner(this.tableName).insert({
          id: randomUUID(),
          action: entry.action,
          actor_id: entry.actorId ?? null,
          entity_type: entry.entityType,
          entity_id: entry.entityId ?? null,
          summary: entry.summary ?? '',
          meta: JSON.stringify(entry.meta ?? {}),
          created_at: new Date().toISOString(),
        });
      });
    } catch (err) {
      logger.warn(
        { err, event: 'audit.write_failed', action: entry.action, entityType: entry.entityType, entityId: entry.entityId },
        'Failed to write audit event',
      );
    }
  }

  async listForEntity(entityType: string, entityId: string, trx?: Knex.Transaction): Promise<AuditEvent[]> {
    const rows: Row[] = await this.conn(trx)(this.tableName)
      .where({ entity_type: entityType, entity_id: entityId })
      .orderBy('created_at', 'asc')
      .orderBy('id', 'asc');
    return rows.map(mapAuditRow);
  }

  async listByAction(action: AuditAction, trx?: Knex.Transaction): Promise<AuditEvent[]> {
    const rows: Row[] = await this.conn(trx)(this.tableName)
      .where({ action })
      .orderBy('created_at', 'asc')
      .orderBy('id', 'asc');
    return rows.map(mapAuditRow);
  }
}

export const auditService = new AuditService();
