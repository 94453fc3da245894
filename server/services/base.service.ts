import { Knex } from 'knex';
import { getDb, isPostgres } from '../database/connection';
import { loadConfig } from '../config';
import { PAGINATION } from '../../shared/constants';
import type { PaginatedResponse } from '../../shared/types';
import { toNumber } from '../lib/money';
import { Row } from '../lib/rows';

export interface ListOptions {
  page?: number;
  limit?: number;
  search?: string;
  searchFields?: string[];
  status?: string;
  sortBy?: string;
  sortOrder?: 'asc' | 'desc';
  filters?: Record<string, string | number | boolean | null | undefined>;
}

export class BaseService {
  protected tableName: string;

  constructor(tableName: string) {
    this.tableName = tableName;
  }

  protected get db(): Knex {
    return getDb();
  }

  /** The caller's transaction when there is one, the root connection otherwise. */
  protected conn(trx?: Knex.Transaction): Knex {
    return trx ?? this.db;
  }

  /**
   * Joins the caller's transaction when given, otherwise opens one. With the
   * single-connection SQLite pool, nested work must go through `trx`: asking
   * the root connection for a second transaction would wait forever.
   */
  protected async inTransaction<T>(
    trx: Knex.Transaction | undefined,
    work: (trx: Knex.Transaction) => Promise<T>,
  ): Promise<T> {
    if (trx) return work(trx);
    return this.db.transaction(work);
  }

  /** Like inTransaction, but a failure only rolls back to a savepoint. */
  protected async inSavepoint<T>(
    trx: Knex.Transaction | undefined,
    work: (trx: Knex.Transaction) => Promise<T>,
  ): Promise<T> {
    if (trx) return trx.transaction(work);
    return this.db.transaction(work);
  }

  protected async applyLockTimeout(trx: Knex.Transaction): Promise<void> {
    if (!isPostgres()) return;
    const ms = Math.max(1, Math.floor(loadConfig().db.lockTimeoutMs));
    await trx.raw(`SET LOCAL lock_timeout = ${ms}`);
  }

  protected async findRow(id: string, trx?: Knex.Transaction): Promise<Row | undefined> {
    const row: Row | undefined = await this.conn(trx)(this.tableName).where({ id }).first();
    return row;
  }

  protected async lockRow(id: string, trx: Knex.Transaction): Promise<Row | undefined> {
    const row: Row | undefined = await trx(this.tableName).where({ id }).forUpdate().first();
    return row;
  }

  protected async paginate<T>(
    options: ListOptions,
    mapRow: (row: Row) => T,
    scope?: (query: Knex.QueryBuilder) => void,
  ): Promise<PaginatedResponse<T>> {
    const {
      search,
      searchFields = ['name'],
      status,
      sortBy = 'created_at',
      sortOrder = 'desc',
      filters = {},
    } = options;
    const page = Math.max(PAGINATION.DEFAULT_PAGE, Math.floor(options.page ?? PAGINATION.DEFAULT_PAGE));
    const limit = Math.min(
      PAGINATION.MAX_LIMIT,
      Math.max(1, Math.floor(options.limit ?? PAGINATION.DEFAULT_LIMIT)),
    );
    const offset = (page - 1) * limit;

    const query = this.db(this.tableName);
    if (scope) scope(query);

    if (status) {
      query.where('status', status);
    }

    for (const [key, value] of Object.entries(filters)) {
      if (value !== undefined && value !== null && value !== '') {
        query.where(key, value);
      }
    }

    if (search && searchFields.length > 0) {
      const pattern = `%${search.toLowerCase()}%`;
      query.where(function () {
        for (const field of searchFields) {
          this.orWhereRaw('LOWER(??) LIKE ?', [field, pattern]);
        }
      });
    }

    const countResult: Row | undefined = await query.clone().count({ total: '*' }).first();
    const total = toNumber(countResult?.total);

    const rows: Row[] = await query.orderBy(sortBy, sortOrder).orderBy('id', 'asc').limit(limit).offset(offset);

    return {
      data: rows.map(mapRow),
      total,
      page,
      limit,
      totalPages: Math.ceil(total / limit),
    };
  }
}
