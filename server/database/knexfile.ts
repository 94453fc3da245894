import type { Knex } from 'knex';
import { loadConfig } from '../config';
import { migrationSource } from './migrations';
import { logger } from '../lib/logger';

/**
 * SQLite ignores FOR UPDATE (the single pooled connection already
 * serialises writers), and Knex warns about it on every locking query.
 */
function quietLockWarnings(message: string): void {
  if (message.includes('not supported by sqlite')) return;
  logger.warn({ source: 'knex' }, message);
}

export function buildKnexConfig(env: NodeJS.ProcessEnv = process.env): Knex.Config {
  const { db } = loadConfig(env);

  if (db.client === 'better-sqlite3') {
    return {
      client: 'better-sqlite3',
      connection: { filename: db.filename },
      useNullAsDefault: true,
      pool: {
        afterCreate: (conn: { pragma(source: string): unknown }, done: (err: Error | null, conn: unknown) => void) => {
          conn.pragma('foreign_keys = ON');
          done(null, conn);
        },
      },
      migrations: { migrationSource, tableName: 'knex_migrations' },
      log: { warn: quietLockWarnings },
    };
  }

  return {
    client: 'pg',
    connection: {
      host: db.host,
      port: db.port,
      database: db.name,
      user: db.user,
      password: db.password,
    },
    pool: {
      min: 2,
      max: 10,
    },
    migrations: { migrationSource, tableName: 'knex_migrations' },
  };
}

export default buildKnexConfig();
