import knex, { Knex } from 'knex';
import { buildKnexConfig } from './knexfile';
import { logger } from '../lib/logger';

let db: Knex | null = null;
let dbClient: string | null = null;

export function getDb(): Knex {
  if (!db) {
    const config = buildKnexConfig();
    dbClient = typeof config.client === 'string' ? config.client : null;
    db = knex(config);
  }
  return db;
}

export function isPostgres(): boolean {
  getDb();
  return dbClient === 'pg';
}

export async function initializeDb(): Promise<void> {
  const database = getDb();

  try {
    await database.raw('SELECT 1');
    logger.info({ client: dbClient }, '[DB] Connected');
  } catch (error) {
    logger.error({ err: error }, '[DB] Failed to connect');
    throw error;
  }

  const [batch, applied] = await database.migrate.latest();
  if (applied.length > 0) {
    logger.info({ batch, migrations: applied }, '[DB] Migrations applied');
  }
}

export async function closeDb(): Promise<void> {
  if (db) {
    await db.destroy();
    db = null;
    dbClient = null;
    logger.info('[DB] Connection closed');
  }
}
