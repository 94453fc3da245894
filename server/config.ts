import dotenv from 'dotenv';
import { DEFAULT_API_PORT, DEFAULT_CURRENCY, DEFAULT_DB_PORT, DEFAULT_TAX_RATE } from '../shared/constants';

dotenv.config();

export type DbClient = 'pg' | 'better-sqlite3';

export interface AppConfig {
  port: number;
  host: string;
  nodeEnv: string;
  logLevel: string;
  jwtSecret: string;
  defaultTaxRate: number;
  defaultCurrency: string;
  db: {
    client: DbClient;
    host: string;
    port: number;
    name: string;
    user: string;
    password: string;
    filename: string;
    lockTimeoutMs: number;
  };
}

function parseNumber(value: string | undefined, fallback: number): number {
  if (value === undefined || value.trim() === '') return fallback;
  const parsed = Number(value);
  return Number.isFinite(parsed) ? parsed : fallback;
}

function parseDbClient(value: string | undefined): DbClient {
  if (!value || value === 'pg' || value === 'postgres' || value === 'postgresql') return 'pg';
  if (value === 'better-sqlite3' || value === 'sqlite') return 'better-sqlite3';
  throw new Error(`Unsupported DB_CLIENT "${value}" (expected pg or better-sqlite3)`);
}

/**
 * Reads the environment on every call so tests and tooling can adjust
 * variables before the first connection is opened.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  return {
    port: parseNumber(env.API_PORT, DEFAULT_API_PORT),
    host: env.API_HOST || '0.0.0.0',
    nodeEnv: env.NODE_ENV || 'development',
    logLevel: env.LOG_LEVEL || 'info',
    jwtSecret: env.JWT_SECRET || '',
    defaultTaxRate: parseNumber(env.DEFAULT_TAX_RATE, DEFAULT_TAX_RATE),
    defaultCurrency: env.DEFAULT_CURRENCY || DEFAULT_CURRENCY,
    db: {
      client: parseDbClient(env.DB_CLIENT),
      host: env.DB_HOST || 'localhost',
      port: parseNumber(env.DB_PORT, DEFAULT_DB_PORT),
      name: env.DB_NAME || 'business_desk',
      user: env.DB_USER || 'postgres',
      password: env.DB_PASSWORD || '',
      filename: env.DB_FILENAME || './business-desk.sqlite',
      lockTimeoutMs: parseNumber(env.DB_LOCK_TIMEOUT_MS, 5000),
    },
  };
}
