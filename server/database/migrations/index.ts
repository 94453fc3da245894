import { Knex } from 'knex';
import * as catalogAndClients from './001_catalog_and_clients';
import * as salesDocuments from './002_sales_documents';

const migrations: Record<string, Knex.Migration> = {
  '001_catalog_and_clients': catalogAndClients,
  '002_sales_documents': salesDocuments,
};

/**
 * Migrations are bundled with the code instead of discovered on disk, so the
 * same list runs under tsx, Vitest and a compiled build.
 */
export const migrationSource: Knex.MigrationSource<string> = {
  async getMigrations() {
    return Object.keys(migrations).sort();
  },
  getMigrationName(migration) {
    return migration;
  },
  async getMigration(migration) {
    const found = migrations[migration];
    if (!found) throw new Error(`Unknown migration: ${migration}`);
    return found;
  },
};
