import type { Knex } from 'knex';
import * as createEngineTables from './001_create_engine_tables';

const migrations: Record<string, Knex.Migration> = {
  '001_create_engine_tables': createEngineTables,
};

/**
 * Migrations are bundled with the code rather than discovered on disk, so
 * the same list runs under tsx, the test runner and a compiled build.
 */
export const migrationSource: Knex.MigrationSource<string> = {
  getMigrations: async () => Object.keys(migrations).sort(),
  getMigrationName: (name) => name,
  getMigration: async (name) => {
    const migration = migrations[name];
    if (!migration) {
      throw new Error(`Unknown migration: ${name}`);
    }
    return migration;
  },
};
