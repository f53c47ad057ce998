import type { Knex } from 'knex';
import * as stationeryCore from './migrations/001_stationery_core';

// Migrations are registered here rather than discovered on disk, so the
// same list runs from ts sources (tests, scripts) and from dist/.
const migrations: Record<string, Knex.Migration> = {
  '001_stationery_core': stationeryCore,
};

export const migrationSource: Knex.MigrationSource<string> = {
  async getMigrations() {
    return Object.keys(migrations).sort();
  },
  getMigrationName(name) {
    return name;
  },
  async getMigration(name) {
    const migration = migrations[name];
    if (!migration) throw new Error(`Unknown migration: ${name}`);
    return migration;
  },
};
