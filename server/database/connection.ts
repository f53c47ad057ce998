import knex, { Knex } from 'knex';
import config from './knexfile';
import { env } from '../config/env';
import { moduleLogger } from '../utils/logger';

const log = moduleLogger('db');

let db: Knex | null = null;

export function getDb(): Knex {
  if (!db) {
    db = knex(config);
  }
  return db;
}

/** Either the root connection or an open transaction */
export type Db = Knex | Knex.Transaction;

export async function initializeDb(options: { migrate?: boolean } = {}): Promise<void> {
  const database = getDb();

  try {
    await database.raw('SELECT 1');
    log.info({ client: env.DB_CLIENT }, 'Connected to database');
  } catch (error) {
    log.error({ err: error }, 'Failed to connect to database');
    throw error;
  }

  if (options.migrate) {
    const [batch, applied] = await database.migrate.latest();
    log.info({ batch, applied }, 'Migrations applied');
  }
}

export async function closeDb(): Promise<void> {
  if (db) {
    await db.destroy();
    db = null;
    log.info('Connection closed');
  }
}
