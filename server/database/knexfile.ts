import type { Knex } from 'knex';
import { types } from 'pg';
import { env } from '../config/env';
import { moduleLogger } from '../utils/logger';
import { migrationSource } from './migration-source';

const log = moduleLogger('knex');

// numeric -> number, bigint counts -> number, date -> 'YYYY-MM-DD' as stored
types.setTypeParser(1700, (val: string) => parseFloat(val));
types.setTypeParser(20, (val: string) => parseInt(val, 10));
types.setTypeParser(1082, (val: string) => val);

interface SqliteConnection {
  pragma(source: string): unknown;
}

function buildConfig(): Knex.Config {
  const shared: Knex.Config = {
    migrations: {
      migrationSource,
      tableName: 'knex_migrations',
    },
    log: {
      warn: (message: string) => log.warn(message),
      error: (message: string) => log.error(message),
      deprecate: (method: string, alternative: string) =>
        log.warn(`${method} is deprecated, use ${alternative}`),
      debug: (message: string) => log.debug(message),
    },
  };

  if (env.DB_CLIENT === 'better-sqlite3') {
    return {
      ...shared,
      client: 'better-sqlite3',
      connection: { filename: env.DB_FILENAME },
      useNullAsDefault: true,
      pool: {
        // One connection: SQLite serializes writers, and :memory: is per connection
        min: 1,
        max: 1,
        afterCreate: (conn: SqliteConnection, done: (err: Error | null, conn: SqliteConnection) => void) => {
          conn.pragma('foreign_keys = ON');
          done(null, conn);
        },
      },
    };
  }

  return {
    ...shared,
    client: 'pg',
    connection: {
      host: env.DB_HOST,
      port: env.DB_PORT,
      database: env.DB_NAME,
      user: env.DB_USER,
      password: env.DB_PASSWORD,
    },
    pool: {
      min: 2,
      max: 10,
    },
  };
}

const config: Knex.Config = buildConfig();

export default config;
