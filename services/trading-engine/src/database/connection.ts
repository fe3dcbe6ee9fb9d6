import { knex, Knex } from 'knex';
import type { EngineConfig } from '../config';
import { createLogger } from '../utils/logger';
import { migrationSource } from './migrations';

const logger = createLogger('database');

let database: Knex | undefined;

const createKnexConfig = (
  persistence: EngineConfig['persistence'],
  env: EngineConfig['env']
): Knex.Config => ({
  client: 'pg',
  connection: persistence.databaseUrl,
  pool: {
    min: 1,
    max: persistence.maxConnections,
    acquireTimeoutMillis: 60000,
    createTimeoutMillis: 30000,
    destroyTimeoutMillis: 5000,
    idleTimeoutMillis: 30000,
    reapIntervalMillis: 1000,
    createRetryIntervalMillis: 200,
  },
  migrations: {
    migrationSource,
    tableName: 'knex_migrations',
  },
  asyncStackTraces: env === 'development',
  log: {
    warn(message) {
      logger.warn('Database warning', { message });
    },
    error(message) {
      logger.error('Database error', { message });
    },
    deprecate(message) {
      logger.warn('Database deprecation', { message });
    },
    debug(message) {
      if (env === 'development') {
        logger.debug('Database debug', { message });
      }
    },
  },
});

export const initializeDatabase = async (
  persistence: EngineConfig['persistence'],
  env: EngineConfig['env']
): Promise<Knex> => {
  try {
    database = knex(createKnexConfig(persistence, env));

    // Test the connection
    await database.raw('SELECT 1');
    logger.info('Engine database connection established');

    await database.migrate.latest();
    logger.info('Database migrations completed');

    return database;
  } catch (error) {
    logger.error('Failed to initialize database', { error });
    throw error;
  }
};

export const closeDatabase = async (): Promise<void> => {
  if (database) {
    await database.destroy();
    database = undefined;
    logger.info('Engine database connection closed');
  }
};
