/**
 * Trading engine entry point
 */

import { config } from './config';
import { closeDatabase, initializeDatabase } from './database/connection';
import { createTradingEngine } from './engine';
import { KnexStatePersistence } from './models/engine-state';
import { InMemoryStatePersistence, type StatePersistence } from './services/state-persistence';
import { addShutdownHandler, gracefulShutdown } from './utils/graceful-shutdown';
import { logger } from './utils/logger';

async function createPersistence(): Promise<StatePersistence> {
  if (config.persistence.driver === 'postgres') {
    const db = await initializeDatabase(config.persistence, config.env);
    return new KnexStatePersistence(db);
  }
  return new InMemoryStatePersistence();
}

async function main(): Promise<void> {
  gracefulShutdown();

  const persistence = await createPersistence();
  const engine = createTradingEngine(config, { persistence });

  addShutdownHandler(async () => {
    await engine.close();
    await closeDatabase();
  });

  await engine.restore();
  const { haltReason } = engine.snapshot();

  engine.onSystemState((event) => {
    logger.debug('system.state', {
      running: event.data.running,
      dailyPnl: event.data.dailyPnl.total,
      positions: event.data.positions.length,
    });
  });

  if (haltReason) {
    // A halt survives restarts; only an explicit start clears it
    engine.broadcaster.start();
    logger.warn('Restored a halted engine, trading stays stopped', { haltReason });
    return;
  }

  engine.start();
  logger.info('Trading engine running', {
    environment: config.env,
    symbols: config.symbols,
    feed: config.trend.feedMode,
    persistence: config.persistence.driver,
  });
}

main().catch((error: unknown) => {
  logger.error('Failed to start trading engine', { error });
  process.exit(1);
});
