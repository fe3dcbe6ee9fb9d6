/**
 * Graceful shutdown for the trading engine process.
 *
 * Handlers run in registration order so the pipeline can stop and cancel
 * orders before persistence and the database pool are closed.
 */

import { createLogger } from './logger';

const logger = createLogger('shutdown');

type ShutdownHandler = (signal: string) => Promise<void>;

let isShuttingDown = false;
const shutdownHandlers: ShutdownHandler[] = [];

/**
 * Register a graceful shutdown handler
 */
export function addShutdownHandler(handler: ShutdownHandler): void {
  shutdownHandlers.push(handler);
}

export async function runShutdownHandlers(signal: string): Promise<void> {
  for (const [index, handler] of shutdownHandlers.entries()) {
    try {
      logger.info(`Executing shutdown handler ${index + 1}/${shutdownHandlers.length}`);
      await handler(signal);
    } catch (error) {
      logger.error(`Shutdown handler ${index + 1} failed`, { error });
    }
  }
}

/**
 * Install signal and last-chance error handlers. Called once from the
 * process entry point, never at import.
 */
export function gracefulShutdown(timeoutMs: number = 30_000): void {
  const shutdown = (signal: string, exitCode: number) => {
    if (isShuttingDown) {
      logger.warn(`Received ${signal} during shutdown, forcing exit`);
      process.exit(1);
    }
    isShuttingDown = true;
    logger.info(`Received ${signal}, initiating graceful shutdown`);

    const timer = setTimeout(() => {
      logger.error('Shutdown timeout exceeded, forcing exit');
      process.exit(1);
    }, timeoutMs);

    runShutdownHandlers(signal)
      .then(() => {
        clearTimeout(timer);
        logger.info('Trading engine shutdown completed');
        process.exit(exitCode);
      })
      .catch((error: unknown) => {
        logger.error('Error during graceful shutdown', { error });
        process.exit(1);
      });
  };

  const signals: NodeJS.Signals[] = ['SIGTERM', 'SIGINT'];
  signals.forEach((signal) => {
    process.on(signal, () => shutdown(signal, 0));
  });

  process.on('uncaughtException', (error) => {
    logger.error('Uncaught exception', { error: error.message, stack: error.stack });
    shutdown('UNCAUGHT_EXCEPTION', 1);
  });

  process.on('unhandledRejection', (reason) => {
    logger.error('Unhandled promise rejection', {
      reason: reason instanceof Error ? reason.message : reason,
      stack: reason instanceof Error ? reason.stack : undefined,
    });
    shutdown('UNHANDLED_REJECTION', 1);
  });
}
