// Process-level error handlers and graceful shutdown

import type { Server } from 'node:http';
import { logger } from '@/services/logger';

let serverInstance: Server | null = null;
const cleanupTasks: Array<() => void | Promise<void>> = [];

/**
 * Set server instance for graceful shutdown
 */
export function setServerInstance(server: Server): void {
  serverInstance = server;
}

/** Runs during shutdown after the server stops accepting requests. */
export function onShutdown(task: () => void | Promise<void>): void {
  cleanupTasks.push(task);
}

export function setupUnhandledRejectionHandler(): void {
  process.on('unhandledRejection', (reason: unknown) => {
    logger.error('process:unhandled_rejection', {
      reason: reason instanceof Error ? reason.message : String(reason),
      stack: reason instanceof Error ? reason.stack : undefined,
    });

    // production keeps serving; development exits so the failure is seen
    if (process.env.NODE_ENV !== 'production') {
      process.exit(1);
    }
  });
}

export function setupUncaughtExceptionHandler(): void {
  process.on('uncaughtException', (error: Error) => {
    logger.fatal('process:uncaught_exception', { error: error.message, stack: error.stack });
    void gracefulShutdown('uncaughtException');
  });
}

export function setupGracefulShutdown(): void {
  const signals: NodeJS.Signals[] = ['SIGTERM', 'SIGINT'];

  signals.forEach((signal) => {
    process.on(signal, () => {
      logger.info('process:signal', { signal });
      void gracefulShutdown(signal);
    });
  });
}

async function gracefulShutdown(reason: string): Promise<void> {
  logger.info('process:shutdown_start', { reason });

  if (serverInstance) {
    serverInstance.close(() => {
      logger.info('process:http_closed');
    });
  }

  // hard stop if cleanup hangs
  const shutdownTimeout = setTimeout(() => {
    logger.error('process:forced_shutdown');
    process.exit(1);
  }, 15000);

  try {
    for (const task of cleanupTasks) await task();
    logger.info('process:cleanup_done');
    clearTimeout(shutdownTimeout);
    process.exit(0);
  } catch (error) {
    logger.error('process:shutdown_error', { error: error instanceof Error ? error.message : String(error) });
    clearTimeout(shutdownTimeout);
    process.exit(1);
  }
}
