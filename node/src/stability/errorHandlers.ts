// Process-level error handlers and graceful shutdown

import type { Server } from 'http';
import { logger } from '@/services/logger';
import { describeError } from '@/services/errors';

const SHUTDOWN_TIMEOUT_MS = 15000;

let serverInstance: Server | null = null;
let shuttingDown = false;

export function setServerInstance(server: Server): void {
  serverInstance = server;
}

export function setupUnhandledRejectionHandler(nodeEnv: string): void {
  process.on('unhandledRejection', (reason: unknown) => {
    logger.error('process:unhandled_rejection', {
      error: describeError(reason),
      stack: reason instanceof Error ? reason.stack : undefined,
    });

    // Production keeps serving; development exits so the fault is noticed.
    if (nodeEnv !== 'production') {
      gracefulShutdown('unhandledRejection', 1);
    }
  });
}

export function setupUncaughtExceptionHandler(): void {
  process.on('uncaughtException', (error: Error) => {
    logger.fatal('process:uncaught_exception', { error: error.message, stack: error.stack });
    gracefulShutdown('uncaughtException', 1);
  });
}

export function setupGracefulShutdown(): void {
  const signals: NodeJS.Signals[] = ['SIGTERM', 'SIGINT'];
  for (const signal of signals) {
    process.on(signal, () => gracefulShutdown(signal, 0));
  }
}

/** Stops accepting connections, lets in-flight queries finish, forces exit after the timeout. */
function gracefulShutdown(reason: string, exitCode: number): void {
  if (shuttingDown) return;
  shuttingDown = true;
  logger.info('process:shutdown', { reason });

  const forceExit = setTimeout(() => {
    logger.error('process:forced_shutdown', { timeoutMs: SHUTDOWN_TIMEOUT_MS });
    process.exit(1);
  }, SHUTDOWN_TIMEOUT_MS);
  forceExit.unref();

  if (!serverInstance) {
    process.exit(exitCode);
  } else {
    serverInstance.close((err) => {
      if (err) logger.error('process:server_close_failed', { error: err.message });
      else logger.info('process:server_closed');
      process.exit(err ? 1 : exitCode);
    });
  }
}
