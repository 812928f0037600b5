// Load environment variables FIRST: imports below read process.env when they load
import 'dotenv/config';

import { createApp } from './app';
import { loadAppConfig } from '@/config/app.config';
import { describeError } from '@/services/errors';
import { applyLogLevel, logger } from '@/services/logger';
import { buildPipelineDeps } from '@/services/pipeline-deps';
import {
  setServerInstance,
  setupGracefulShutdown,
  setupUncaughtExceptionHandler,
  setupUnhandledRejectionHandler,
} from '@/stability/errorHandlers';

function startServer(): void {
  try {
    applyLogLevel(process.env.LOG_LEVEL);
    const config = loadAppConfig();
    const app = createApp(config, buildPipelineDeps(config));

    setupUnhandledRejectionHandler(config.nodeEnv);
    setupUncaughtExceptionHandler();
    setupGracefulShutdown();

    const server = app.listen(config.port, '0.0.0.0', () => {
      logger.info('server:listening', {
        url: `http://localhost:${config.port}`,
        environment: config.nodeEnv,
        mode: config.mode,
        health: `http://localhost:${config.port}/health`,
      });
    });
    setServerInstance(server);
  } catch (error) {
    logger.fatal('server:start_failed', { error: describeError(error) });
    process.exit(1);
  }
}

startServer();
