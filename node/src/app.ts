// node/src/app.ts — Express app: security, parsing, logging, health and API routes
import express from 'express';
import cors from 'cors';
import helmet from 'helmet';
import morgan from 'morgan';
import compression from 'compression';
import rateLimit from 'express-rate-limit';

import type { AppConfig } from '@/config/app.config';
import { attachCorrelationId } from '@/middleware/correlation';
import { errorHandler, notFoundHandler } from '@/middleware/errorHandler';
import { createApiRouter } from '@/routes';
import type { PipelineDeps } from '@/services/pipeline-deps';

export const SERVICE_NAME = 'Angle Orchestrator';
export const SERVICE_VERSION = '1.0.0';

export function createApp(config: AppConfig, deps: PipelineDeps): express.Express {
  const app = express();
  const isDevelopment = config.nodeEnv === 'development';

  app.use(helmet());
  app.use(cors({ origin: config.corsOrigins, credentials: true }));

  if (!isDevelopment) {
    app.use(
      rateLimit({
        windowMs: 60 * 1000,
        limit: 100,
        standardHeaders: true,
        legacyHeaders: false,
      }),
    );
  }

  app.use(attachCorrelationId);
  app.use(express.json({ limit: '1mb' }));
  app.use(compression());
  app.use(morgan(isDevelopment ? 'dev' : 'combined'));

  app.get('/', (_req, res) => {
    res.status(200).json({ message: `${SERVICE_NAME} API is running` });
  });

  app.get('/health', (_req, res) => {
    res.status(200).json({
      status: 'healthy',
      service: SERVICE_NAME,
      version: SERVICE_VERSION,
      mode: config.mode,
      uptime: process.uptime(),
      timestamp: new Date().toISOString(),
    });
  });

  app.use('/api', createApiRouter(deps, { rateLimit: !isDevelopment }));

  app.use(notFoundHandler);
  app.use(errorHandler);
  return app;
}
