/** Route aggregator. */
import express from 'express';
import type { PipelineDeps } from '@/services/pipeline-deps';
import { queryRateLimiter } from '@/middleware/rate-limit-query';
import { createConversationRouter } from './conversations';
import { createQueryRouter } from './query';

export function createApiRouter(deps: PipelineDeps, options: { rateLimit: boolean }): express.Router {
  const router = express.Router();
  if (options.rateLimit) router.use('/query', queryRateLimiter);
  router.use('/query', createQueryRouter(deps.orchestrator));
  router.use('/', createConversationRouter(deps.followUps));
  return router;
}
