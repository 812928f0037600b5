import express, { type Request, type Response, type NextFunction } from 'express';
import type { Orchestrator } from '@/services/orchestrator';
import { logger } from '@/services/logger';
import { getCorrelationId } from '@/middleware/correlation';
import { sendError } from '@/utils/errorResponse';
import { queryRequestSchema, validateBody } from '@/validation/query.validation';

type QueryOrchestrator = Pick<Orchestrator, 'orchestrate'>;

export function createQueryRouter(orchestrator: QueryOrchestrator): express.Router {
  const router = express.Router();

  /**
   * Multi-angle analysis for one query. Responds 200 with the orchestration result even when
   * `success` is false; only malformed requests get a 4xx.
   */
  router.post('/', async (req: Request, res: Response, next: NextFunction) => {
    const validation = validateBody(queryRequestSchema, req.body);
    if (!validation.success) {
      logger.warn('POST /api/query validation failed', { errors: validation.error });
      sendError(res, 400, 'Query cannot be empty', 'bad_request', validation.error);
      return;
    }

    try {
      const { query } = validation.data;
      logger.info('flow:request', { correlationId: getCorrelationId(res), queryPreview: query.slice(0, 100) });
      const result = await orchestrator.orchestrate(query);
      res.status(200).json(result);
    } catch (err) {
      next(err);
    }
  });

  return router;
}
