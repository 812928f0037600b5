import express, { type Request, type Response, type NextFunction } from 'express';
import type { FollowUpService } from '@/services/follow-up';
import { AssistantTransportError } from '@/services/errors';
import { logger } from '@/services/logger';
import { sendError } from '@/utils/errorResponse';
import { feedbackRequestSchema, followUpRequestSchema, validateBody } from '@/validation/query.validation';

type FollowUps = Pick<FollowUpService, 'sendFollowUp' | 'giveFeedback'>;

/** Follow-ups on an angle's conversation and feedback on its messages. */
export function createConversationRouter(followUps: FollowUps): express.Router {
  const router = express.Router();

  router.post('/conversations/:conversationId/followups', async (req: Request, res: Response, next: NextFunction) => {
    const validation = validateBody(followUpRequestSchema, req.body);
    if (!validation.success) {
      sendError(res, 400, 'Invalid follow-up request', 'bad_request', validation.error);
      return;
    }

    try {
      const result = await followUps.sendFollowUp(req.params.conversationId, validation.data.message);
      res.status(result.ok ? 200 : 502).json(result);
    } catch (err) {
      next(err);
    }
  });

  router.post('/messages/:messageId/feedback', async (req: Request, res: Response, next: NextFunction) => {
    const validation = validateBody(feedbackRequestSchema, req.body);
    if (!validation.success) {
      sendError(res, 400, 'Invalid feedback request', 'bad_request', validation.error);
      return;
    }

    try {
      const ack = await followUps.giveFeedback(req.params.messageId, validation.data.feedback);
      res.status(200).json({ success: true, data: ack });
    } catch (err) {
      if (err instanceof AssistantTransportError) {
        logger.warn('feedback:transport_error', { messageId: req.params.messageId, status: err.status });
        sendError(res, 502, err.message, 'assistant_unavailable');
        return;
      }
      next(err);
    }
  });

  return router;
}
