// src/services/response-normalizer.ts
import type { AngleResult, NormalizedResponse } from '@/types/core';
import { logger } from './logger';

/** Drops failed branches and projects the rest; optional fields were defaulted when the message was parsed. */
export function normalizeResponses(results: AngleResult[]): NormalizedResponse[] {
  const normalized: NormalizedResponse[] = [];

  for (const result of results) {
    if (!result.ok) {
      logger.debug('normalizer:skip_failed', { angle: result.angle, error: result.error });
      continue;
    }

    const { data } = result;
    if (data.state !== 'COMPLETED') {
      logger.warn('normalizer:soft_timeout', { angle: result.angle, state: data.state });
    }

    normalized.push({
      angle: result.angle,
      conversationId: result.conversationId,
      messageId: result.messageId,
      content: data.content,
      sources: data.sources,
      metadata: data.metadata,
      timestamp: data.timestamp,
      status: data.state,
    });
  }

  return normalized;
}
