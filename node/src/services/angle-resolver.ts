// src/services/angle-resolver.ts — one angle → one assistant conversation, polled to completion
import type { PollingConfig } from '@/config/app.config';
import {
  CREATE_CONVERSATION_FAILED,
  NO_MESSAGE_ID,
  TERMINAL_STATES,
  type Angle,
  type AngleResult,
  type AssistantMessage,
} from '@/types/core';
import type { AssistantCapability } from './assistant-client';
import { describeError } from './errors';
import { logger } from './logger';

export const DEFAULT_POLLING: PollingConfig = { intervalMs: 2000, maxAttempts: 60 };

export type Sleep = (ms: number) => Promise<void>;

export const sleep: Sleep = (ms) =>
  new Promise((resolve) => {
    setTimeout(resolve, ms);
  });

export type PollOutcome =
  | { kind: 'completed'; message: AssistantMessage; attempts: number }
  | { kind: 'failed'; message: AssistantMessage; attempts: number }
  | { kind: 'timeout'; message: AssistantMessage; attempts: number };

/**
 * Fetches the message until it reaches a terminal state or the attempt budget runs out.
 * Throws only when the final attempt itself fails at the transport level.
 */
export async function pollMessage(
  assistant: AssistantCapability,
  conversationId: string,
  messageId: string,
  polling: PollingConfig,
  wait: Sleep = sleep,
): Promise<PollOutcome> {
  const maxAttempts = Math.max(1, polling.maxAttempts);
  let last: AssistantMessage | undefined;
  let lastError: unknown;

  for (let attempt = 1; attempt <= maxAttempts; attempt++) {
    try {
      const message = await assistant.getMessage(conversationId, messageId);
      last = message;
      lastError = undefined;
      logger.debug('angle-resolver:poll', { conversationId, messageId, attempt, state: message.state });

      if (message.state === 'COMPLETED') return { kind: 'completed', message, attempts: attempt };
      if (TERMINAL_STATES.has(message.state)) return { kind: 'failed', message, attempts: attempt };
    } catch (err) {
      lastError = err;
      logger.warn('angle-resolver:poll_error', {
        conversationId,
        messageId,
        attempt,
        remaining: maxAttempts - attempt,
        error: describeError(err),
      });
    }

    if (attempt < maxAttempts) await wait(polling.intervalMs);
  }

  if (lastError !== undefined || !last) throw lastError;

  logger.warn('angle-resolver:soft_timeout', { conversationId, messageId, attempts: maxAttempts, state: last.state });
  return { kind: 'timeout', message: last, attempts: maxAttempts };
}

export class AngleResolver {
  constructor(
    private readonly assistant: AssistantCapability,
    private readonly polling: PollingConfig = DEFAULT_POLLING,
    private readonly wait: Sleep = sleep,
  ) {}

  /** Never rejects: every failure mode lands in the result's `error`. */
  async resolve(angle: Angle): Promise<AngleResult> {
    try {
      const created = await this.assistant.createConversation(angle);
      const { conversationId, messageId } = created;

      if (!conversationId) {
        logger.warn('angle-resolver:create_failed', { angle });
        return { ok: false, angle, error: CREATE_CONVERSATION_FAILED };
      }
      if (!messageId) {
        logger.warn('angle-resolver:no_message_id', { angle, conversationId });
        return { ok: false, angle, error: NO_MESSAGE_ID };
      }

      const outcome = await pollMessage(this.assistant, conversationId, messageId, this.polling, this.wait);
      if (outcome.kind === 'failed') {
        return { ok: false, angle, error: `message_failed: ${outcome.message.error ?? 'unknown'}` };
      }

      logger.info('angle-resolver:resolved', {
        angle,
        conversationId,
        messageId,
        state: outcome.message.state,
        attempts: outcome.attempts,
      });
      return { ok: true, angle, conversationId, messageId, data: outcome.message };
    } catch (err) {
      const error = describeError(err);
      logger.error('angle-resolver:exception', { angle, error });
      return { ok: false, angle, error };
    }
  }
}
