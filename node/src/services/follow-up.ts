// src/services/follow-up.ts — continue an existing assistant conversation
import type { PollingConfig } from '@/config/app.config';
import { NO_MESSAGE_ID, type AssistantMessage } from '@/types/core';
import { pollMessage, sleep, type Sleep } from './angle-resolver';
import type { AssistantFollowUpCapability } from './assistant-client';
import { describeError } from './errors';
import { logger } from './logger';

export type FollowUpResult =
  | { ok: true; conversationId: string; messageId: string; data: AssistantMessage }
  | { ok: false; conversationId: string; error: string };

export class FollowUpService {
  constructor(
    private readonly assistant: AssistantFollowUpCapability,
    private readonly polling: PollingConfig,
    private readonly wait: Sleep = sleep,
  ) {}

  /** Posts the follow-up and polls the reply with the same budget as angle resolution. Never rejects. */
  async sendFollowUp(conversationId: string, message: string): Promise<FollowUpResult> {
    try {
      const created = await this.assistant.sendFollowUp(conversationId, message);
      const messageId = created.messageId;
      if (!messageId) return { ok: false, conversationId, error: NO_MESSAGE_ID };

      const outcome = await pollMessage(this.assistant, conversationId, messageId, this.polling, this.wait);
      if (outcome.kind === 'failed') {
        return { ok: false, conversationId, error: `message_failed: ${outcome.message.error ?? 'unknown'}` };
      }
      return { ok: true, conversationId, messageId, data: outcome.message };
    } catch (err) {
      const error = describeError(err);
      logger.error('follow-up:failed', { conversationId, error });
      return { ok: false, conversationId, error };
    }
  }

  async giveFeedback(messageId: string, feedback?: string): Promise<Record<string, unknown>> {
    return this.assistant.giveFeedback(messageId, feedback);
  }
}
