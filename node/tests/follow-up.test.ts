import { describe, expect, it, vi } from 'vitest';
import type { AssistantFollowUpCapability } from '@/services/assistant-client';
import { AssistantTransportError } from '@/services/errors';
import { FollowUpService } from '@/services/follow-up';
import { immediate, message } from './helpers';

function followUpAssistant(overrides: Partial<AssistantFollowUpCapability> = {}): AssistantFollowUpCapability {
  return {
    createConversation: vi.fn(),
    sendFollowUp: vi.fn(async (conversationId: string) => ({ conversationId, messageId: 'm-2' })),
    getMessage: vi.fn(async () => message('COMPLETED', { content: 'follow-up answer' })),
    giveFeedback: vi.fn(async (messageId: string, feedback?: string) => ({ messageId, feedback })),
    ...overrides,
  };
}

const polling = { intervalMs: 0, maxAttempts: 3 };

describe('FollowUpService', () => {
  it('posts the follow-up and polls the new message', async () => {
    const assistant = followUpAssistant();

    const result = await new FollowUpService(assistant, polling, immediate).sendFollowUp('c-1', 'More detail?');

    expect(assistant.sendFollowUp).toHaveBeenCalledWith('c-1', 'More detail?');
    expect(assistant.getMessage).toHaveBeenCalledWith('c-1', 'm-2');
    expect(result).toEqual({
      ok: true,
      conversationId: 'c-1',
      messageId: 'm-2',
      data: message('COMPLETED', { content: 'follow-up answer' }),
    });
  });

  it('reports no_message_id when the service returns none', async () => {
    const assistant = followUpAssistant({ sendFollowUp: vi.fn(async (conversationId: string) => ({ conversationId })) });

    const result = await new FollowUpService(assistant, polling, immediate).sendFollowUp('c-1', 'x');

    expect(result).toEqual({ ok: false, conversationId: 'c-1', error: 'no_message_id' });
  });

  it('captures transport failures instead of throwing', async () => {
    const assistant = followUpAssistant({
      sendFollowUp: vi.fn(async () => {
        throw new AssistantTransportError('Assistant sendFollowUp failed: HTTP 404', 404);
      }),
    });

    const result = await new FollowUpService(assistant, polling, immediate).sendFollowUp('c-404', 'x');

    expect(result).toEqual({ ok: false, conversationId: 'c-404', error: 'Assistant sendFollowUp failed: HTTP 404' });
  });

  it('reports a failed reply message', async () => {
    const assistant = followUpAssistant({ getMessage: vi.fn(async () => message('FAILED')) });

    const result = await new FollowUpService(assistant, polling, immediate).sendFollowUp('c-1', 'x');

    expect(result).toEqual({ ok: false, conversationId: 'c-1', error: 'message_failed: unknown' });
  });

  it('forwards feedback', async () => {
    const assistant = followUpAssistant();

    await expect(new FollowUpService(assistant, polling).giveFeedback('m-1', 'helpful')).resolves.toEqual({
      messageId: 'm-1',
      feedback: 'helpful',
    });
  });
});
