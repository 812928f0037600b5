import { vi } from 'vitest';
import type { AssistantCapability } from '@/services/assistant-client';
import type { TextGenerationCapability } from '@/services/model-router';
import type { AssistantMessage, MessageState, NormalizedResponse, Source } from '@/types/core';

export const immediate = async (): Promise<void> => {};

export function message(state: MessageState, overrides: Partial<AssistantMessage> = {}): AssistantMessage {
  return {
    state,
    content: state === 'COMPLETED' ? 'final answer' : '',
    sources: [],
    metadata: {},
    timestamp: '',
    ...overrides,
  };
}

export function source(sourceId: string, overrides: Partial<Source> = {}): Source {
  return { sourceId, title: `Title ${sourceId}`, url: `https://example.com/${sourceId}`, ...overrides };
}

export function normalized(angle: string, overrides: Partial<NormalizedResponse> = {}): NormalizedResponse {
  return {
    angle,
    conversationId: `conv-${angle}`,
    messageId: `msg-${angle}`,
    content: `content for ${angle}`,
    sources: [],
    metadata: {},
    timestamp: '',
    status: 'COMPLETED',
    ...overrides,
  };
}

/** Assistant whose getMessage walks through the given steps; an Error step rejects. */
export function scriptedAssistant(steps: Array<AssistantMessage | Error>) {
  let call = 0;
  const getMessage = vi.fn(async (_conversationId: string, _messageId: string) => {
    const step = steps[Math.min(call, steps.length - 1)];
    call += 1;
    if (step instanceof Error) throw step;
    return step;
  });
  const createConversation = vi.fn(async (_message: string) => ({ conversationId: 'conv-1', messageId: 'msg-1' }));
  const assistant: AssistantCapability = { createConversation, getMessage };
  return { assistant, getMessage, createConversation };
}

/** LLM fake that answers per task. */
export function taskLlm(replies: Partial<Record<'angles' | 'contradictions' | 'synthesis', string | Error>>) {
  const complete = vi.fn(async (_prompt: string, options?: { task: 'angles' | 'contradictions' | 'synthesis' }) => {
    const reply = replies[options?.task ?? 'synthesis'];
    if (reply instanceof Error) throw reply;
    if (reply === undefined) throw new Error(`no reply scripted for ${options?.task}`);
    return reply;
  });
  const llm: TextGenerationCapability = { complete };
  return { llm, complete };
}
