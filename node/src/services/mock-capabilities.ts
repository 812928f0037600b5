// src/services/mock-capabilities.ts — deterministic offline stand-ins for both remote services
import type { AssistantMessage, ConversationCreated, MessageState } from '@/types/core';
import type { AssistantFollowUpCapability } from './assistant-client';
import type { CompletionOptions, TextGenerationCapability } from './model-router';

export function mockAnglesFor(query: string): string[] {
  const lower = query.toLowerCase();
  if (/\bai\b/i.test(query) || lower.includes('artificial intelligence')) {
    return [
      'What are the latest technological breakthroughs in AI?',
      'How is AI adoption changing across different industries?',
      'What are the ethical implications of current AI developments?',
      'What are the key challenges in AI implementation?',
    ];
  }
  if (lower.includes('climate')) {
    return [
      'What are the current climate change mitigation strategies?',
      'How is climate change affecting global economies?',
      'What are the latest renewable energy innovations?',
      'What are the social impacts of climate change?',
    ];
  }
  return [
    `What are the key aspects of ${query}?`,
    `How does ${query} impact different sectors?`,
    `What are the challenges related to ${query}?`,
    `What are the future trends in ${query}?`,
  ];
}

function extractQuery(prompt: string): string {
  const match = /query: ("(?:[^"\\]|\\.)*")/i.exec(prompt);
  if (!match) return prompt.trim();
  try {
    const value: unknown = JSON.parse(match[1]);
    return typeof value === 'string' ? value : prompt.trim();
  } catch {
    return match[1].slice(1, -1);
  }
}

export class MockTextGeneration implements TextGenerationCapability {
  async complete(prompt: string, options?: CompletionOptions): Promise<string> {
    switch (options?.task) {
      case 'angles':
        return mockAnglesFor(extractQuery(prompt)).join('\n');
      case 'contradictions':
        return JSON.stringify({
          has_contradictions: false,
          contradictions: [],
          confidence: 0.9,
        });
      default: {
        const query = extractQuery(prompt);
        const angleCount = (prompt.match(/^Angle: /gm) ?? []).length;
        return [
          '# Comprehensive Analysis Report',
          '',
          '## Executive Summary',
          `This report provides a multi-angle analysis of the query: "${query}", drawn from ${angleCount} analytical perspectives.`,
          '',
          '## Confidence Assessment',
          'Generated from mock data for offline runs.',
        ].join('\n');
      }
    }
  }
}

interface MockConversation {
  angle: string;
  polls: number;
}

const ANSWERED_HISTORY = 500;

/**
 * Each message reports PROCESSING on its first fetch and COMPLETED on the next, after
 * which it is forgotten; only the most recent answered ids are kept for feedback.
 * Ids are sequential per instance.
 */
export class MockAssistant implements AssistantFollowUpCapability {
  private readonly messages = new Map<string, MockConversation>();
  private readonly answered = new Set<string>();
  private nextId = 1;

  /** Messages created but not yet answered. */
  get pendingCount(): number {
    return this.messages.size;
  }

  async createConversation(message: string): Promise<ConversationCreated> {
    const n = this.nextId++;
    const messageId = `msg_${n}`;
    this.messages.set(messageId, { angle: message, polls: 0 });
    return { conversationId: `conv_${n}`, messageId };
  }

  async sendFollowUp(conversationId: string, message: string): Promise<ConversationCreated> {
    const messageId = `msg_${this.nextId++}`;
    this.messages.set(messageId, { angle: message, polls: 0 });
    return { conversationId, messageId };
  }

  async getMessage(conversationId: string, messageId: string): Promise<AssistantMessage> {
    const entry = this.messages.get(messageId);
    if (!entry) {
      return { state: 'FAILED', content: '', sources: [], metadata: {}, timestamp: '', error: `unknown message ${messageId}` };
    }

    entry.polls += 1;
    const state: MessageState = entry.polls > 1 ? 'COMPLETED' : 'PROCESSING';
    if (state !== 'COMPLETED') {
      return { state, content: '', sources: [], metadata: {}, timestamp: '' };
    }
    this.markAnswered(messageId);

    return {
      state,
      content: `Mock response for: ${entry.angle}. This simulates the assistant's answer for this angle.`,
      sources: [
        {
          sourceId: `src_${conversationId}`,
          title: `Mock source for ${conversationId}`,
          url: `https://example.com/sources/${conversationId}`,
        },
      ],
      metadata: { source: 'mock_assistant', confidence: 0.85 },
      timestamp: '2024-01-01T12:00:00Z',
    };
  }

  async giveFeedback(messageId: string, feedback = 'success'): Promise<Record<string, unknown>> {
    return { messageId, feedback, accepted: this.answered.has(messageId) || this.messages.has(messageId) };
  }

  private markAnswered(messageId: string): void {
    this.messages.delete(messageId);
    this.answered.add(messageId);
    if (this.answered.size > ANSWERED_HISTORY) {
      const oldest = this.answered.values().next();
      if (!oldest.done) this.answered.delete(oldest.value);
    }
  }
}
