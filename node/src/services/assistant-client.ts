// src/services/assistant-client.ts — HTTP client for the conversational assistant service
import axios, { type AxiosInstance } from 'axios';
import { z } from 'zod';
import type { AssistantConfig } from '@/config/app.config';
import type { AssistantMessage, ConversationCreated, MessageState, Source } from '@/types/core';
import { AssistantTransportError } from './errors';

/** What the pipeline needs from the assistant service. */
export interface AssistantCapability {
  createConversation(message: string): Promise<ConversationCreated>;
  /** Idempotent; safe to call repeatedly while polling. */
  getMessage(conversationId: string, messageId: string): Promise<AssistantMessage>;
}

export interface AssistantFollowUpCapability extends AssistantCapability {
  sendFollowUp(conversationId: string, message: string): Promise<ConversationCreated>;
  giveFeedback(messageId: string, feedback?: string): Promise<Record<string, unknown>>;
}

const sourceSchema = z.object({
  sourceId: z.string().min(1),
  title: z.string().catch(''),
  url: z.string().catch(''),
  excerpt: z.string().optional().catch(undefined),
  pageNumber: z.number().optional().catch(undefined),
});

const messageSchema = z.object({
  state: z.string().optional().catch(undefined),
  status: z.string().optional().catch(undefined),
  content: z.string().catch(''),
  sources: z.array(z.unknown()).catch([]),
  metadata: z.record(z.unknown()).catch({}),
  timestamp: z.string().catch(''),
  error: z.unknown().optional(),
});

const createdSchema = z.object({
  conversationId: z.string().min(1).optional().catch(undefined),
  messageId: z.string().min(1).optional().catch(undefined),
});

export function parseMessageState(raw: string | undefined): MessageState {
  switch (raw?.trim().toUpperCase()) {
    case 'PENDING':
      return 'PENDING';
    case 'PROCESSING':
      return 'PROCESSING';
    case 'COMPLETED':
      return 'COMPLETED';
    case 'FAILED':
    case 'ERROR':
      return 'FAILED';
    default:
      return 'UNKNOWN';
  }
}

function describeRemoteError(raw: unknown): string | undefined {
  if (raw == null) return undefined;
  if (typeof raw === 'string') return raw || undefined;
  if (typeof raw === 'object' && 'message' in raw && typeof raw.message === 'string') return raw.message;
  return JSON.stringify(raw);
}

/** Parses a raw message body; unknown or malformed fields fall back to neutral defaults. */
export function parseAssistantMessage(raw: unknown): AssistantMessage {
  const parsed = messageSchema.safeParse(raw ?? {});
  const body = parsed.success ? parsed.data : messageSchema.parse({});

  const sources: Source[] = [];
  for (const item of body.sources) {
    const source = sourceSchema.safeParse(item);
    if (source.success) sources.push(source.data);
  }

  const error = describeRemoteError(body.error);
  return {
    state: parseMessageState(body.state ?? body.status),
    content: body.content,
    sources,
    metadata: body.metadata,
    timestamp: body.timestamp,
    ...(error !== undefined && { error }),
  };
}

export function parseConversationCreated(raw: unknown): ConversationCreated {
  const parsed = createdSchema.safeParse(raw ?? {});
  if (!parsed.success) return {};
  const { conversationId, messageId } = parsed.data;
  return {
    ...(conversationId ? { conversationId } : {}),
    ...(messageId ? { messageId } : {}),
  };
}

function toTransportError(err: unknown, operation: string): AssistantTransportError {
  if (axios.isAxiosError(err)) {
    const status = err.response?.status;
    const detail = status ? `HTTP ${status}` : err.code ?? err.message;
    return new AssistantTransportError(`Assistant ${operation} failed: ${detail}`, status, { cause: err });
  }
  const message = err instanceof Error ? err.message : String(err);
  return new AssistantTransportError(`Assistant ${operation} failed: ${message}`, undefined, { cause: err });
}

export class AssistantClient implements AssistantFollowUpCapability {
  private readonly http: AxiosInstance;

  constructor(config: AssistantConfig, http?: AxiosInstance) {
    this.http =
      http ??
      axios.create({
        baseURL: config.baseUrl,
        timeout: config.timeoutMs,
        headers: {
          'x-api-key': config.apiKey,
          'Content-Type': 'application/json',
        },
      });
  }

  async createConversation(message: string): Promise<ConversationCreated> {
    try {
      const { data } = await this.http.post<unknown>('/assistant/conversations', { message });
      return parseConversationCreated(data);
    } catch (err) {
      throw toTransportError(err, 'createConversation');
    }
  }

  async getMessage(conversationId: string, messageId: string): Promise<AssistantMessage> {
    const url = `/assistant/conversations/${encodeURIComponent(conversationId)}/messages/${encodeURIComponent(messageId)}`;
    try {
      const { data } = await this.http.get<unknown>(url);
      return parseAssistantMessage(data);
    } catch (err) {
      throw toTransportError(err, 'getMessage');
    }
  }

  async sendFollowUp(conversationId: string, message: string): Promise<ConversationCreated> {
    const url = `/assistant/conversations/${encodeURIComponent(conversationId)}/messages`;
    try {
      const { data } = await this.http.post<unknown>(url, { message });
      const created = parseConversationCreated(data);
      return { conversationId, ...created };
    } catch (err) {
      throw toTransportError(err, 'sendFollowUp');
    }
  }

  async giveFeedback(messageId: string, feedback = 'success'): Promise<Record<string, unknown>> {
    const url = `/assistant/messages/${encodeURIComponent(messageId)}/feedback`;
    try {
      const { data } = await this.http.post<unknown>(url, { feedback });
      const parsed = z.record(z.unknown()).safeParse(data);
      return parsed.success ? parsed.data : {};
    } catch (err) {
      throw toTransportError(err, 'giveFeedback');
    }
  }
}
