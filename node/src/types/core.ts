// src/types/core.ts — data model for the multi-angle pipeline

/** One generated sub-question. */
export type Angle = string;

export const MESSAGE_STATES = ['PENDING', 'PROCESSING', 'COMPLETED', 'FAILED', 'UNKNOWN'] as const;
export type MessageState = (typeof MESSAGE_STATES)[number];

export const TERMINAL_STATES: ReadonlySet<MessageState> = new Set<MessageState>(['COMPLETED', 'FAILED']);

export interface Source {
  sourceId: string;
  title: string;
  url: string;
  excerpt?: string;
  pageNumber?: number;
}

export type MessageMetadata = Record<string, unknown>;

/** A fetched assistant message, with every optional field defaulted. */
export interface AssistantMessage {
  state: MessageState;
  content: string;
  sources: Source[];
  metadata: MessageMetadata;
  timestamp: string;
  /** Remote-reported error, present on FAILED messages when the service gives one. */
  error?: string;
}

/** Creation response; either id may be missing when the service misbehaves. */
export interface ConversationCreated {
  conversationId?: string;
  messageId?: string;
}

export interface ConversationHandle {
  conversationId: string;
  messageId: string;
}

export interface AngleSuccess extends ConversationHandle {
  ok: true;
  angle: Angle;
  data: AssistantMessage;
}

export interface AngleFailure {
  ok: false;
  angle: Angle;
  error: string;
}

export type AngleResult = AngleSuccess | AngleFailure;

export type ContradictionAnalysis =
  | {
      ok: true;
      hasContradictions: boolean;
      contradictions: string[];
      confidence: number;
    }
  | {
      ok: false;
      error: string;
    };

export interface NormalizedResponse extends ConversationHandle {
  angle: Angle;
  content: string;
  sources: Source[];
  metadata: MessageMetadata;
  timestamp: string;
  status: MessageState;
  contradictionAnalysis?: ContradictionAnalysis;
}

export interface SynthesizedReportBody {
  originalQuery: string;
  reportText: string;
  sourceAngles: Angle[];
  totalAnglesProcessed: number;
  sources: Source[];
}

export interface SynthesisFailure {
  error: string;
}

export type SynthesizedReport = SynthesizedReportBody | SynthesisFailure;

export function isSynthesisFailure(report: SynthesizedReport): report is SynthesisFailure {
  return 'error' in report;
}

export interface OrchestrationSuccess {
  success: true;
  originalQuery: string;
  anglesGenerated: Angle[];
  responsesProcessed: number;
  finalReport: SynthesizedReport;
  rawResponses: NormalizedResponse[];
}

export interface OrchestrationFailure {
  success: false;
  originalQuery: string;
  error: string;
}

export type OrchestrationResult = OrchestrationSuccess | OrchestrationFailure;

export const NO_VALID_RESPONSES = 'no_valid_responses';
export const CREATE_CONVERSATION_FAILED = 'create_conversation_failed';
export const NO_MESSAGE_ID = 'no_message_id';
