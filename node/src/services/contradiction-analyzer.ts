// src/services/contradiction-analyzer.ts — batch-level disagreement check across angles
import { z } from 'zod';
import type { ContradictionAnalysis, NormalizedResponse } from '@/types/core';
import { describeError } from './errors';
import { logger } from './logger';
import type { TextGenerationCapability } from './model-router';
import { safeParseJson } from './safe-parse-json';

const replySchema = z.object({
  has_contradictions: z.boolean().optional().catch(undefined),
  hasContradictions: z.boolean().optional().catch(undefined),
  contradictions: z.array(z.unknown()).catch([]),
  confidence: z.coerce.number().optional().catch(undefined),
});

export function formatAngleSections(responses: Pick<NormalizedResponse, 'angle' | 'content'>[]): string {
  return responses.map((r) => `Angle: ${r.angle}\nResponse: ${r.content}`).join('\n\n');
}

export function buildContradictionPrompt(responses: NormalizedResponse[]): string {
  return `Analyze the following responses for contradictions or conflicting information:

${formatAngleSections(responses)}

Identify any contradictions or conflicting information between these responses.
Return a JSON object with:
- "has_contradictions": boolean
- "contradictions": list of contradiction descriptions
- "confidence": confidence level (0-1)`;
}

function describeContradiction(item: unknown): string {
  if (typeof item === 'string') return item;
  if (typeof item === 'object' && item !== null) {
    if ('description' in item && typeof item.description === 'string') return item.description;
    if ('text' in item && typeof item.text === 'string') return item.text;
  }
  return JSON.stringify(item);
}

function clampConfidence(value: number | undefined): number {
  if (value === undefined || Number.isNaN(value)) return 0;
  return Math.min(1, Math.max(0, value));
}

/** Reads the model's JSON verdict; undefined when the reply carries no usable judgment. */
export function parseContradictionReply(raw: string): ContradictionAnalysis | undefined {
  const json = safeParseJson(raw, 'contradiction-analyzer');
  if (!json) return undefined;

  const reply = replySchema.safeParse(json);
  if (!reply.success) return undefined;

  const contradictions = reply.data.contradictions
    .map(describeContradiction)
    .map((c) => c.trim())
    .filter(Boolean);
  const flag = reply.data.has_contradictions ?? reply.data.hasContradictions;
  if (flag === undefined && reply.data.contradictions.length === 0 && reply.data.confidence === undefined) {
    return undefined;
  }

  return {
    ok: true,
    hasContradictions: flag ?? contradictions.length > 0,
    contradictions,
    confidence: clampConfidence(reply.data.confidence),
  };
}

export class ContradictionAnalyzer {
  constructor(private readonly llm: TextGenerationCapability) {}

  /**
   * Annotates every response with the same batch-level analysis. Fewer than two responses are
   * returned as-is. Provider failures degrade to `{ ok: false }` on every entry.
   */
  async analyze(responses: NormalizedResponse[]): Promise<NormalizedResponse[]> {
    if (responses.length < 2) return responses;

    let analysis: ContradictionAnalysis;
    try {
      const raw = await this.llm.complete(buildContradictionPrompt(responses), { task: 'contradictions' });
      analysis = parseContradictionReply(raw) ?? {
        ok: false,
        error: 'Error analyzing contradictions: unparseable analysis reply',
      };
    } catch (err) {
      analysis = { ok: false, error: `Error analyzing contradictions: ${describeError(err)}` };
    }

    if (analysis.ok) {
      logger.info('contradiction-analyzer:done', {
        responses: responses.length,
        hasContradictions: analysis.hasContradictions,
        confidence: analysis.confidence,
      });
    } else {
      logger.warn('contradiction-analyzer:degraded', { error: analysis.error });
    }

    return responses.map((r) => ({ ...r, contradictionAnalysis: analysis }));
  }
}
