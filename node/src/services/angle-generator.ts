// src/services/angle-generator.ts
// Angle generation: expand one query into a handful of focused sub-questions, one per line.
import type { Angle } from '@/types/core';
import { GenerationError } from './errors';
import { logger } from './logger';
import type { TextGenerationCapability } from './model-router';

export function buildAnglePrompt(query: string): string {
  return `Given the following query: ${JSON.stringify(query)}

Generate 3-5 different analytical angles or perspectives to approach this query.
Each angle should be a specific, focused question that would provide valuable insights.

Return only the questions, one per line, without numbering or bullet points.`;
}

/** Splits a completion into angles: trimmed, blank lines dropped, provider order kept. */
export function parseAngles(raw: string): Angle[] {
  return raw
    .split(/\r?\n/)
    .map((line) => line.trim())
    .filter((line) => line.length > 0);
}

export class AngleGenerator {
  constructor(private readonly llm: TextGenerationCapability) {}

  async generate(query: string): Promise<Angle[]> {
    const trimmed = query.trim();
    if (!trimmed) throw new GenerationError('Query must be a non-empty string');

    let raw: string;
    try {
      raw = await this.llm.complete(buildAnglePrompt(trimmed), { task: 'angles' });
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      throw new GenerationError(`Failed to generate analysis angles: ${message}`, { cause: err });
    }

    const angles = parseAngles(raw);
    if (angles.length === 0) {
      logger.warn('angle-generator:empty', { raw: raw.slice(0, 200) });
      throw new GenerationError('No analysis angles were generated for the query');
    }
    return angles;
  }
}
