// src/services/report-synthesizer.ts — one narrative report from every surviving angle
import {
  NO_VALID_RESPONSES,
  type ContradictionAnalysis,
  type NormalizedResponse,
  type SynthesizedReport,
} from '@/types/core';
import { formatAngleSections } from './contradiction-analyzer';
import { collectSources } from './dedup-utils';
import { describeError } from './errors';
import { logger } from './logger';
import type { TextGenerationCapability } from './model-router';

function formatAnalysis(analysis: ContradictionAnalysis | undefined): string {
  if (!analysis) return '';
  if (!analysis.ok) return '\nAutomated contradiction check was unavailable for this batch.\n';
  if (!analysis.hasContradictions) {
    return `\nAutomated contradiction check found no conflicts (confidence ${analysis.confidence}).\n`;
  }
  const lines = analysis.contradictions.map((c) => `- ${c}`).join('\n');
  return `\nAutomated contradiction check flagged (confidence ${analysis.confidence}):\n${lines}\n`;
}

export function buildSynthesisPrompt(responses: NormalizedResponse[], originalQuery: string): string {
  return `Original Query: ${JSON.stringify(originalQuery)}

Based on the following multi-angle analysis, create a comprehensive, structured report:

${formatAngleSections(responses)}
${formatAnalysis(responses[0]?.contradictionAnalysis)}
Create a structured report with:
1. Executive Summary
2. Key Findings (organized by theme)
3. Detailed Analysis
4. Contradictions or Inconsistencies (if any)
5. Recommendations or Next Steps
6. Confidence Assessment

Make the report comprehensive yet concise, and ensure it directly addresses the original query.`;
}

export class ReportSynthesizer {
  constructor(private readonly llm: TextGenerationCapability) {}

  async synthesize(responses: NormalizedResponse[], originalQuery: string): Promise<SynthesizedReport> {
    if (responses.length === 0) {
      logger.warn('report-synthesizer:no_valid_responses', { originalQuery });
      return { error: NO_VALID_RESPONSES };
    }

    let reportText: string;
    try {
      reportText = await this.llm.complete(buildSynthesisPrompt(responses, originalQuery), { task: 'synthesis' });
    } catch (err) {
      const error = `synthesis_failed: ${describeError(err)}`;
      logger.error('report-synthesizer:failed', { error });
      return { error };
    }

    const sources = collectSources(responses);
    return {
      originalQuery,
      reportText,
      sourceAngles: responses.map((r) => r.angle),
      totalAnglesProcessed: responses.length,
      sources,
    };
  }
}
