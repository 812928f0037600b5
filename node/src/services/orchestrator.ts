// src/services/orchestrator.ts — Generate → Fan-out resolve → Normalize → Contradictions → Synthesize
import type { PollingConfig } from '@/config/app.config';
import { isSynthesisFailure, type OrchestrationResult } from '@/types/core';
import { AngleGenerator } from './angle-generator';
import { AngleResolver, type Sleep } from './angle-resolver';
import type { AssistantCapability } from './assistant-client';
import { ContradictionAnalyzer } from './contradiction-analyzer';
import { describeError } from './errors';
import { resolveAngles } from './fan-out';
import { logger } from './logger';
import type { TextGenerationCapability } from './model-router';
import { ReportSynthesizer } from './report-synthesizer';
import { normalizeResponses } from './response-normalizer';

export interface OrchestratorDeps {
  llm: TextGenerationCapability;
  assistant: AssistantCapability;
  polling: PollingConfig;
  /** Replaces the timer-based wait between polls; tests pass an immediate one. */
  sleep?: Sleep;
}

export class Orchestrator {
  private readonly generator: AngleGenerator;
  private readonly resolver: AngleResolver;
  private readonly analyzer: ContradictionAnalyzer;
  private readonly synthesizer: ReportSynthesizer;

  constructor(deps: OrchestratorDeps) {
    this.generator = new AngleGenerator(deps.llm);
    this.resolver = new AngleResolver(deps.assistant, deps.polling, deps.sleep);
    this.analyzer = new ContradictionAnalyzer(deps.llm);
    this.synthesizer = new ReportSynthesizer(deps.llm);
  }

  /**
   * Runs the whole pipeline for one query. Always resolves: a stage fault yields
   * `success: false`, while branch and synthesis problems stay nested in the result.
   */
  async orchestrate(query: string): Promise<OrchestrationResult> {
    const startedAt = Date.now();
    try {
      logger.info('orchestrator:start', { queryPreview: query.slice(0, 100) });

      const angles = await this.generator.generate(query);
      logger.info('orchestrator:angles_generated', { count: angles.length, angles });

      const results = await resolveAngles(this.resolver, angles);
      const normalized = normalizeResponses(results);
      logger.info('orchestrator:normalized', { resolved: results.length, normalized: normalized.length });

      const analyzed = await this.analyzer.analyze(normalized);
      const finalReport = await this.synthesizer.synthesize(analyzed, query);

      logger.info('orchestrator:done', {
        angles: angles.length,
        responsesProcessed: analyzed.length,
        reportError: isSynthesisFailure(finalReport) ? finalReport.error : null,
        ms: Date.now() - startedAt,
      });
      return {
        success: true,
        originalQuery: query,
        anglesGenerated: angles,
        responsesProcessed: analyzed.length,
        finalReport,
        rawResponses: analyzed,
      };
    } catch (err) {
      const error = describeError(err);
      logger.error('orchestrator:failed', { error, ms: Date.now() - startedAt });
      return { success: false, originalQuery: query, error };
    }
  }
}
