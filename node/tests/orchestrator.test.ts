import { describe, expect, it, vi } from 'vitest';
import type { AssistantCapability } from '@/services/assistant-client';
import { Orchestrator } from '@/services/orchestrator';
import type { OrchestrationResult, OrchestrationSuccess } from '@/types/core';
import { immediate, message, source, taskLlm } from './helpers';

const polling = { intervalMs: 0, maxAttempts: 5 };

function assistantByAngle(answers: Record<string, ReturnType<typeof message> | 'create-fails'>): AssistantCapability {
  return {
    createConversation: vi.fn(async (angle: string) => {
      if (answers[angle] === 'create-fails') throw new Error(`HTTP 500 for ${angle}`);
      return { conversationId: `conv:${angle}`, messageId: `msg:${angle}` };
    }),
    getMessage: vi.fn(async (conversationId: string) => {
      const answer = answers[conversationId.slice('conv:'.length)];
      if (!answer || answer === 'create-fails') throw new Error('unexpected poll');
      return answer;
    }),
  };
}

function expectSuccess(result: OrchestrationResult): OrchestrationSuccess {
  expect(result.success).toBe(true);
  if (!result.success) throw new Error(`orchestration failed: ${result.error}`);
  return result;
}

describe('Orchestrator', () => {
  const principles = 'What are the core physical principles?';
  const applications = 'What are current industry applications?';

  it('runs the full pipeline and merges sources from both angles', async () => {
    const { llm } = taskLlm({
      angles: `${principles}\n${applications}`,
      contradictions: '{"has_contradictions": false, "contradictions": [], "confidence": 0.9}',
      synthesis: '# Quantum report',
    });
    const assistant = assistantByAngle({
      [principles]: message('COMPLETED', { content: 'Superposition and entanglement.', sources: [source('A')] }),
      [applications]: message('COMPLETED', { content: 'Cryptography and chemistry.', sources: [source('B')] }),
    });

    const result = expectSuccess(
      await new Orchestrator({ llm, assistant, polling, sleep: immediate }).orchestrate('What is quantum computing?'),
    );

    expect(result.originalQuery).toBe('What is quantum computing?');
    expect(result.anglesGenerated).toEqual([principles, applications]);
    expect(result.responsesProcessed).toBe(2);
    expect(result.rawResponses).toHaveLength(2);
    expect(result.finalReport).toEqual({
      originalQuery: 'What is quantum computing?',
      reportText: '# Quantum report',
      sourceAngles: [principles, applications],
      totalAnglesProcessed: 2,
      sources: [source('A'), source('B')],
    });
    expect(result.rawResponses[0].contradictionAnalysis).toEqual({
      ok: true,
      hasContradictions: false,
      contradictions: [],
      confidence: 0.9,
    });
  });

  it('fails the whole query when no angles are generated', async () => {
    const { llm, complete } = taskLlm({ angles: '' });
    const assistant = assistantByAngle({});

    const result = await new Orchestrator({ llm, assistant, polling, sleep: immediate }).orchestrate('q');

    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error).toBe('No analysis angles were generated for the query');
      expect(result.originalQuery).toBe('q');
    }
    expect(Object.keys(result).sort()).toEqual(['error', 'originalQuery', 'success']);
    expect(assistant.createConversation).not.toHaveBeenCalled();
    expect(complete).toHaveBeenCalledTimes(1);
  });

  it('keeps success true with a nested no_valid_responses when every branch fails', async () => {
    const { llm, complete } = taskLlm({ angles: 'one\ntwo' });
    const assistant = assistantByAngle({ one: 'create-fails', two: 'create-fails' });

    const result = expectSuccess(
      await new Orchestrator({ llm, assistant, polling, sleep: immediate }).orchestrate('q'),
    );

    expect(result.finalReport).toEqual({ error: 'no_valid_responses' });
    expect(result.responsesProcessed).toBe(0);
    expect(result.rawResponses).toEqual([]);
    expect(result.anglesGenerated).toEqual(['one', 'two']);
    expect(complete).toHaveBeenCalledTimes(1);
  });

  it('continues with the surviving angles when one branch fails', async () => {
    const { llm } = taskLlm({ angles: 'good\nbad', synthesis: 'report' });
    const assistant = assistantByAngle({
      good: message('COMPLETED', { content: 'fine', sources: [source('S')] }),
      bad: message('FAILED', { error: 'model error' }),
    });

    const result = expectSuccess(
      await new Orchestrator({ llm, assistant, polling, sleep: immediate }).orchestrate('q'),
    );

    expect(result.responsesProcessed).toBe(1);
    expect(result.responsesProcessed).toBeLessThanOrEqual(result.anglesGenerated.length);
    expect(result.rawResponses.map((r) => r.angle)).toEqual(['good']);
    // a single survivor skips the contradiction check
    expect(result.rawResponses[0].contradictionAnalysis).toBeUndefined();
    expect(result.finalReport).toEqual({
      originalQuery: 'q',
      reportText: 'report',
      sourceAngles: ['good'],
      totalAnglesProcessed: 1,
      sources: [source('S')],
    });
  });

  it('stays successful when contradiction analysis and synthesis both fail', async () => {
    const { llm } = taskLlm({
      angles: 'x\ny',
      contradictions: new Error('timeout'),
      synthesis: new Error('timeout'),
    });
    const assistant = assistantByAngle({ x: message('COMPLETED'), y: message('COMPLETED') });

    const result = expectSuccess(
      await new Orchestrator({ llm, assistant, polling, sleep: immediate }).orchestrate('q'),
    );

    expect(result.finalReport).toEqual({ error: 'synthesis_failed: timeout' });
    expect(result.rawResponses.map((r) => r.contradictionAnalysis)).toEqual([
      { ok: false, error: 'Error analyzing contradictions: timeout' },
      { ok: false, error: 'Error analyzing contradictions: timeout' },
    ]);
  });

  it('passes soft-timeout answers through with their non-terminal status', async () => {
    const { llm } = taskLlm({ angles: 'slow', synthesis: 'report' });
    const assistant = assistantByAngle({ slow: message('PROCESSING', { content: 'partial' }) });

    const result = expectSuccess(
      await new Orchestrator({ llm, assistant, polling: { intervalMs: 0, maxAttempts: 2 }, sleep: immediate }).orchestrate(
        'q',
      ),
    );

    expect(result.rawResponses).toHaveLength(1);
    expect(result.rawResponses[0].status).toBe('PROCESSING');
    expect(assistant.getMessage).toHaveBeenCalledTimes(2);
  });
});
