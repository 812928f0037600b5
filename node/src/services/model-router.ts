// node/src/services/model-router.ts — text-generation capability contract and per-task defaults

export type LlmTask = 'angles' | 'contradictions' | 'synthesis';

export interface CompletionOptions {
  task: LlmTask;
  maxTokens?: number;
  temperature?: number;
}

/** Single-shot prompt → text. Errors surface as rejections the caller must catch. */
export interface TextGenerationCapability {
  complete(prompt: string, options?: CompletionOptions): Promise<string>;
}

export interface ResolvedCallOptions {
  task: LlmTask;
  system: string;
  maxTokens: number;
  temperature: number;
}

const TASK_DEFAULTS: Record<LlmTask, Omit<ResolvedCallOptions, 'task'>> = {
  angles: {
    system: 'You are a research analyst who breaks questions into focused sub-questions.',
    maxTokens: 512,
    temperature: 0.7,
  },
  contradictions: {
    system: 'You are a careful fact checker. Respond in JSON only.',
    maxTokens: 1024,
    temperature: 0,
  },
  synthesis: {
    system: 'You are a research analyst who writes structured, well-sourced reports.',
    maxTokens: 2048,
    temperature: 0.5,
  },
};

export function resolveCallOptions(options?: CompletionOptions): ResolvedCallOptions {
  const task = options?.task ?? 'synthesis';
  const defaults = TASK_DEFAULTS[task];
  return {
    task,
    system: defaults.system,
    maxTokens: typeof options?.maxTokens === 'number' ? options.maxTokens : defaults.maxTokens,
    temperature: typeof options?.temperature === 'number' ? options.temperature : defaults.temperature,
  };
}
