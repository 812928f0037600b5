// node/src/services/llm-client.ts — Azure OpenAI client implementing TextGenerationCapability

import { AzureOpenAI } from 'openai';
import type { AzureOpenAiConfig } from '@/config/app.config';
import { TextGenerationError } from './errors';
import { logger } from './logger';
import { resolveCallOptions, type CompletionOptions, type TextGenerationCapability } from './model-router';

export class AzureTextGenerationClient implements TextGenerationCapability {
  private readonly client: AzureOpenAI;
  private readonly deployment: string;

  constructor(config: AzureOpenAiConfig) {
    this.client = new AzureOpenAI({
      apiKey: config.apiKey,
      endpoint: config.endpoint,
      apiVersion: config.apiVersion,
      deployment: config.deployment,
    });
    this.deployment = config.deployment;
  }

  async complete(prompt: string, options?: CompletionOptions): Promise<string> {
    const call = resolveCallOptions(options);
    try {
      const res = await this.client.chat.completions.create({
        model: this.deployment,
        messages: [
          { role: 'system', content: call.system },
          { role: 'user', content: prompt },
        ],
        temperature: call.temperature,
        max_tokens: call.maxTokens,
      });
      return res.choices[0]?.message?.content ?? '';
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      logger.warn('llm-client:completion_failed', { task: call.task, error: message });
      throw new TextGenerationError(`Text generation failed (${call.task}): ${message}`, { cause: err });
    }
  }
}
