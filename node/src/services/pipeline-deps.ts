// Pipeline dependencies: capability clients chosen once from the validated config.
import type { AppConfig } from '@/config/app.config';
import { AssistantClient, type AssistantFollowUpCapability } from './assistant-client';
import { FollowUpService } from './follow-up';
import { AzureTextGenerationClient } from './llm-client';
import { logger } from './logger';
import { MockAssistant, MockTextGeneration } from './mock-capabilities';
import type { TextGenerationCapability } from './model-router';
import { Orchestrator } from './orchestrator';

export interface PipelineDeps {
  orchestrator: Orchestrator;
  followUps: FollowUpService;
}

export function buildPipelineDeps(config: AppConfig): PipelineDeps {
  let llm: TextGenerationCapability;
  let assistant: AssistantFollowUpCapability;

  if (config.mode === 'mock') {
    llm = new MockTextGeneration();
    assistant = new MockAssistant();
  } else {
    llm = new AzureTextGenerationClient(config.azureOpenAi);
    assistant = new AssistantClient(config.assistant);
  }
  logger.info('pipeline-deps:ready', { mode: config.mode, polling: config.polling });

  return {
    orchestrator: new Orchestrator({ llm, assistant, polling: config.polling }),
    followUps: new FollowUpService(assistant, config.polling),
  };
}
