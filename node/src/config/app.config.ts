/** App configuration: read from the environment once at startup, validated with zod. */
import { z } from 'zod';
import { ConfigError } from '@/services/errors';

const LIVE_REQUIRED = [
  'ASSISTANT_API_KEY',
  'ASSISTANT_BASE_URL',
  'AZURE_OPENAI_API_KEY',
  'AZURE_OPENAI_ENDPOINT',
  'AZURE_OPENAI_DEPLOYMENT_NAME',
] as const;

const optionalString = z
  .string()
  .optional()
  .transform((v) => (v && v.trim().length > 0 ? v.trim() : undefined));

const envSchema = z.object({
  PORT: z.coerce.number().int().positive().default(4000),
  NODE_ENV: z.string().default('development'),
  CORS_ORIGIN: z.string().default('http://localhost:3000'),
  ORCHESTRATOR_MODE: z.enum(['live', 'mock']).default('live'),
  ASSISTANT_API_KEY: optionalString,
  ASSISTANT_BASE_URL: optionalString,
  ASSISTANT_HTTP_TIMEOUT_MS: z.coerce.number().int().positive().default(30000),
  ASSISTANT_POLL_MAX_RETRIES: z.coerce.number().int().positive().default(60),
  ASSISTANT_POLL_INTERVAL: z.coerce.number().nonnegative().default(2),
  AZURE_OPENAI_API_KEY: optionalString,
  AZURE_OPENAI_ENDPOINT: optionalString,
  AZURE_OPENAI_API_VERSION: z.string().default('2024-02-15-preview'),
  AZURE_OPENAI_DEPLOYMENT_NAME: optionalString,
});

export interface PollingConfig {
  intervalMs: number;
  maxAttempts: number;
}

export interface AssistantConfig {
  apiKey: string;
  baseUrl: string;
  timeoutMs: number;
}

export interface AzureOpenAiConfig {
  apiKey: string;
  endpoint: string;
  apiVersion: string;
  deployment: string;
}

interface BaseAppConfig {
  port: number;
  nodeEnv: string;
  corsOrigins: string[];
  polling: PollingConfig;
}

export type AppConfig =
  | (BaseAppConfig & { mode: 'live'; assistant: AssistantConfig; azureOpenAi: AzureOpenAiConfig })
  | (BaseAppConfig & { mode: 'mock' });

function requireValue(value: string | undefined, key: string): string {
  if (!value) throw new ConfigError(`Missing required environment variable: ${key}`, [key]);
  return value;
}

/**
 * Builds the typed config from an env map. Live mode needs the assistant and Azure OpenAI
 * credentials; mock mode runs without them.
 */
export function loadAppConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const details = parsed.error.errors
      .map((e) => `${e.path.join('.') || 'root'}: ${e.message}`)
      .join('; ');
    throw new ConfigError(`Invalid configuration: ${details}`);
  }
  const vars = parsed.data;

  const base: BaseAppConfig = {
    port: vars.PORT,
    nodeEnv: vars.NODE_ENV,
    corsOrigins: vars.CORS_ORIGIN.split(',')
      .map((o) => o.trim())
      .filter(Boolean),
    polling: {
      intervalMs: Math.round(vars.ASSISTANT_POLL_INTERVAL * 1000),
      maxAttempts: vars.ASSISTANT_POLL_MAX_RETRIES,
    },
  };

  if (vars.ORCHESTRATOR_MODE === 'mock') {
    return Object.freeze({ ...base, mode: 'mock' as const });
  }

  const missing = LIVE_REQUIRED.filter((key) => !vars[key]);
  if (missing.length > 0) {
    throw new ConfigError(`Missing required environment variables: ${missing.join(', ')}`, [...missing]);
  }

  return Object.freeze({
    ...base,
    mode: 'live' as const,
    assistant: {
      apiKey: requireValue(vars.ASSISTANT_API_KEY, 'ASSISTANT_API_KEY'),
      baseUrl: requireValue(vars.ASSISTANT_BASE_URL, 'ASSISTANT_BASE_URL'),
      timeoutMs: vars.ASSISTANT_HTTP_TIMEOUT_MS,
    },
    azureOpenAi: {
      apiKey: requireValue(vars.AZURE_OPENAI_API_KEY, 'AZURE_OPENAI_API_KEY'),
      endpoint: requireValue(vars.AZURE_OPENAI_ENDPOINT, 'AZURE_OPENAI_ENDPOINT'),
      apiVersion: vars.AZURE_OPENAI_API_VERSION,
      deployment: requireValue(vars.AZURE_OPENAI_DEPLOYMENT_NAME, 'AZURE_OPENAI_DEPLOYMENT_NAME'),
    },
  });
}
