import { z } from 'zod';
import { LLMProvider } from '../types/llm.types';

const DEFAULT_MODELS: Record<LLMProvider, string> = {
  perplexity: 'sonar-pro',
  anthropic: 'claude-3-haiku-20240307',
};

const optionalString = z
  .string()
  .optional()
  .transform((value) => (value && value.trim() ? value.trim() : undefined));

const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'test', 'production']).optional().default('development'),
  PORT: z.coerce.number().int().positive().default(3000),
  MONGODB_URI: z.string().min(1).default('mongodb://127.0.0.1:27017/feedback-insights'),
  FEEDBACK_STORE: z.enum(['mongo', 'memory']).default('mongo'),
  LLM_PROVIDER: z.enum(['perplexity', 'anthropic']).default('perplexity'),
  PERPLEXITY_API_KEY: optionalString,
  ANTHROPIC_API_KEY: optionalString,
  LLM_MODEL: optionalString,
  LLM_BASE_URL: optionalString,
  LLM_TIMEOUT_MS: z.coerce.number().int().min(15000).max(30000).default(15000),
  CORS_ORIGINS: optionalString,
});

export interface LLMConfig {
  provider: LLMProvider;
  apiKey?: string;
  model: string;
  baseURL?: string;
  timeoutMs: number;
}

export interface AppConfig {
  env: 'development' | 'test' | 'production';
  port: number;
  mongoUri: string;
  store: 'mongo' | 'memory';
  corsOrigins: string[];
  llm: LLMConfig;
}

export class ConfigError extends Error {
  constructor(public issues: string[]) {
    super(`Invalid environment variables: ${issues.length} validation error(s)`);
    this.name = 'ConfigError';
  }
}

/**
 * Builds the process configuration from environment variables. Called once at
 * startup; the result is passed by reference to whatever needs it.
 *
 * A missing API key is not an error: AI features are disabled instead.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    throw new ConfigError(
      parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`)
    );
  }

  const data = parsed.data;
  const provider = data.LLM_PROVIDER;

  return Object.freeze({
    env: data.NODE_ENV,
    port: data.PORT,
    mongoUri: data.MONGODB_URI,
    store: data.FEEDBACK_STORE,
    corsOrigins: data.CORS_ORIGINS
      ? data.CORS_ORIGINS.split(',').map((origin) => origin.trim()).filter(Boolean)
      : [],
    llm: Object.freeze({
      provider,
      apiKey: provider === 'anthropic' ? data.ANTHROPIC_API_KEY : data.PERPLEXITY_API_KEY,
      model: data.LLM_MODEL ?? DEFAULT_MODELS[provider],
      baseURL: data.LLM_BASE_URL,
      timeoutMs: data.LLM_TIMEOUT_MS,
    }),
  });
}
