import { z } from 'zod';
import { ValidationError } from './errors.js';

const positiveInt = (fallback: number) =>
  z.coerce.number().int().positive().optional().default(fallback);

const EnvSchema = z.object({
  LLM_PROVIDER: z.enum(['openai', 'anthropic']).optional(),
  OPENAI_API_KEY: z.string().min(1).optional(),
  OPENAI_BASE_URL: z.string().url().optional().default('https://api.openai.com/v1'),
  OPENAI_MODEL: z.string().min(1).optional().default('gpt-4o'),
  ANTHROPIC_API_KEY: z.string().min(1).optional(),
  ANTHROPIC_MODEL: z.string().min(1).optional().default('claude-sonnet-4-5-20250929'),
  MAX_TOKENS: positiveInt(8192),
  COMPLETION_MODE: z.enum(['buffered', 'streaming']).optional().default('buffered'),
  REQUEST_TIMEOUT_MS: positiveInt(180_000),
  CACHE_DIR: z.string().min(1).optional().default('cache'),
  OUTPUT_DIR: z.string().min(1).optional().default('output'),
  PORT: positiveInt(3001),
});

export type ProviderName = 'openai' | 'anthropic';
export type CompletionMode = 'buffered' | 'streaming';

export interface AppConfig {
  provider: ProviderName;
  openai: { apiKey?: string; baseUrl: string; model: string };
  anthropic: { apiKey?: string; model: string };
  maxTokens: number;
  completionMode: CompletionMode;
  requestTimeoutMs: number;
  cacheDir: string;
  outputDir: string;
  port: number;
}

/**
 * Reads configuration from an environment map. Empty strings count as unset.
 * Throws ValidationError when a value is present but invalid.
 */
export function loadConfig(env: Record<string, string | undefined> = process.env): AppConfig {
  const cleaned: Record<string, string> = {};
  for (const [key, value] of Object.entries(env)) {
    if (value !== undefined && value.trim() !== '') cleaned[key] = value.trim();
  }

  const result = EnvSchema.safeParse(cleaned);
  if (!result.success) {
    throw new ValidationError(
      'Invalid configuration',
      result.error.issues.map(i => `${i.path.join('.')}: ${i.message}`),
    );
  }
  const e = result.data;

  // Default to OpenAI when its key is present, Anthropic otherwise.
  const provider: ProviderName = e.LLM_PROVIDER ?? (e.OPENAI_API_KEY ? 'openai' : 'anthropic');

  return {
    provider,
    openai: { apiKey: e.OPENAI_API_KEY, baseUrl: e.OPENAI_BASE_URL, model: e.OPENAI_MODEL },
    anthropic: { apiKey: e.ANTHROPIC_API_KEY, model: e.ANTHROPIC_MODEL },
    maxTokens: e.MAX_TOKENS,
    completionMode: e.COMPLETION_MODE,
    requestTimeoutMs: e.REQUEST_TIMEOUT_MS,
    cacheDir: e.CACHE_DIR,
    outputDir: e.OUTPUT_DIR,
    port: e.PORT,
  };
}
