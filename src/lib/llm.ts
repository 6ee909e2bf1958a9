import type { AppConfig } from './config.js';
import { AnthropicProvider, OpenAICompatibleProvider, type LLMProvider } from './llm-provider.js';

// ─── Provider factory ────────────────────────────────────────────────

/**
 * Builds the provider named by LLM_PROVIDER. Credentials are checked on the
 * first call, not here, so the HTTP server and tests start without them.
 */
export function createProvider(config: AppConfig): LLMProvider {
  if (config.provider === 'openai') {
    return new OpenAICompatibleProvider({
      apiKey: config.openai.apiKey,
      baseUrl: config.openai.baseUrl,
      timeoutMs: config.requestTimeoutMs,
    });
  }
  return new AnthropicProvider({
    apiKey: config.anthropic.apiKey,
    timeoutMs: config.requestTimeoutMs,
  });
}

/** Model used for every stage with the configured provider. */
export function getModel(config: AppConfig): string {
  return config.provider === 'openai' ? config.openai.model : config.anthropic.model;
}
