import Anthropic from '@anthropic-ai/sdk';
import { z } from 'zod';
import { ProviderError } from './errors.js';

// ─── Shared interfaces ───────────────────────────────────────────────

export interface ChatMessage {
  role: 'user' | 'assistant';
  content: string;
}

export interface ChatParams {
  model: string;
  system?: string;
  messages: ChatMessage[];
  max_tokens: number;
  /** Ask the provider for a single JSON object and nothing else. */
  json_mode?: boolean;
  signal?: AbortSignal;
}

export interface TokenUsage {
  input_tokens: number;
  output_tokens: number;
}

export interface ChatResponse {
  text: string;
  usage: TokenUsage;
}

export type StreamEvent =
  | { type: 'text'; text: string }
  | { type: 'done'; usage: TokenUsage };

export interface LLMProvider {
  readonly name: string;
  chat(params: ChatParams): Promise<ChatResponse>;
  stream(params: ChatParams): AsyncIterable<StreamEvent>;
}

// ─── Usage accounting ────────────────────────────────────────────────

/** Accumulates token usage across every call of one pipeline run. */
export class UsageTracker {
  input_tokens = 0;
  output_tokens = 0;
  calls = 0;

  record(usage: TokenUsage): void {
    this.input_tokens += usage.input_tokens;
    this.output_tokens += usage.output_tokens;
    this.calls++;
  }

  snapshot(): TokenUsage & { calls: number } {
    return { input_tokens: this.input_tokens, output_tokens: this.output_tokens, calls: this.calls };
  }
}

// ─── Timeouts ────────────────────────────────────────────────────────

function createCombinedAbortSignal(
  callerSignal: AbortSignal | undefined,
  timeoutMs: number,
): { signal: AbortSignal; cleanup: () => void } {
  const controller = new AbortController();
  const timeout = setTimeout(() => {
    controller.abort(new Error(`Timed out after ${timeoutMs}ms`));
  }, timeoutMs);
  timeout.unref?.();

  const onCallerAbort = () => {
    if (!controller.signal.aborted) controller.abort(callerSignal?.reason);
  };

  if (callerSignal) {
    if (callerSignal.aborted) {
      onCallerAbort();
    } else {
      callerSignal.addEventListener('abort', onCallerAbort, { once: true });
    }
  }

  const cleanup = () => {
    clearTimeout(timeout);
    callerSignal?.removeEventListener('abort', onCallerAbort);
  };

  return { signal: controller.signal, cleanup };
}

function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

// ─── Anthropic provider ──────────────────────────────────────────────

export interface AnthropicProviderConfig {
  apiKey?: string;
  timeoutMs: number;
}

/**
 * Anthropic has no JSON response format, so `json_mode` prefills the
 * assistant turn with `{` and puts it back in front of the returned text.
 */
export class AnthropicProvider implements LLMProvider {
  readonly name = 'anthropic';
  private client: Anthropic | null = null;

  constructor(private readonly config: AnthropicProviderConfig) {}

  // Created lazily so the module loads without credentials.
  private getClient(): Anthropic {
    if (!this.config.apiKey) {
      throw new ProviderError('ANTHROPIC_API_KEY is required when LLM_PROVIDER=anthropic');
    }
    if (!this.client) {
      this.client = new Anthropic({ apiKey: this.config.apiKey, timeout: this.config.timeoutMs });
    }
    return this.client;
  }

  async chat(params: ChatParams): Promise<ChatResponse> {
    const client = this.getClient();
    const prefill = params.json_mode ? '{' : '';
    const messages: ChatMessage[] = prefill
      ? [...params.messages, { role: 'assistant', content: prefill }]
      : params.messages;

    let response: Anthropic.Message;
    try {
      response = await client.messages.create(
        {
          model: params.model,
          max_tokens: params.max_tokens,
          ...(params.system ? { system: params.system } : {}),
          messages,
        },
        { signal: params.signal },
      );
    } catch (err) {
      throw toProviderError('Anthropic', err);
    }

    let text = '';
    for (const block of response.content) {
      if (block.type === 'text') text += block.text;
    }

    return {
      text: prefill + text,
      usage: {
        input_tokens: response.usage?.input_tokens ?? 0,
        output_tokens: response.usage?.output_tokens ?? 0,
      },
    };
  }

  async *stream(params: ChatParams): AsyncIterable<StreamEvent> {
    const client = this.getClient();
    const s = client.messages.stream(
      {
        model: params.model,
        max_tokens: params.max_tokens,
        ...(params.system ? { system: params.system } : {}),
        messages: params.messages,
      },
      { signal: params.signal },
    );

    try {
      for await (const event of s) {
        if (event.type === 'content_block_delta' && event.delta.type === 'text_delta') {
          yield { type: 'text', text: event.delta.text };
        }
      }
      const final = await s.finalMessage();
      yield {
        type: 'done',
        usage: {
          input_tokens: final.usage?.input_tokens ?? 0,
          output_tokens: final.usage?.output_tokens ?? 0,
        },
      };
    } catch (err) {
      throw toProviderError('Anthropic', err);
    } finally {
      s.abort();
    }
  }
}

function toProviderError(provider: string, err: unknown): ProviderError {
  if (err instanceof ProviderError) return err;
  const status = err instanceof Anthropic.APIError ? err.status : undefined;
  return new ProviderError(`${provider} request failed: ${describeError(err)}`, { status, cause: err });
}

// ─── OpenAI-compatible provider ──────────────────────────────────────

export interface OpenAICompatibleConfig {
  apiKey?: string;
  baseUrl: string;
  timeoutMs: number;
  /** Injected in tests; defaults to the global fetch. */
  fetch?: typeof fetch;
}

const OpenAIChatResponseSchema = z.object({
  choices: z.array(z.object({
    message: z.object({ content: z.string().nullable().optional() }).passthrough(),
  }).passthrough()),
  usage: z.object({
    prompt_tokens: z.number().optional(),
    completion_tokens: z.number().optional(),
  }).passthrough().nullable().optional(),
}).passthrough();

const OpenAIStreamChunkSchema = z.object({
  choices: z.array(z.object({
    delta: z.object({ content: z.string().nullable().optional() }).passthrough().optional(),
    finish_reason: z.string().nullable().optional(),
  }).passthrough()).optional(),
  usage: z.object({
    prompt_tokens: z.number().optional(),
    completion_tokens: z.number().optional(),
  }).passthrough().nullable().optional(),
}).passthrough();

export class OpenAICompatibleProvider implements LLMProvider {
  readonly name = 'openai';
  private readonly baseUrl: string;
  private readonly fetchImpl: typeof fetch;

  constructor(private readonly config: OpenAICompatibleConfig) {
    this.baseUrl = config.baseUrl.replace(/\/$/, '');
    this.fetchImpl = config.fetch ?? fetch;
  }

  async chat(params: ChatParams): Promise<ChatResponse> {
    const { signal, cleanup } = createCombinedAbortSignal(params.signal, this.config.timeoutMs);
    try {
      const response = await this.post(this.buildRequestBody(params, false), signal);
      const body: unknown = await response.json();
      const parsed = OpenAIChatResponseSchema.safeParse(body);
      if (!parsed.success) {
        throw new ProviderError(`OpenAI response has an unexpected shape: ${parsed.error.issues[0]?.message ?? 'unknown'}`);
      }
      const data = parsed.data;
      return {
        text: data.choices[0]?.message.content ?? '',
        usage: {
          input_tokens: data.usage?.prompt_tokens ?? 0,
          output_tokens: data.usage?.completion_tokens ?? 0,
        },
      };
    } catch (err) {
      if (err instanceof ProviderError) throw err;
      throw new ProviderError(`OpenAI request failed: ${describeError(err)}`, { cause: err });
    } finally {
      cleanup();
    }
  }

  async *stream(params: ChatParams): AsyncIterable<StreamEvent> {
    const { signal, cleanup } = createCombinedAbortSignal(params.signal, this.config.timeoutMs);

    try {
      const response = await this.post(this.buildRequestBody(params, true), signal);
      if (!response.body) {
        throw new ProviderError('OpenAI API returned no body for stream');
      }

      const reader = response.body.getReader();
      const decoder = new TextDecoder();
      let buffer = '';
      let inputTokens = 0;
      let outputTokens = 0;
      let drained = false;

      try {
        for (;;) {
          const { done, value } = await reader.read();
          if (done) {
            drained = true;
            break;
          }

          buffer += decoder.decode(value, { stream: true });
          const lines = buffer.split('\n');
          buffer = lines.pop() ?? '';

          for (const line of lines) {
            const trimmed = line.trim();
            if (!trimmed.startsWith('data:')) continue;
            const payload = trimmed.slice(5).trim();
            if (payload === '[DONE]') {
              yield { type: 'done', usage: { input_tokens: inputTokens, output_tokens: outputTokens } };
              return;
            }

            let json: unknown;
            try {
              json = JSON.parse(payload);
            } catch (err) {
              throw new ProviderError(`OpenAI stream sent an unparseable event: ${describeError(err)}`, { cause: err });
            }
            const chunk = OpenAIStreamChunkSchema.safeParse(json);
            if (!chunk.success) continue;

            if (chunk.data.usage) {
              inputTokens = chunk.data.usage.prompt_tokens ?? inputTokens;
              outputTokens = chunk.data.usage.completion_tokens ?? outputTokens;
            }
            const content = chunk.data.choices?.[0]?.delta?.content;
            if (content) {
              yield { type: 'text', text: content };
            }
          }
        }
      } finally {
        // Leaving before the body ends must still free the connection
        if (!drained) await reader.cancel();
        reader.releaseLock();
      }

      // Stream ended without [DONE]
      yield { type: 'done', usage: { input_tokens: inputTokens, output_tokens: outputTokens } };
    } catch (err) {
      if (err instanceof ProviderError) throw err;
      throw new ProviderError(`OpenAI stream failed: ${describeError(err)}`, { cause: err });
    } finally {
      cleanup();
    }
  }

  private async post(body: Record<string, unknown>, signal: AbortSignal): Promise<Response> {
    if (!this.config.apiKey) {
      throw new ProviderError('OPENAI_API_KEY is required when LLM_PROVIDER=openai');
    }
    const response = await this.fetchImpl(`${this.baseUrl}/chat/completions`, {
      method: 'POST',
      headers: {
        'Content-Type': 'application/json',
        'Authorization': `Bearer ${this.config.apiKey}`,
      },
      body: JSON.stringify(body),
      signal,
    });

    if (!response.ok) {
      const errText = await response.text().catch(() => '');
      throw new ProviderError(`OpenAI API error ${response.status}: ${errText}`, { status: response.status });
    }
    return response;
  }

  private buildRequestBody(params: ChatParams, stream: boolean): Record<string, unknown> {
    const messages: Array<{ role: string; content: string }> = [];
    if (params.system) messages.push({ role: 'system', content: params.system });
    messages.push(...params.messages);

    const body: Record<string, unknown> = {
      model: params.model,
      max_tokens: params.max_tokens,
      messages,
      stream,
    };
    if (stream) {
      body.stream_options = { include_usage: true };
    } else if (params.json_mode) {
      body.response_format = { type: 'json_object' };
    }
    return body;
  }
}
