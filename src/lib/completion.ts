import type { CompletionMode } from './config.js';
import { PipelineError, ProviderError } from './errors.js';
import { parseResponse, parseStrict, type JsonValue } from './json-repair.js';
import type { ChatParams, LLMProvider, UsageTracker } from './llm-provider.js';
import defaultLogger, { type Logger } from './logger.js';

/**
 * "Given a prompt, return a JSON document." Every stage talks to the
 * provider through this and nothing else, so buffered and streaming
 * backends are interchangeable.
 */
export interface CompletionPort {
  complete(prompt: string, description: string): Promise<JsonValue>;
}

export interface CompletionProgress {
  description: string;
  bytes: number;
  elapsed_ms: number;
  bytes_per_sec: number;
}

export interface CompletionOptions {
  provider: LLMProvider;
  model: string;
  maxTokens: number;
  logger?: Logger;
  usage?: UsageTracker;
  signal?: AbortSignal;
}

export interface StreamingCompletionOptions extends CompletionOptions {
  onProgress?: (progress: CompletionProgress) => void;
  /** Minimum gap between progress log lines. */
  logIntervalMs?: number;
  now?: () => number;
}

function asProviderError(err: unknown): PipelineError {
  if (err instanceof PipelineError) return err;
  const message = err instanceof Error ? err.message : String(err);
  return new ProviderError(`Completion request failed: ${message}`, { cause: err });
}

abstract class BaseCompletion implements CompletionPort {
  protected readonly log: Logger;

  constructor(protected readonly options: CompletionOptions) {
    this.log = (options.logger ?? defaultLogger).child({ component: 'completion', provider: options.provider.name });
  }

  abstract complete(prompt: string, description: string): Promise<JsonValue>;

  protected params(prompt: string, jsonMode: boolean): ChatParams {
    return {
      model: this.options.model,
      max_tokens: this.options.maxTokens,
      messages: [{ role: 'user', content: prompt }],
      json_mode: jsonMode,
      signal: this.options.signal,
    };
  }
}

/**
 * One blocking request in the provider's object-only output mode, parsed in
 * one shot without repairs.
 */
export class BufferedCompletion extends BaseCompletion {
  async complete(prompt: string, description: string): Promise<JsonValue> {
    this.log.info({ description, model: this.options.model }, 'Calling provider');
    const startedAt = Date.now();

    let text: string;
    try {
      const response = await this.options.provider.chat(this.params(prompt, true));
      this.options.usage?.record(response.usage);
      text = response.text;
    } catch (err) {
      throw asProviderError(err);
    }

    this.log.debug({ description, duration_ms: Date.now() - startedAt, chars: text.length }, 'Provider responded');
    return parseStrict(text);
  }
}

/**
 * Consumes the provider stream, reporting byte-rate progress as chunks
 * arrive, and repairs the accumulated text once the stream ends.
 */
export class StreamingCompletion extends BaseCompletion {
  private readonly onProgress?: (progress: CompletionProgress) => void;
  private readonly logIntervalMs: number;
  private readonly now: () => number;

  constructor(options: StreamingCompletionOptions) {
    super(options);
    this.onProgress = options.onProgress;
    this.logIntervalMs = options.logIntervalMs ?? 1000;
    this.now = options.now ?? Date.now;
  }

  async complete(prompt: string, description: string): Promise<JsonValue> {
    this.log.info({ description, model: this.options.model }, 'Streaming from provider');
    const startedAt = this.now();
    let lastLogAt = startedAt;
    let text = '';
    let bytes = 0;

    try {
      for await (const event of this.options.provider.stream(this.params(prompt, false))) {
        if (event.type === 'done') {
          this.options.usage?.record(event.usage);
          continue;
        }
        text += event.text;
        bytes += Buffer.byteLength(event.text, 'utf8');

        const at = this.now();
        const elapsed_ms = at - startedAt;
        const progress: CompletionProgress = {
          description,
          bytes,
          elapsed_ms,
          bytes_per_sec: elapsed_ms > 0 ? Math.round((bytes * 1000) / elapsed_ms) : 0,
        };
        this.onProgress?.(progress);
        if (at - lastLogAt >= this.logIntervalMs) {
          lastLogAt = at;
          this.log.debug(progress, 'Receiving');
        }
      }
    } catch (err) {
      throw asProviderError(err);
    }

    this.log.debug({ description, bytes, duration_ms: this.now() - startedAt }, 'Stream complete');
    return parseResponse(text);
  }
}

export function createCompletionPort(
  mode: CompletionMode,
  options: StreamingCompletionOptions,
): CompletionPort {
  return mode === 'streaming' ? new StreamingCompletion(options) : new BufferedCompletion(options);
}

