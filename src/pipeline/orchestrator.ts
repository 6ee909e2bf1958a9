import type { CompletionPort } from '../lib/completion.js';
import type { ContentCache } from '../lib/content-cache.js';
import { PipelineError } from '../lib/errors.js';
import type { UsageTracker } from '../lib/llm-provider.js';
import defaultLogger, { createStageLogger, type Logger } from '../lib/logger.js';
import { analyzeResume } from './analysis.js';
import type { RenderPayload } from './boundaries.js';
import { CACHE_TYPES, type StageContext } from './stage-runner.js';
import { writeCoverLetter } from './stages/cover-letter.js';
import { parseStructuredResume, structureJob, structureResume } from './stages/structure.js';
import { tailorResume } from './tailoring.js';
import type { PipelineEvent, PipelineInput, PipelineResult, PipelineStage, StructuredResume } from './types.js';

export type PipelineEmitter = (event: PipelineEvent) => void;

export interface PipelineDeps {
  completion: CompletionPort;
  cache: ContentCache;
  /** The tracker the completion port records into; read for the result. */
  usage?: UsageTracker;
  emit?: PipelineEmitter;
  logger?: Logger;
}

export interface Pipeline {
  run(input: PipelineInput): Promise<PipelineResult>;
}

const STAGE_MESSAGES: Record<PipelineStage, { start: string; complete: string }> = {
  structure_resume: { start: 'Structuring resume...', complete: 'Resume structured' },
  structure_job: { start: 'Structuring job description...', complete: 'Job description structured' },
  analysis: { start: 'Analyzing alignment...', complete: 'Analysis complete' },
  tailoring: { start: 'Tailoring resume...', complete: 'Resume tailored' },
  cover_letter: { start: 'Writing cover letter...', complete: 'Cover letter written' },
};

/**
 * Runs every stage in order: structure resume → structure job → analysis →
 * tailoring → cover letter. Strictly sequential.
 *
 * The first stage failure aborts the run. The emitter receives
 * `pipeline_error` and the error is rethrown with `stage` set; no partial
 * result is returned. Events are notifications only and never change the
 * control flow.
 */
export async function runPipeline(deps: PipelineDeps, input: PipelineInput): Promise<PipelineResult> {
  const log = deps.logger ?? defaultLogger;
  const emit: PipelineEmitter = (event) => {
    try {
      deps.emit?.(event);
    } catch (err) {
      log.warn({ err, event: event.type }, 'Pipeline event listener threw');
    }
  };
  const pipelineStart = Date.now();
  let current: PipelineStage = 'structure_resume';

  const runStage = async <T>(stage: PipelineStage, work: (ctx: StageContext) => Promise<T>): Promise<T> => {
    current = stage;
    const ctx: StageContext = {
      completion: deps.completion,
      cache: deps.cache,
      logger: createStageLogger(stage, log),
    };
    emit({ type: 'stage_start', stage, message: STAGE_MESSAGES[stage].start });
    const startedAt = Date.now();
    const value = await work(ctx);
    emit({
      type: 'stage_complete',
      stage,
      message: STAGE_MESSAGES[stage].complete,
      duration_ms: Date.now() - startedAt,
    });
    return value;
  };

  try {
    const structured_resume = await runStage('structure_resume', ctx => structureResume(ctx, input.resume_text));
    const structured_job = await runStage('structure_job', ctx => structureJob(ctx, input.job_text));
    const analysis = await runStage('analysis', ctx => analyzeResume(ctx, structured_resume, structured_job));
    const tailored_resume = await runStage('tailoring', ctx =>
      tailorResume(ctx, structured_resume, analysis, structured_job),
    );
    const cover_letter = await runStage('cover_letter', ctx =>
      writeCoverLetter(ctx, structured_resume, structured_job, analysis),
    );

    const duration_ms = Date.now() - pipelineStart;
    const usage = deps.usage?.snapshot() ?? { input_tokens: 0, output_tokens: 0, calls: 0 };
    log.info({ duration_ms, ...usage, score: analysis.overall_alignment_score }, 'Pipeline complete');
    emit({ type: 'pipeline_complete', duration_ms });

    return { structured_resume, structured_job, analysis, tailored_resume, cover_letter, usage };
  } catch (error) {
    const errorMsg = error instanceof Error ? error.message : String(error);
    const code = error instanceof PipelineError ? error.code : 'INTERNAL_ERROR';
    if (error instanceof PipelineError && error.stage === undefined) error.stage = current;
    log.error({ error: errorMsg, code, stage: current }, 'Pipeline error');
    emit({ type: 'pipeline_error', stage: current, error: errorMsg, code });
    throw error;
  }
}

export function createPipeline(deps: PipelineDeps): Pipeline {
  return { run: input => runPipeline(deps, input) };
}

export function toRenderPayload(result: PipelineResult): RenderPayload {
  return {
    resume: result.structured_resume,
    tailored_resume: result.tailored_resume,
    cover_letter: result.cover_letter,
  };
}

/**
 * Most recently written structured resume in the cache that still parses,
 * normalized, or undefined when there is none.
 */
export async function loadLatestStructuredResume(
  cache: { findLatest(cacheType: string, accept?: (document: unknown) => boolean): Promise<unknown> },
  log: Logger = defaultLogger,
): Promise<StructuredResume | undefined> {
  const parses = (document: unknown): boolean => {
    try {
      parseStructuredResume(document);
      return true;
    } catch (err) {
      if (!(err instanceof PipelineError)) throw err;
      log.warn({ error: err.message }, 'Cached resume does not parse; trying an older one');
      return false;
    }
  };
  const document = await cache.findLatest(CACHE_TYPES.resume, parses);
  return document === undefined ? undefined : parseStructuredResume(document);
}
