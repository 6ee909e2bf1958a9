import { Hono } from 'hono';
import { z } from 'zod';
import type { CompletionPort } from '../lib/completion.js';
import type { ContentCache } from '../lib/content-cache.js';
import { toErrorResponse } from '../lib/errors.js';
import { UsageTracker } from '../lib/llm-provider.js';
import { createSessionLogger, type Logger } from '../lib/logger.js';
import { loadLatestStructuredResume, runPipeline } from '../pipeline/orchestrator.js';
import { CACHE_TYPES } from '../pipeline/stage-runner.js';
import '../middleware/request-id.js';

const runPipelineSchema = z.object({
  resume_text: z.string().trim().min(1).max(100_000),
  job_text: z.string().trim().min(1).max(50_000),
});

const cacheTypes: readonly string[] = Object.values(CACHE_TYPES);

export interface PipelineRouteDeps {
  cache: ContentCache & {
    findLatest(cacheType: string, accept?: (document: unknown) => boolean): Promise<unknown>;
    clear(cacheType?: string): Promise<number>;
  };
  /** Builds the completion port for one run, recording into `usage`. */
  createCompletion: (usage: UsageTracker, logger: Logger) => CompletionPort;
}

export function createPipelineRoutes(deps: PipelineRouteDeps): Hono {
  const routes = new Hono();

  // POST /pipeline: Run the whole pipeline on pasted text
  routes.post('/pipeline', async (c) => {
    let body: unknown;
    try {
      body = await c.req.json();
    } catch {
      return c.json({ error: 'Invalid JSON body', code: 'BAD_REQUEST' }, 400);
    }

    const parsed = runPipelineSchema.safeParse(body);
    if (!parsed.success) {
      return c.json({ error: 'Invalid request', code: 'BAD_REQUEST', details: parsed.error.flatten() }, 400);
    }

    const runId = c.get('requestId');
    const log = createSessionLogger(runId);
    const usage = new UsageTracker();
    try {
      const result = await runPipeline(
        { completion: deps.createCompletion(usage, log), cache: deps.cache, usage, logger: log },
        parsed.data,
      );
      return c.json({ run_id: runId, ...result });
    } catch (err) {
      const { status, body: errorBody } = toErrorResponse(err);
      return c.json(errorBody, status);
    }
  });

  // GET /resume/latest: Most recently structured resume
  routes.get('/resume/latest', async (c) => {
    const resume = await loadLatestStructuredResume(deps.cache);
    if (!resume) {
      return c.json({ error: 'No structured resume cached', code: 'NOT_FOUND' }, 404);
    }
    return c.json({ resume });
  });

  // DELETE /cache: Clear all entries, or one partition with ?type=
  routes.delete('/cache', async (c) => {
    const type = c.req.query('type');
    if (type !== undefined && !cacheTypes.includes(type)) {
      return c.json({ error: `Unknown cache type: ${type}`, code: 'BAD_REQUEST', details: cacheTypes }, 400);
    }
    const removed = await deps.cache.clear(type);
    return c.json({ removed });
  });

  return routes;
}
