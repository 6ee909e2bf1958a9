import { serve } from '@hono/node-server';
import { fileURLToPath } from 'node:url';
import path from 'node:path';
import { createApp } from './app.js';
import { createCompletionPort } from './lib/completion.js';
import { loadConfig } from './lib/config.js';
import { FileContentCache } from './lib/content-cache.js';
import { createProvider, getModel } from './lib/llm.js';
import logger from './lib/logger.js';

let server: ReturnType<typeof serve> | null = null;
let shuttingDown = false;

function shutdown(signal: string) {
  if (shuttingDown || !server) return;
  shuttingDown = true;
  logger.info({ signal }, 'Graceful shutdown initiated');

  server.close(() => {
    logger.info('HTTP server closed');
    process.exit(0);
  });

  // Force exit if in-flight pipeline runs don't drain
  setTimeout(() => {
    logger.warn('Forcing exit after shutdown timeout');
    process.exit(1);
  }, 10_000).unref();
}

export function startServer() {
  if (server) return server;

  const config = loadConfig();
  const provider = createProvider(config);
  const model = getModel(config);
  const cache = new FileContentCache(path.resolve(config.cacheDir));

  const app = createApp({
    cache,
    createCompletion: (usage, log) =>
      createCompletionPort(config.completionMode, {
        provider,
        model,
        maxTokens: config.maxTokens,
        usage,
        logger: log,
      }),
  });

  logger.info(
    { port: config.port, provider: provider.name, model, mode: config.completionMode, cacheDir: cache.rootDir },
    'Resume tailor server starting',
  );
  server = serve({ fetch: app.fetch, port: config.port });
  logger.info({ port: config.port }, `Server running at http://localhost:${config.port}`);

  process.on('SIGTERM', () => shutdown('SIGTERM'));
  process.on('SIGINT', () => shutdown('SIGINT'));
  process.on('unhandledRejection', (reason) => {
    logger.error({ reason }, 'Unhandled promise rejection');
    shutdown('UNHANDLED_REJECTION');
  });

  return server;
}

function isMainModule(): boolean {
  const current = fileURLToPath(import.meta.url);
  const entry = process.argv[1];
  if (!entry) return false;
  return path.resolve(entry) === path.resolve(current);
}

if (isMainModule()) {
  startServer();
}

export { createApp } from './app.js';
export { runPipeline, createPipeline, toRenderPayload, loadLatestStructuredResume } from './pipeline/orchestrator.js';
export type { PipelineDeps, PipelineEmitter } from './pipeline/orchestrator.js';
export type * from './pipeline/types.js';
