import { Hono } from 'hono';
import logger from './lib/logger.js';
import { requestIdMiddleware } from './middleware/request-id.js';
import { createPipelineRoutes, type PipelineRouteDeps } from './routes/pipeline.js';

export function createApp(deps: PipelineRouteDeps): Hono {
  const app = new Hono();

  app.use('*', requestIdMiddleware);

  app.get('/health', (c) => c.json({ status: 'ok' }));

  app.route('/api', createPipelineRoutes(deps));

  app.notFound((c) => {
    return c.json({ error: 'Not found' }, 404);
  });

  app.onError((err, c) => {
    const requestId = c.get('requestId');
    logger.error({ err, requestId }, 'Unhandled error');
    return c.json({ error: 'Internal server error', request_id: requestId }, 500);
  });

  return app;
}
