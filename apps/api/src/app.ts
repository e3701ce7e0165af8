import { Hono } from 'hono';
import type { AppContext } from './lib/context.js';
import { requestIdMiddleware } from './middleware/request-id.js';
import { channelsRoute } from './routes/v1/channels.js';
import { healthRoute } from './routes/v1/health.js';
import { playersRoute } from './routes/v1/players.js';
import type { AppBindings } from './types/context.js';

export function createApp(services: AppContext) {
  const app = new Hono<AppBindings>();

  // Apply request ID middleware first for log correlation
  app.use('*', requestIdMiddleware);

  app.use('*', async (c, next) => {
    c.set('services', services);
    await next();
  });

  app.onError((error, c) => {
    services.logger.error({ err: error, requestId: c.get('requestId') }, 'Unhandled request error');
    return c.json({ error: 'Internal server error' }, 500);
  });

  app.notFound((c) => c.json({ error: 'Not found' }, 404));

  app.route('/health', healthRoute);

  // Mount v1 routes
  const v1 = new Hono<AppBindings>();
  v1.route('/health', healthRoute);
  v1.route('/players', playersRoute);
  v1.route('/channels', channelsRoute);

  app.route('/v1', v1);

  return app;
}

export type App = ReturnType<typeof createApp>;
