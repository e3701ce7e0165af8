import { Hono } from 'hono';
import type { AppBindings } from '../../types/context.js';

const healthRoute = new Hono<AppBindings>();

healthRoute.get('/', (c) => {
  const { players, subscriptions } = c.get('services');

  const response = {
    status: 'ok' as const,
    timestamp: new Date().toISOString(),
    version: '1.0.0',
    players: players.size,
    pendingCalls: subscriptions.pending,
  };

  return c.json(response);
});

export { healthRoute };
