/**
 * Player sessions and the local newsletter command
 *
 * PUT    /v1/players/:playerId                      - connect or update
 * DELETE /v1/players/:playerId                      - disconnect
 * POST   /v1/players/:playerId/commands/newsletter  - run the command (202)
 * GET    /v1/players/:playerId/messages             - drain pending messages
 */

import { Hono } from 'hono';
import { zValidator } from '@hono/zod-validator';
import { PlayerCommandSchema, PlayerSessionSchema } from '@newsletter/types';
import type { AppBindings } from '../../types/context.js';

const playersRoute = new Hono<AppBindings>();

playersRoute.put(
  '/:playerId',
  zValidator('json', PlayerSessionSchema, (result, c) => {
    if (!result.success) {
      return c.json({ error: 'Validation failed', issues: result.error.issues }, 400);
    }
  }),
  (c) => {
    const { players } = c.get('services');
    const player = players.connect(c.req.param('playerId'), c.req.valid('json'));

    return c.json({ player });
  }
);

playersRoute.delete('/:playerId', (c) => {
  const { players } = c.get('services');

  if (!players.disconnect(c.req.param('playerId'))) {
    return c.json({ error: 'Player not connected' }, 404);
  }
  return c.body(null, 204);
});

playersRoute.post(
  '/:playerId/commands/newsletter',
  zValidator('json', PlayerCommandSchema, (result, c) => {
    if (!result.success) {
      return c.json({ error: 'Validation failed', issues: result.error.issues }, 400);
    }
  }),
  (c) => {
    const { players, newsletter, logger } = c.get('services');
    const playerId = c.req.param('playerId');
    const sender = players.sender(playerId);

    if (!sender) {
      return c.json({ error: 'Player not connected' }, 404);
    }

    logger.debug({ playerId, requestId: c.get('requestId') }, 'Newsletter command received');
    newsletter.submit(sender, c.req.valid('json').args);

    return c.json({ accepted: true }, 202);
  }
);

playersRoute.get('/:playerId/messages', (c) => {
  const { players } = c.get('services');
  const messages = players.drain(c.req.param('playerId'));

  if (!messages) {
    return c.json({ error: 'Player not connected' }, 404);
  }
  return c.json({ messages });
});

export { playersRoute };
