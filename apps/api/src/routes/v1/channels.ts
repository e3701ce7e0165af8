/**
 * Inbound wire channel
 *
 * POST /v1/channels/:channel/players/:playerId
 *
 * A backend server forwards a player's newsletter message as raw UTF-8
 * tokens. Only the configured channel is accepted.
 */

import { Hono } from 'hono';
import type { AppBindings } from '../../types/context.js';

const channelsRoute = new Hono<AppBindings>();

channelsRoute.post('/:channel/players/:playerId', async (c) => {
  const { config, players, newsletter, logger } = c.get('services');
  const channel = c.req.param('channel');
  const playerId = c.req.param('playerId');

  if (channel !== config.channel) {
    return c.json({ error: 'Unknown channel' }, 404);
  }

  const sender = players.sender(playerId);
  if (!sender) {
    return c.json({ error: 'Player not connected' }, 404);
  }

  const payload = new Uint8Array(await c.req.arrayBuffer());
  logger.info({ channel, playerId, bytes: payload.byteLength }, 'Received channel message');
  newsletter.submitWireMessage(sender, payload);

  return c.json({ accepted: true }, 202);
});

export { channelsRoute };
