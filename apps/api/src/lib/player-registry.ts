/**
 * Player Registry
 *
 * Connected players, the backend server each one is on, and the messages
 * waiting to be shown to them. Doubles as the destination resolver for
 * status notifications.
 */

import type {
  CommandSender,
  Destination,
  DestinationResolver,
  PlayerMessage,
} from '@newsletter/core';
import type { BackendServer, PlayerSession } from '@newsletter/types';

export const MAX_OUTBOX_SIZE = 50;

interface ConnectedPlayer {
  id: string;
  name: string;
  permissions: Set<string>;
  server: BackendServer | null;
  destination: Destination | null;
  outbox: PlayerMessage[];
}

export interface PlayerSummary {
  id: string;
  name: string;
  permissions: string[];
  server: BackendServer | null;
}

export class PlayerRegistry implements DestinationResolver {
  private readonly players = new Map<string, ConnectedPlayer>();

  constructor(private readonly createDestination: (server: BackendServer) => Destination) {}

  /**
   * Connect a player, or update the name, permissions or server of one
   * already connected. Pending messages survive a server switch.
   */
  connect(id: string, session: PlayerSession): PlayerSummary {
    const existing = this.players.get(id);
    const player: ConnectedPlayer = {
      id,
      name: session.name,
      permissions: new Set(session.permissions),
      server: session.server,
      destination: session.server ? this.createDestination(session.server) : null,
      outbox: existing?.outbox ?? [],
    };
    this.players.set(id, player);
    return summarize(player);
  }

  disconnect(id: string): boolean {
    return this.players.delete(id);
  }

  get(id: string): PlayerSummary | null {
    const player = this.players.get(id);
    return player ? summarize(player) : null;
  }

  get size(): number {
    return this.players.size;
  }

  /**
   * Command sender bound to a connected player. Messages land in the
   * player's outbox; the oldest are dropped once it is full.
   */
  sender(id: string): CommandSender | null {
    const player = this.players.get(id);
    if (!player) {
      return null;
    }

    return {
      id: player.id,
      name: player.name,
      hasPermission: (permission) => player.permissions.has(permission),
      sendMessage: (message) => {
        player.outbox.push(message);
        if (player.outbox.length > MAX_OUTBOX_SIZE) {
          player.outbox.shift();
        }
      },
    };
  }

  drain(id: string): PlayerMessage[] | null {
    const player = this.players.get(id);
    if (!player) {
      return null;
    }
    return player.outbox.splice(0);
  }

  resolve(userId: string): Destination | null {
    return this.players.get(userId)?.destination ?? null;
  }
}

function summarize(player: ConnectedPlayer): PlayerSummary {
  return {
    id: player.id,
    name: player.name,
    permissions: [...player.permissions],
    server: player.server,
  };
}
