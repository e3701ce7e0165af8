import { describe, it, expect, vi, beforeEach, type Mock } from 'vitest';
import type { Destination, PlayerMessage } from '@newsletter/core';
import type { BackendServer } from '@newsletter/types';
import { MAX_OUTBOX_SIZE, PlayerRegistry } from '../player-registry.js';

const lobby: BackendServer = { name: 'lobby', url: 'http://lobby.internal/newsletter' };
const survival: BackendServer = { name: 'survival', url: 'http://survival.internal/newsletter' };

function message(text: string): PlayerMessage {
  return { tone: 'info', title: 'Test', text };
}

describe('PlayerRegistry', () => {
  let createDestination: Mock<(server: BackendServer) => Destination>;
  let registry: PlayerRegistry;

  beforeEach(() => {
    createDestination = vi.fn<(server: BackendServer) => Destination>((server) => ({
      name: server.name,
      send: vi.fn(),
    }));
    registry = new PlayerRegistry(createDestination);
  });

  it('resolves the destination of the current server', () => {
    registry.connect('player-1', { name: 'Steve', permissions: [], server: lobby });

    expect(registry.resolve('player-1')?.name).toBe('lobby');

    registry.connect('player-1', { name: 'Steve', permissions: [], server: survival });

    expect(registry.resolve('player-1')?.name).toBe('survival');
  });

  it('has no destination for players without a server or not connected', () => {
    registry.connect('player-1', { name: 'Steve', permissions: [], server: null });

    expect(registry.resolve('player-1')).toBeNull();
    expect(registry.resolve('player-2')).toBeNull();
    expect(createDestination).not.toHaveBeenCalled();
  });

  it('builds senders that check permissions and queue messages', () => {
    registry.connect('player-1', { name: 'Steve', permissions: ['newsletter.add'], server: null });
    const sender = registry.sender('player-1');

    expect(sender?.name).toBe('Steve');
    expect(sender?.hasPermission('newsletter.add')).toBe(true);
    expect(sender?.hasPermission('admin')).toBe(false);

    sender?.sendMessage(message('hello'));

    expect(registry.drain('player-1')).toEqual([message('hello')]);
    expect(registry.drain('player-1')).toEqual([]);
  });

  it('keeps pending messages across a server switch', () => {
    registry.connect('player-1', { name: 'Steve', permissions: [], server: lobby });
    registry.sender('player-1')?.sendMessage(message('queued'));
    registry.connect('player-1', { name: 'Steve', permissions: [], server: survival });

    expect(registry.drain('player-1')).toEqual([message('queued')]);
  });

  it('drops the oldest messages when the outbox is full', () => {
    registry.connect('player-1', { name: 'Steve', permissions: [], server: null });
    const sender = registry.sender('player-1');

    for (let index = 0; index <= MAX_OUTBOX_SIZE; index++) {
      sender?.sendMessage(message(String(index)));
    }
    const drained = registry.drain('player-1') ?? [];

    expect(drained).toHaveLength(MAX_OUTBOX_SIZE);
    expect(drained[0]?.text).toBe('1');
  });

  it('forgets disconnected players', () => {
    registry.connect('player-1', { name: 'Steve', permissions: [], server: lobby });

    expect(registry.disconnect('player-1')).toBe(true);
    expect(registry.disconnect('player-1')).toBe(false);
    expect(registry.sender('player-1')).toBeNull();
    expect(registry.drain('player-1')).toBeNull();
    expect(registry.size).toBe(0);
  });
});
