import type { Destination } from '@newsletter/core';
import type { BackendServer } from '@newsletter/types';

export type FetchLike = typeof fetch;

/**
 * Destination that POSTs raw status bytes to a backend server
 */
export function createHttpDestination(server: BackendServer, fetchImpl: FetchLike = fetch): Destination {
  return {
    name: server.name,
    async send(channel, payload) {
      const response = await fetchImpl(server.url, {
        method: 'POST',
        headers: {
          'content-type': 'application/octet-stream',
          'x-channel': channel,
        },
        body: payload,
      });

      if (!response.ok) {
        throw new Error(`Backend server ${server.name} responded with ${response.status}`);
      }
    },
  };
}
