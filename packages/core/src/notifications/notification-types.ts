/**
 * Notification Domain Types
 */

/**
 * A downstream endpoint that accepts raw channel payloads, typically the
 * backend server a player is connected to.
 */
export interface Destination {
  readonly name: string;
  send(channel: string, payload: Uint8Array): void | Promise<void>;
}

export interface DestinationResolver {
  /** The user's current destination, or null when none is associated */
  resolve(userId: string): Destination | null;
}
