/**
 * Notification Domain
 *
 * Status wire codec and fire-and-forget delivery to downstream destinations
 */

export { NotificationEmitter } from './notification-emitter.js';
export type { NotificationEmitterOptions } from './notification-emitter.js';
export { encodeStatus, decodeStatus } from './status-codec.js';
export type { Destination, DestinationResolver } from './notification-types.js';
