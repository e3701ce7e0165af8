/**
 * Notification Emitter
 *
 * Best-effort delivery of a status token to the user's current destination.
 * No retry, no queue, no acknowledgement: a missing destination is a no-op
 * and a failed send is logged and dropped.
 */

import type { SubscriptionStatus } from '@newsletter/types';
import { logger as defaultLogger, type Logger } from '@newsletter/observability';
import { encodeStatus } from './status-codec.js';
import type { DestinationResolver } from './notification-types.js';

export interface NotificationEmitterOptions {
  channel: string;
  destinations: DestinationResolver;
  logger?: Logger;
}

export class NotificationEmitter {
  readonly channel: string;
  private readonly destinations: DestinationResolver;
  private readonly logger: Logger;

  constructor(options: NotificationEmitterOptions) {
    this.channel = options.channel;
    this.destinations = options.destinations;
    this.logger = options.logger ?? defaultLogger;
  }

  emit(userId: string, status: SubscriptionStatus): void {
    const destination = this.destinations.resolve(userId);
    if (!destination) {
      this.logger.debug({ userId, status }, 'No destination for status notification');
      return;
    }

    const dropped = (error: unknown) => {
      this.logger.warn(
        { userId, status, destination: destination.name, err: error },
        'Status notification dropped'
      );
    };

    try {
      const sent = destination.send(this.channel, encodeStatus(status));
      if (sent instanceof Promise) {
        sent.catch(dropped);
      }
    } catch (error) {
      dropped(error);
    }
  }
}
