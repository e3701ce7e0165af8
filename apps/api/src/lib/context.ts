/**
 * Application context
 *
 * Builds every long-lived service once at startup and tears them down
 * together. Routes reach them through `c.get('services')`.
 */

import {
  NewsletterService,
  NotificationEmitter,
  SubscriptionClient,
  VerificationRegistry,
  type SubscriptionApi,
  type VerificationTemplate,
} from '@newsletter/core';
import { logger as defaultLogger, type Logger } from '@newsletter/observability';
import { createCooldownLimiter } from '@newsletter/rate-limit';
import type { NewsletterConfig } from '@newsletter/types';
import { createHttpDestination, type FetchLike } from './http-destination.js';
import { PlayerRegistry } from './player-registry.js';

export interface AppContext {
  config: NewsletterConfig;
  players: PlayerRegistry;
  newsletter: NewsletterService;
  subscriptions: SubscriptionClient;
  logger: Logger;
  /** Stop timers, wait for queued remote calls, then release the transport */
  dispose(): Promise<void>;
}

export interface AppContextOptions {
  config: NewsletterConfig;
  api: SubscriptionApi;
  template: VerificationTemplate;
  fetch?: FetchLike;
  logger?: Logger;
  /** Called last during dispose, e.g. to close the gRPC channel */
  onDispose?: () => void;
}

export function createAppContext(options: AppContextOptions): AppContext {
  const { config } = options;
  const logger = options.logger ?? defaultLogger;

  const limiter = createCooldownLimiter({ cooldownSeconds: config.rateLimitSeconds });
  const verifications = new VerificationRegistry();
  const players = new PlayerRegistry((server) => createHttpDestination(server, options.fetch));
  const subscriptions = new SubscriptionClient(options.api, {
    concurrency: config.workerConcurrency,
    logger,
  });
  const notifications = new NotificationEmitter({
    channel: config.channel,
    destinations: players,
    logger,
  });

  const newsletter = new NewsletterService({
    settings: {
      groupId: config.groupId,
      privacyPolicyUrl: config.privacyPolicyUrl,
      emailValidationEnabled: config.emailValidationEnabled,
      emailFrom: config.emailFrom,
    },
    limiter,
    verifications,
    subscriptions,
    notifications,
    template: options.template,
    logger,
  });

  let disposed: Promise<void> | null = null;

  return {
    config,
    players,
    newsletter,
    subscriptions,
    logger,
    dispose() {
      disposed ??= (async () => {
        limiter.shutdown();
        await subscriptions.onIdle();
        verifications.clear();
        options.onDispose?.();
      })();
      return disposed;
    },
  };
}
