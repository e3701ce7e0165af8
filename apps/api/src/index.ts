import 'dotenv/config';
import { serve } from '@hono/node-server';
import { createGroupApi } from '@newsletter/group-api';
import { loadVerificationTemplate } from '@newsletter/email-templates';
import { logger } from '@newsletter/observability';
import { createApp } from './app.js';
import { createAppContext } from './lib/context.js';
import { loadConfig, readPort } from './lib/config.js';

const USER_AGENT = 'newsletter-bridge/1.0.0';

async function main() {
  const config = loadConfig();
  const port = readPort();

  if (!config.privacyPolicyUrl) {
    logger.warn('No privacy policy URL configured - subscriptions will not ask for consent');
  }

  const template = await loadVerificationTemplate({ directory: config.templateDirectory });
  const groupApi = createGroupApi({
    apiKey: config.apiKey,
    endpoint: config.apiEndpoint,
    userAgent: USER_AGENT,
    logger,
  });
  const services = createAppContext({
    config,
    api: groupApi.api,
    template,
    logger,
    onDispose: groupApi.close,
  });

  logger.info(
    {
      port,
      channel: config.channel,
      rateLimitSeconds: config.rateLimitSeconds,
      emailValidation: config.emailValidationEnabled,
    },
    'Starting server'
  );

  const server = serve({ fetch: createApp(services).fetch, port }, (info) => {
    logger.info({ port: info.port }, 'Server running');
  });

  const shutdown = (signal: NodeJS.Signals) => {
    logger.info({ signal }, 'Shutting down');
    server.close();
    services
      .dispose()
      .then(() => process.exit(0))
      .catch((error: unknown) => {
        logger.error({ err: error }, 'Shutdown failed');
        process.exit(1);
      });
  };

  process.once('SIGINT', shutdown);
  process.once('SIGTERM', shutdown);
}

main().catch((error: unknown) => {
  logger.fatal({ err: error }, 'Failed to start server');
  process.exit(1);
});
