/**
 * HTTP test helpers
 * Builds an app over in-process fakes for the remote API and backend servers
 */

import { vi, type Mock } from 'vitest';
import type { Env, Hono } from 'hono';
import type { SubscriptionApi } from '@newsletter/core';
import { createLogger } from '@newsletter/observability';
import { NewsletterConfigSchema, type NewsletterConfigInput } from '@newsletter/types';
import { createApp } from '../app.js';
import { createAppContext, type AppContext } from '../lib/context.js';
import type { FetchLike } from '../lib/http-destination.js';

export interface RequestOptions {
  body?: unknown;
  headers?: Record<string, string>;
}

/**
 * Make an HTTP request to the Hono app. Objects are sent as JSON; strings
 * and byte arrays are sent as they are.
 */
export async function makeRequest<E extends Env>(
  app: Hono<E>,
  method: string,
  path: string,
  options: RequestOptions = {}
): Promise<Response> {
  const { body, headers = {} } = options;
  const init: RequestInit = { method: method.toUpperCase(), headers: { ...headers } };

  if (typeof body === 'string' || body instanceof Uint8Array) {
    init.body = body;
  } else if (body !== undefined) {
    init.body = JSON.stringify(body);
    init.headers = { 'Content-Type': 'application/json', ...headers };
  }

  return app.fetch(new Request(`http://localhost${path}`, init));
}

export interface TestHarness {
  app: ReturnType<typeof createApp>;
  services: AppContext;
  api: {
    insertEmailToGroup: Mock<SubscriptionApi['insertEmailToGroup']>;
    sendEmail: Mock<SubscriptionApi['sendEmail']>;
  };
  fetch: Mock<FetchLike>;
}

export function createTestHarness(config: Partial<NewsletterConfigInput> = {}): TestHarness {
  const api = {
    insertEmailToGroup: vi
      .fn<SubscriptionApi['insertEmailToGroup']>()
      .mockResolvedValue({ success: true, message: '', affectedRows: 1 }),
    sendEmail: vi.fn<SubscriptionApi['sendEmail']>().mockResolvedValue({ messageIds: ['msg-1'] }),
  };
  const fetch = vi.fn<FetchLike>().mockImplementation(async () => new Response(null, { status: 204 }));

  const services = createAppContext({
    config: NewsletterConfigSchema.parse({
      apiKey: 'test-secret.1',
      groupId: 'group-1',
      ...config,
    }),
    api,
    template: { html: '<p>{{username}}: {{code}}</p>', text: '{{username}}: {{code}}' },
    fetch,
    logger: createLogger({ level: 'silent' }),
  });

  return { app: createApp(services), services, api, fetch };
}

/**
 * Decode what a backend server received from a fake fetch call
 */
export function deliveredStatus(fetch: Mock<FetchLike>, index = 0) {
  const [url, init] = fetch.mock.calls[index] ?? [];
  const body = init?.body;
  return {
    url: String(url),
    headers: init?.headers,
    status: body instanceof Uint8Array ? new TextDecoder().decode(body) : null,
  };
}
