/**
 * @newsletter/group-api - gRPC transport for the remote group service
 */

import type { SubscriptionApi } from '@newsletter/core';
import { logger as defaultLogger, type Logger } from '@newsletter/observability';
import { AccessTokenProvider } from './access-token.js';
import { GrpcConnection } from './connection.js';
import { GroupApiClient, createGrpcTokenSource } from './group-api-client.js';
import { loadGroupApiMethods } from './proto.js';

export interface GroupApiOptions {
  apiKey: string;
  endpoint: string;
  userAgent: string;
  logger?: Logger;
}

export interface GroupApi {
  api: SubscriptionApi;
  /** Close the shared channel; safe to call more than once */
  close(): void;
}

export function createGroupApi(options: GroupApiOptions): GroupApi {
  const logger = options.logger ?? defaultLogger;
  const methods = loadGroupApiMethods();
  const connection = new GrpcConnection({
    endpoint: options.endpoint,
    userAgent: options.userAgent,
    logger,
  });
  const tokens = new AccessTokenProvider({
    apiKey: options.apiKey,
    fetchToken: createGrpcTokenSource(connection, methods),
    logger,
  });

  return {
    api: new GroupApiClient(connection, methods, tokens),
    close: () => connection.close(),
  };
}

export {
  AccessTokenProvider,
  parseApiKey,
  REQUIRED_SCOPE,
  REFRESH_BUFFER_MS,
} from './access-token.js';
export type {
  AccessTokenProviderOptions,
  ApiKeyCredentials,
  IssuedToken,
  TokenSource,
} from './access-token.js';
export { GrpcConnection, DEFAULT_DEADLINE_MS } from './connection.js';
export type { GrpcConnectionOptions, UnaryTransport } from './connection.js';
export { GroupApiClient, createGrpcTokenSource, EMAIL_CATEGORY } from './group-api-client.js';
export { ApiKeyFormatError, MissingScopeError, InvalidResponseError, toRemoteApiError } from './errors.js';
export { loadGroupApiMethods, PROTO_DIRECTORY, PROTO_PACKAGE } from './proto.js';
export type { GroupApiMethods, UnaryMethod } from './proto.js';
