/**
 * gRPC connection to the remote group-subscription service
 *
 * The underlying client is created on first use and reused by every call
 * until `close()`.
 */

import * as grpc from '@grpc/grpc-js';
import { logger as defaultLogger, type Logger } from '@newsletter/observability';
import type { UnaryMethod } from './proto.js';

export const DEFAULT_DEADLINE_MS = 10_000;

export interface UnaryTransport {
  call(method: UnaryMethod, request: object, metadata?: grpc.Metadata): Promise<unknown>;
  close(): void;
}

export interface GrpcConnectionOptions {
  endpoint: string;
  userAgent: string;
  credentials?: grpc.ChannelCredentials;
  deadlineMs?: number;
  logger?: Logger;
}

export class GrpcConnection implements UnaryTransport {
  private client: grpc.Client | null = null;
  private closed = false;
  private readonly logger: Logger;

  constructor(private readonly options: GrpcConnectionOptions) {
    this.logger = options.logger ?? defaultLogger;
  }

  call(method: UnaryMethod, request: object, metadata = new grpc.Metadata()): Promise<unknown> {
    const deadline = Date.now() + (this.options.deadlineMs ?? DEFAULT_DEADLINE_MS);

    return new Promise((resolve, reject) => {
      this.getClient().makeUnaryRequest(
        method.path,
        method.requestSerialize,
        method.responseDeserialize,
        request,
        metadata,
        { deadline },
        (error, response) => {
          if (error) {
            reject(error);
            return;
          }
          resolve(response);
        }
      );
    });
  }

  close(): void {
    if (this.closed) {
      return;
    }
    this.closed = true;

    if (this.client) {
      this.logger.info({ endpoint: this.options.endpoint }, 'Closing gRPC channel');
      this.client.close();
      this.client = null;
    }
  }

  private getClient(): grpc.Client {
    if (this.closed) {
      throw new Error('gRPC connection is closed');
    }

    if (!this.client) {
      this.logger.info({ endpoint: this.options.endpoint }, 'Opening gRPC channel');
      this.client = new grpc.Client(
        this.options.endpoint,
        this.options.credentials ?? grpc.credentials.createSsl(),
        { 'grpc.primary_user_agent': this.options.userAgent }
      );
    }
    return this.client;
  }
}
