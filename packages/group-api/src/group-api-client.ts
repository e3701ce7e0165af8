/**
 * Group API Client
 *
 * `SubscriptionApi` over gRPC. Every call carries a bearer token from the
 * access-token provider; every failure is rethrown as a RemoteApiError.
 */

import { Metadata } from '@grpc/grpc-js';
import { z } from 'zod';
import type {
  RemoteApiError,
  InsertEmailToGroupResult,
  SendEmailAck,
  SendEmailParams,
  Substitutions,
  SubscriptionApi,
} from '@newsletter/core';
import type { AccessTokenProvider, IssuedToken, TokenSource } from './access-token.js';
import type { UnaryTransport } from './connection.js';
import { InvalidResponseError, toRemoteApiError } from './errors.js';
import type { GroupApiMethods } from './proto.js';

export const EMAIL_CATEGORY = 'Email Verification';

const UpdateResponseSchema = z.object({
  success: z.boolean(),
  message: z.string(),
  affectedRows: z.coerce.number().int(),
});

const SendEmailResponseSchema = z.object({
  message: z.array(z.string()).default([]),
});

const AuthResponseSchema = z.object({
  token: z.string().min(1),
  expires: z.object({
    seconds: z.coerce.number(),
    nanos: z.number().default(0),
  }),
});

function parseResponse<T extends z.ZodTypeAny>(schema: T, method: string, response: unknown): z.infer<T> {
  const parsed = schema.safeParse(response);
  if (!parsed.success) {
    throw new InvalidResponseError(method, { cause: parsed.error });
  }
  return parsed.data;
}

/**
 * Token source that calls Auth.GetJwtToken with the API key
 */
export function createGrpcTokenSource(transport: UnaryTransport, methods: GroupApiMethods): TokenSource {
  return async ({ secret, keyId }): Promise<IssuedToken> => {
    const response = await transport.call(methods.getJwtToken, {
      apiKey: { keyID: keyId, secret },
    });
    const { token, expires } = parseResponse(AuthResponseSchema, 'GetJwtToken', response);
    return { token, expiresAt: expires.seconds * 1000 + Math.floor(expires.nanos / 1_000_000) };
  };
}

export class GroupApiClient implements SubscriptionApi {
  constructor(
    private readonly transport: UnaryTransport,
    private readonly methods: GroupApiMethods,
    private readonly tokens: AccessTokenProvider
  ) {}

  async insertEmailToGroup(
    groupId: string,
    email: string,
    substitutions: Substitutions
  ): Promise<InsertEmailToGroupResult> {
    try {
      const response = await this.transport.call(
        this.methods.insertEmailToGroup,
        { emails: [{ email }], groupId, substitutions },
        await this.authorize()
      );
      return parseResponse(UpdateResponseSchema, 'InsertEmailToGroup', response);
    } catch (error) {
      throw this.fail(error);
    }
  }

  async sendEmail(params: SendEmailParams): Promise<SendEmailAck> {
    try {
      const response = await this.transport.call(
        this.methods.sendEmail,
        {
          to: params.to.map((email) => ({ email })),
          from: { email: params.from },
          subject: params.subject,
          textContent: { html: params.html, text: params.text, tracking: true },
          additionalInfos: { category: EMAIL_CATEGORY },
        },
        await this.authorize()
      );
      const { message } = parseResponse(SendEmailResponseSchema, 'SendEmail', response);
      return { messageIds: message };
    } catch (error) {
      throw this.fail(error);
    }
  }

  private async authorize(): Promise<Metadata> {
    const metadata = new Metadata();
    metadata.set('authorization', `Bearer ${await this.tokens.getToken()}`);
    return metadata;
  }

  private fail(error: unknown): RemoteApiError {
    const remote = toRemoteApiError(error);
    if (remote.code === 'unauthenticated') {
      this.tokens.invalidate();
    }
    return remote;
  }
}
