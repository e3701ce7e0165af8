/**
 * Subscription Client
 *
 * Runs remote calls on a bounded queue and turns every result, rejection or
 * synchronous throw into an outcome value. Returned promises never reject.
 */

import PQueue from 'p-queue';
import { getRecipientLogId, logger as defaultLogger, type Logger } from '@newsletter/observability';
import { RemoteApiError, describeFailure } from './subscription-errors.js';
import type {
  InsertOutcome,
  SendOutcome,
  Substitutions,
  SubscriptionApi,
  VerificationEmail,
} from './subscription-types.js';

export const DEFAULT_WORKER_CONCURRENCY = 8;

export interface SubscriptionClientOptions {
  concurrency?: number;
  logger?: Logger;
}

export class SubscriptionClient {
  private readonly queue: PQueue;
  private readonly logger: Logger;

  constructor(
    private readonly api: SubscriptionApi,
    options: SubscriptionClientOptions = {}
  ) {
    this.queue = new PQueue({ concurrency: options.concurrency ?? DEFAULT_WORKER_CONCURRENCY });
    this.logger = options.logger ?? defaultLogger;
  }

  insertEmail(groupId: string, email: string, substitutions: Substitutions): Promise<InsertOutcome> {
    const recipient = getRecipientLogId(email);

    return this.schedule<InsertOutcome>(
      async () => {
        const result = await this.api.insertEmailToGroup(groupId, email, substitutions);
        if (!result.success) {
          const reason = result.message || 'insert rejected';
          this.logger.error({ recipient, groupId, reason }, 'Remote insert reported failure');
          return { type: 'failure', reason };
        }
        this.logger.info({ recipient, groupId, affectedRows: result.affectedRows }, 'Email added to group');
        return { type: 'added', affectedRows: result.affectedRows };
      },
      (error) => {
        if (error instanceof RemoteApiError && error.isConflict) {
          this.logger.info({ recipient, groupId }, 'Email already in group');
          return { type: 'conflict' };
        }
        const reason = describeFailure(error);
        this.logger.error({ recipient, groupId, reason, err: error }, 'Remote insert failed');
        return { type: 'failure', reason };
      }
    );
  }

  sendVerificationEmail(message: VerificationEmail): Promise<SendOutcome> {
    const recipient = getRecipientLogId(message.to);

    return this.schedule<SendOutcome>(
      async () => {
        const ack = await this.api.sendEmail({
          from: message.from,
          to: [message.to],
          subject: message.subject,
          text: message.text,
          html: message.html,
        });
        this.logger.info({ recipient, messageIds: ack.messageIds }, 'Verification email sent');
        return { type: 'sent' };
      },
      (error) => {
        const reason = describeFailure(error);
        this.logger.error({ recipient, reason, err: error }, 'Verification email failed');
        return { type: 'failure', reason };
      }
    );
  }

  /** Resolves once every queued and running call has settled */
  onIdle(): Promise<void> {
    return this.queue.onIdle();
  }

  get pending(): number {
    return this.queue.size + this.queue.pending;
  }

  private schedule<T>(call: () => Promise<T>, recover: (error: unknown) => T): Promise<T> {
    return this.queue
      .add(
        async () => {
          try {
            return await call();
          } catch (error) {
            return recover(error);
          }
        },
        { throwOnTimeout: true }
      )
      .catch(recover);
  }
}
