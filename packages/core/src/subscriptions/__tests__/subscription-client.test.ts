import { describe, it, expect, vi, beforeEach } from 'vitest';
import { createLogger } from '@newsletter/observability';
import { Status } from '@newsletter/types';
import { SubscriptionClient } from '../subscription-client.js';
import { RemoteApiError } from '../subscription-errors.js';
import { statusForInsertOutcome, statusForSendOutcome } from '../subscription-status.js';
import type { SubscriptionApi } from '../subscription-types.js';

function createApi(): SubscriptionApi & {
  insertEmailToGroup: ReturnType<typeof vi.fn>;
  sendEmail: ReturnType<typeof vi.fn>;
} {
  return {
    insertEmailToGroup: vi.fn().mockResolvedValue({ success: true, message: '', affectedRows: 1 }),
    sendEmail: vi.fn().mockResolvedValue({ messageIds: ['msg-1'] }),
  };
}

describe('SubscriptionClient', () => {
  let api: ReturnType<typeof createApi>;
  let logger: ReturnType<typeof createLogger>;
  let client: SubscriptionClient;

  beforeEach(() => {
    api = createApi();
    logger = createLogger({ level: 'silent' });
    client = new SubscriptionClient(api, { logger, concurrency: 2 });
  });

  describe('insertEmail', () => {
    it('resolves to added on success', async () => {
      const outcome = await client.insertEmail('group-1', 'player@example.com', {
        '{{mc_username}}': 'Steve',
      });

      expect(outcome).toEqual({ type: 'added', affectedRows: 1 });
      expect(api.insertEmailToGroup).toHaveBeenCalledWith('group-1', 'player@example.com', {
        '{{mc_username}}': 'Steve',
      });
    });

    it('maps an already-exists rejection to a conflict without logging a failure', async () => {
      const errorSpy = vi.spyOn(logger, 'error');
      api.insertEmailToGroup.mockRejectedValue(
        new RemoteApiError('already_exists', 'email already in group')
      );

      const outcome = await client.insertEmail('group-1', 'player@example.com', {});

      expect(outcome).toEqual({ type: 'conflict' });
      expect(errorSpy).not.toHaveBeenCalled();
    });

    it('maps transport errors to a logged failure', async () => {
      const errorSpy = vi.spyOn(logger, 'error');
      api.insertEmailToGroup.mockRejectedValue(new RemoteApiError('unavailable', 'connection refused'));

      const outcome = await client.insertEmail('group-1', 'player@example.com', {});

      expect(outcome).toEqual({ type: 'failure', reason: 'unavailable: connection refused' });
      expect(errorSpy).toHaveBeenCalledTimes(1);
    });

    it('maps an unsuccessful response to a failure', async () => {
      api.insertEmailToGroup.mockResolvedValue({
        success: false,
        message: 'group is archived',
        affectedRows: 0,
      });

      const outcome = await client.insertEmail('group-1', 'player@example.com', {});

      expect(outcome).toEqual({ type: 'failure', reason: 'group is archived' });
    });

    it('contains synchronous throws while building the call', async () => {
      api.insertEmailToGroup.mockImplementation(() => {
        throw new Error('channel not ready');
      });

      const outcome = await client.insertEmail('group-1', 'player@example.com', {});

      expect(outcome).toEqual({ type: 'failure', reason: 'channel not ready' });
    });

    it('never runs more calls at once than the pool allows', async () => {
      let running = 0;
      let peak = 0;
      api.insertEmailToGroup.mockImplementation(async () => {
        running++;
        peak = Math.max(peak, running);
        await new Promise((resolve) => setTimeout(resolve, 5));
        running--;
        return { success: true, message: '', affectedRows: 1 };
      });

      await Promise.all(
        Array.from({ length: 6 }, (_, i) => client.insertEmail('group-1', `p${i}@example.com`, {}))
      );

      expect(peak).toBe(2);
      expect(client.pending).toBe(0);
    });
  });

  describe('sendVerificationEmail', () => {
    const message = {
      from: 'news@example.com',
      to: 'player@example.com',
      subject: 'Newsletter Verification',
      html: '<p>12345</p>',
      text: '12345',
    };

    it('resolves to sent on acknowledgement', async () => {
      const outcome = await client.sendVerificationEmail(message);

      expect(outcome).toEqual({ type: 'sent' });
      expect(api.sendEmail).toHaveBeenCalledWith({
        from: 'news@example.com',
        to: ['player@example.com'],
        subject: 'Newsletter Verification',
        html: '<p>12345</p>',
        text: '12345',
      });
    });

    it('resolves to failure when the send is rejected', async () => {
      api.sendEmail.mockRejectedValue(new RemoteApiError('permission_denied', 'sender not verified'));

      const outcome = await client.sendVerificationEmail(message);

      expect(outcome).toEqual({
        type: 'failure',
        reason: 'permission_denied: sender not verified',
      });
    });
  });
});

describe('status mapping', () => {
  it('maps insert outcomes', () => {
    expect(statusForInsertOutcome({ type: 'added', affectedRows: 1 })).toBe(Status.EmailAdded);
    expect(statusForInsertOutcome({ type: 'conflict' })).toBe(Status.EmailAlreadyExists);
    expect(statusForInsertOutcome({ type: 'failure', reason: 'x' })).toBe(Status.EmailNotAdded);
  });

  it('reports a verification as sent only on acknowledgement', () => {
    expect(statusForSendOutcome({ type: 'sent' })).toBe(Status.EmailVerificationSent);
    expect(statusForSendOutcome({ type: 'failure', reason: 'x' })).toBe(Status.EmailNotAdded);
  });
});
