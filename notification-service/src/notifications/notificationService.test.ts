import { beforeEach, describe, expect, it } from 'vitest';
import type { ChannelSenders, SendResult } from '../channels/senders';
import { CreateNotificationInput, CreateNotificationSchema, Notification } from '../domain/notification';
import { MemoryNotificationsRepository } from '../repositories/notificationsRepo';
import { MemoryPreferencesRepository } from '../repositories/preferencesRepo';
import { CHANNEL_DISABLED, DAILY_LIMIT_REACHED, MAX_RETRIES_EXCEEDED, NotificationService } from './notificationService';

const NOW = new Date('2024-05-01T12:00:00.000Z');

const request = (overrides: Partial<CreateNotificationInput> = {}) =>
  CreateNotificationSchema.parse({
    userId: 'user-1',
    channel: 'email',
    subject: 'Hello',
    content: 'Body',
    recipients: [{ email: 'customer@example.com' }],
    ...overrides,
  });

describe('NotificationService', () => {
  let notifications: MemoryNotificationsRepository;
  let preferences: MemoryPreferencesRepository;
  let sent: string[];
  let sendImpl: (n: Notification) => Promise<SendResult>;
  let service: NotificationService;

  const create = async (overrides: Partial<CreateNotificationInput> = {}): Promise<Notification> => {
    const result = await service.create(request(overrides));
    if (result.kind !== 'created') throw new Error(`expected a new notification, got ${result.kind}`);
    return result.notification;
  };

  const stored = async (id: string): Promise<Notification | null> => notifications.getById(id);

  beforeEach(() => {
    notifications = new MemoryNotificationsRepository();
    preferences = new MemoryPreferencesRepository();
    sent = [];
    sendImpl = async (n) => {
      sent.push(n.id);
      return { success: true, providerMessage: `email:${n.id}` };
    };
    const sender = { send: (n: Notification) => sendImpl(n) };
    const senders: ChannelSenders = { email: sender, sms: sender, in_app: sender };
    service = new NotificationService({ notifications, preferences, senders, clock: () => NOW });
  });

  describe('processQueueBatch', () => {
    it('sends the batch and records failures without stopping', async () => {
      const created: Notification[] = [];
      for (let i = 0; i < 10; i++) created.push(await create({ subject: `Message ${i}` }));
      let calls = 0;
      sendImpl = async (n) => {
        calls++;
        if (calls === 2) return { success: false, error: 'mailbox unavailable' };
        if (calls === 5) throw new Error('provider timeout');
        return { success: true, providerMessage: `email:${n.id}` };
      };

      const summary = await service.processQueueBatch(50);

      expect(summary).toEqual({ processed: 10, sent: 8, failed: 2, deferred: 0 });
      const rows = await Promise.all(created.map((n) => stored(n.id)));
      expect(rows.filter((n) => n?.status === 'SENT')).toHaveLength(8);
      expect(rows[1]).toMatchObject({
        status: 'FAILED',
        retryCount: 1,
        errorMessage: 'mailbox unavailable',
        attempts: [{ attemptNumber: 1, at: NOW.toISOString(), success: false, providerMessage: null, error: 'mailbox unavailable' }],
      });
      expect(rows[4]).toMatchObject({ status: 'FAILED', retryCount: 1, errorMessage: 'provider timeout' });
      expect(rows[0]).toMatchObject({
        status: 'SENT',
        retryCount: 0,
        attempts: [{ attemptNumber: 1, success: true, providerMessage: `email:${created[0]?.id}`, error: null }],
      });
    });

    it('defers users inside their quiet hours without a send attempt', async () => {
      const n = await create();
      await service.upsertPreferences({
        userId: 'user-1',
        emailEnabled: true,
        smsEnabled: true,
        inAppEnabled: true,
        doNotDisturb: false,
        quietHoursStart: '11:00',
        quietHoursEnd: '13:00',
        maxDailyNotifications: null,
      });

      expect(await service.processQueueBatch(50)).toEqual({ processed: 1, sent: 0, failed: 0, deferred: 1 });
      expect(sent).toEqual([]);
      expect(await stored(n.id)).toMatchObject({ status: 'PENDING', scheduledAt: '2024-05-01T13:00:00.000Z', attempts: [] });
      // Not due again until the window ends
      expect(await service.processQueueBatch(50)).toEqual({ processed: 0, sent: 0, failed: 0, deferred: 0 });
    });

    it('fails notifications on a channel the user turned off', async () => {
      const n = await create();
      await service.upsertPreferences({
        userId: 'user-1',
        emailEnabled: false,
        smsEnabled: true,
        inAppEnabled: true,
        doNotDisturb: false,
        quietHoursStart: null,
        quietHoursEnd: null,
        maxDailyNotifications: null,
      });

      expect(await service.processQueueBatch(50)).toEqual({ processed: 1, sent: 0, failed: 1, deferred: 0 });
      expect(sent).toEqual([]);
      expect(await stored(n.id)).toMatchObject({ status: 'FAILED', errorMessage: CHANNEL_DISABLED, retryCount: 3 });
      expect(await service.processQueueBatch(50)).toEqual({ processed: 0, sent: 0, failed: 0, deferred: 0 });
    });

    it('retries a failed notification in the next batch until it is sent', async () => {
      const n = await create();
      let calls = 0;
      sendImpl = async (m) => {
        calls++;
        return calls === 1 ? { success: false, error: 'mailbox unavailable' } : { success: true, providerMessage: `email:${m.id}` };
      };

      expect(await service.processQueueBatch(50)).toEqual({ processed: 1, sent: 0, failed: 1, deferred: 0 });
      expect(await stored(n.id)).toMatchObject({ status: 'FAILED', retryCount: 1 });

      expect(await service.processQueueBatch(50)).toEqual({ processed: 1, sent: 1, failed: 0, deferred: 0 });
      const row = await stored(n.id);
      expect(row).toMatchObject({ status: 'SENT', retryCount: 1, errorMessage: null });
      expect(row?.attempts.map((a) => [a.attemptNumber, a.success])).toEqual([
        [1, false],
        [2, true],
      ]);
    });

    it('gives up after the last retry fails', async () => {
      const n = await create();
      let calls = 0;
      sendImpl = async () => {
        calls++;
        return { success: false, error: 'mailbox unavailable' };
      };

      for (let i = 0; i < 5; i++) await service.processQueueBatch(50);

      expect(calls).toBe(3);
      const row = await stored(n.id);
      expect(row).toMatchObject({ status: 'FAILED', retryCount: 3, errorMessage: MAX_RETRIES_EXCEEDED });
      expect(row?.attempts.map((a) => a.error)).toEqual(['mailbox unavailable', 'mailbox unavailable', 'mailbox unavailable']);
    });

    it('skips disabled and not yet due notifications', async () => {
      const disabled = await create();
      await create({ scheduledAt: '2024-05-01T18:00:00.000Z' });
      expect(await service.disable(disabled.id)).toBe(true);

      expect(await service.processQueueBatch(50)).toEqual({ processed: 0, sent: 0, failed: 0, deferred: 0 });
    });

    it('returns an empty summary when the store cannot be read', async () => {
      notifications.dueBatch = async () => {
        throw new Error('db down');
      };

      expect(await service.processQueueBatch(50)).toEqual({ processed: 0, sent: 0, failed: 0, deferred: 0 });
    });
  });

  describe('create', () => {
    it('rejects an email notification without an email recipient', async () => {
      const result = await service.create(request({ recipients: [{ phoneNumber: '+100000000' }] }));

      expect(result).toEqual({ kind: 'rejected', errors: ['Email channel requires at least one email recipient.'] });
    });

    it('lists every missing field at once', async () => {
      const result = await service.create(request({ userId: '', recipients: [] }));

      expect(result).toEqual({
        kind: 'rejected',
        errors: [
          'userId is required.',
          'At least one recipient is required.',
          'Email channel requires at least one email recipient.',
        ],
      });
    });

    it('enforces the daily limit on sent notifications', async () => {
      await service.upsertPreferences({
        userId: 'user-1',
        emailEnabled: true,
        smsEnabled: true,
        inAppEnabled: true,
        doNotDisturb: false,
        quietHoursStart: null,
        quietHoursEnd: null,
        maxDailyNotifications: 1,
      });
      await create();
      await service.processQueueBatch(50);

      expect(await service.create(request())).toEqual({ kind: 'rejected', errors: [DAILY_LIMIT_REACHED] });
    });

    it('returns the existing notification for a repeated dedupe key', async () => {
      const first = await create({ dedupeKey: 'order_confirmed:ord-1' });

      const again = await service.create(request({ dedupeKey: 'order_confirmed:ord-1' }));

      expect(again).toEqual({ kind: 'duplicate', notification: first });
      expect(await service.listByUser('user-1')).toHaveLength(1);
    });
  });
});
