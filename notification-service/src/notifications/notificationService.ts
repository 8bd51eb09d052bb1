import { v4 as uuidv4 } from 'uuid';
import { createLogger, errorMessage, Logger, TxContext } from 'saga-messaging';
import type { ChannelSenders, SendResult } from '../channels/senders';
import {
  creationErrors,
  CreateNotificationRequest,
  MAX_RETRIES,
  Notification,
  NotificationUpdate,
} from '../domain/notification';
import { channelEnabled, deferUntil, PreferenceInput, UserPreference } from '../domain/preference';
import type { NotificationsRepository } from '../repositories/notificationsRepo';
import type { PreferencesRepository } from '../repositories/preferencesRepo';

export const CHANNEL_DISABLED = 'channel disabled by user preference';
export const MAX_RETRIES_EXCEEDED = 'max retries exceeded';
export const DEFERRED = 'Deferred due to DND/quiet hours';
export const DAILY_LIMIT_REACHED = 'User has reached daily notification limit.';

export type CreateResult =
  | { kind: 'created'; notification: Notification }
  | { kind: 'duplicate'; notification: Notification }
  | { kind: 'rejected'; errors: string[] };

export interface DispatchSummary {
  processed: number;
  sent: number;
  failed: number;
  deferred: number;
}

type DispatchResult = 'sent' | 'failed' | 'deferred';

export interface NotificationServiceDeps {
  notifications: NotificationsRepository;
  preferences: PreferencesRepository;
  senders: ChannelSenders;
  clock?: () => Date;
  logger?: Logger;
}

const startOfUtcDay = (now: Date): Date => new Date(Date.UTC(now.getUTCFullYear(), now.getUTCMonth(), now.getUTCDate()));

export class NotificationService {
  private readonly log: Logger;
  private readonly now: () => Date;

  constructor(private readonly deps: NotificationServiceDeps) {
    this.log = deps.logger ?? createLogger('notifications');
    this.now = deps.clock ?? (() => new Date());
  }

  async create(request: CreateNotificationRequest, tx: TxContext = {}): Promise<CreateResult> {
    const errors = creationErrors(request);
    if (errors.length > 0) return { kind: 'rejected', errors };

    const now = this.now();
    const pref = await this.activePreference(request.userId);
    if (pref && pref.maxDailyNotifications !== null) {
      const sentToday = await this.deps.notifications.countSentSince(request.userId, startOfUtcDay(now), tx);
      if (sentToday >= pref.maxDailyNotifications) return { kind: 'rejected', errors: [DAILY_LIMIT_REACHED] };
    }

    const createdAt = now.toISOString();
    const { notification, created } = await this.deps.notifications.create(
      {
        id: uuidv4(),
        userId: request.userId,
        channel: request.channel,
        type: request.type,
        subject: request.subject,
        content: request.content,
        recipients: request.recipients,
        status: 'PENDING',
        retryCount: 0,
        scheduledAt: request.scheduledAt ?? null,
        ...(request.dedupeKey ? { dedupeKey: request.dedupeKey } : {}),
        attempts: [],
        errorMessage: null,
        isActive: true,
        createdAt,
        createdBy: request.createdBy,
        updatedAt: createdAt,
      },
      tx
    );

    if (!created) {
      this.log.info({ dedupeKey: request.dedupeKey, notificationId: notification.id }, '[Notification] duplicate request ignored');
      return { kind: 'duplicate', notification };
    }
    this.log.info({ notificationId: notification.id, userId: notification.userId, channel: notification.channel }, '[Notification] created');
    return { kind: 'created', notification };
  }

  listByUser(userId: string, take = 50, skip = 0): Promise<Notification[]> {
    return this.deps.notifications.listByUser(userId, take, skip);
  }

  /** Soft-disables the notification; false when the id is unknown. */
  disable(id: string): Promise<boolean> {
    return this.deps.notifications.update(id, { isActive: false });
  }

  async upsertPreferences(input: PreferenceInput): Promise<UserPreference> {
    return this.deps.preferences.upsert({ ...input, isActive: true, updatedAt: this.now().toISOString() });
  }

  /**
   * Sends one batch of due notifications, including FAILED ones with retries
   * left. A failure of one notification is recorded on it and never stops the
   * rest; the call itself does not throw.
   */
  async processQueueBatch(take: number, skip = 0): Promise<DispatchSummary> {
    const summary: DispatchSummary = { processed: 0, sent: 0, failed: 0, deferred: 0 };
    const now = this.now();

    let due: Notification[];
    try {
      due = await this.deps.notifications.dueBatch(now, take, skip);
    } catch (err) {
      this.log.error({ err }, '[Notification] could not fetch due notifications');
      return summary;
    }
    if (due.length === 0) {
      this.log.debug('[Notification] no notifications due');
      return summary;
    }

    for (const notification of due) {
      summary.processed++;
      try {
        summary[await this.dispatch(notification, now)]++;
      } catch (err) {
        summary.failed++;
        this.log.error({ err, notificationId: notification.id }, '[Notification] dispatch failed');
        await this.markFailed(notification, errorMessage(err));
      }
    }

    this.log.info(summary, '[Notification] batch processed');
    return summary;
  }

  private async dispatch(notification: Notification, now: Date): Promise<DispatchResult> {
    const { id } = notification;
    const pref = await this.activePreference(notification.userId);

    if (pref && !channelEnabled(pref, notification.channel)) {
      // No retries left, so later batches leave it alone
      await this.deps.notifications.update(id, { status: 'FAILED', retryCount: MAX_RETRIES, errorMessage: CHANNEL_DISABLED });
      return 'failed';
    }

    const until = pref ? deferUntil(pref, now) : null;
    if (until) {
      await this.deps.notifications.update(id, { scheduledAt: until.toISOString(), errorMessage: DEFERRED });
      this.log.info({ notificationId: id, until: until.toISOString() }, '[Notification] deferred for quiet hours');
      return 'deferred';
    }

    const result = await this.send(notification);
    const attempt = {
      attemptNumber: notification.retryCount + 1,
      at: now.toISOString(),
      success: result.success,
      providerMessage: result.providerMessage ?? null,
      error: result.success ? null : result.error ?? 'send failed',
    };
    const patch: NotificationUpdate = result.success ? { status: 'SENT', errorMessage: null } : this.failure(notification, result.error ?? 'send failed');
    await this.deps.notifications.update(id, patch, attempt);
    return result.success ? 'sent' : 'failed';
  }

  private async send(notification: Notification): Promise<SendResult> {
    try {
      return await this.deps.senders[notification.channel].send(notification);
    } catch (err) {
      return { success: false, error: errorMessage(err) };
    }
  }

  /** FAILED with one more retry used; the last allowed failure is reported as max retries exceeded. */
  private failure(notification: Notification, message: string): NotificationUpdate {
    const retryCount = notification.retryCount + 1;
    return { status: 'FAILED', retryCount, errorMessage: retryCount >= MAX_RETRIES ? MAX_RETRIES_EXCEEDED : message };
  }

  private async markFailed(notification: Notification, message: string): Promise<void> {
    try {
      await this.deps.notifications.update(notification.id, this.failure(notification, message));
    } catch (err) {
      this.log.error({ err, notificationId: notification.id }, '[Notification] could not record failure');
    }
  }

  private async activePreference(userId: string): Promise<UserPreference | null> {
    const pref = await this.deps.preferences.get(userId);
    return pref?.isActive ? pref : null;
  }
}
