import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { z } from 'zod';
import { listen, RunningApp } from 'saga-messaging/testing';
import { createNotificationApp } from '../app';
import { createLogSenders } from '../channels/senders';
import { NotificationService } from '../notifications/notificationService';
import { MemoryNotificationsRepository } from '../repositories/notificationsRepo';
import { MemoryPreferencesRepository } from '../repositories/preferencesRepo';
import type { NotificationsControllerDeps } from './controllers/notifications.controller';

const smsBody = {
  userId: 'user-1',
  channel: 'sms',
  subject: 'Delivery update',
  content: 'Your parcel is on its way',
  recipients: [{ phoneNumber: '+100000000' }],
};

const Created = z.object({ data: z.object({ id: z.string() }) });

describe('notifications HTTP API', () => {
  let deps: NotificationsControllerDeps | null;
  let running: RunningApp;

  const call = (method: string, path: string, body?: unknown) =>
    fetch(`${running.baseUrl}/api/notifications${path}`, {
      method,
      headers: { 'content-type': 'application/json' },
      body: body === undefined ? undefined : JSON.stringify(body),
    });

  beforeEach(async () => {
    deps = {
      notificationService: new NotificationService({
        notifications: new MemoryNotificationsRepository(),
        preferences: new MemoryPreferencesRepository(),
        senders: createLogSenders(),
      }),
    };
    running = await listen(createNotificationApp('notification-service', () => deps));
  });

  afterEach(async () => {
    await running.close();
  });

  it('creates a notification and lists it for the user', async () => {
    const res = await call('POST', '/', smsBody);
    expect(res.status).toBe(201);
    const { data } = Created.parse(await res.json());

    const list = await call('GET', '/user/user-1?take=10');
    expect(list.status).toBe(200);
    expect(await list.json()).toMatchObject({
      success: true,
      data: [{ id: data.id, channel: 'sms', type: 'general', status: 'PENDING', retryCount: 0 }],
    });
  });

  it('rejects an unknown channel', async () => {
    const res = await call('POST', '/', { ...smsBody, channel: 'fax' });

    expect(res.status).toBe(400);
    expect(await res.json()).toEqual({
      success: false,
      data: null,
      message: 'Invalid notification request',
      errors: ["channel: Invalid enum value. Expected 'email' | 'sms' | 'in_app', received 'fax'"],
    });
  });

  it('reports business rule violations', async () => {
    const res = await call('POST', '/', { ...smsBody, channel: 'email', recipients: [] });

    expect(res.status).toBe(400);
    expect(await res.json()).toEqual({
      success: false,
      data: null,
      message: 'Notification rejected',
      errors: ['At least one recipient is required.', 'Email channel requires at least one email recipient.'],
    });
  });

  it('validates paging parameters', async () => {
    const res = await call('GET', '/user/user-1?take=0');

    expect(res.status).toBe(400);
    expect(await res.json()).toMatchObject({ errors: ['take: Number must be greater than or equal to 1'] });
  });

  it('processes the queue on demand', async () => {
    await call('POST', '/', smsBody);

    const res = await call('POST', '/process-queue?take=5');

    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({
      success: true,
      data: { processed: 1, sent: 1, failed: 0, deferred: 0 },
      message: 'Queue processed',
      errors: [],
    });
  });

  it('soft-disables a notification and answers 404 for unknown ids', async () => {
    const { data } = Created.parse(await (await call('POST', '/', smsBody)).json());

    expect((await call('DELETE', `/${data.id}`)).status).toBe(200);
    const missing = await call('DELETE', '/missing-id');
    expect(missing.status).toBe(404);
    expect(await missing.json()).toEqual({
      success: false,
      data: null,
      message: 'Notification missing-id not found',
      errors: [],
    });
  });

  it('upserts preferences with defaults for omitted flags', async () => {
    const res = await call('POST', '/preferences', { userId: 'user-1', quietHoursStart: '22:00', quietHoursEnd: '07:00' });

    expect(res.status).toBe(200);
    expect(await res.json()).toMatchObject({
      data: {
        userId: 'user-1',
        emailEnabled: true,
        smsEnabled: true,
        inAppEnabled: true,
        doNotDisturb: false,
        quietHoursStart: '22:00',
        quietHoursEnd: '07:00',
        maxDailyNotifications: null,
        isActive: true,
      },
      message: 'Preferences saved',
    });
  });

  it('rejects a malformed quiet-hours clock', async () => {
    const res = await call('POST', '/preferences', { userId: 'user-1', quietHoursStart: '25:00', quietHoursEnd: '07:00' });

    expect(res.status).toBe(400);
    expect(await res.json()).toMatchObject({ errors: ['quietHoursStart: expected HH:mm (UTC)'] });
  });
});
