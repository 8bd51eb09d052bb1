import { createLogger } from 'saga-messaging';
import type { Channel, Notification } from '../domain/notification';

export interface SendResult {
  success: boolean;
  providerMessage?: string;
  error?: string;
}

export interface ChannelSender {
  send(notification: Notification): Promise<SendResult>;
}

/** One sender per channel, fixed when the service is composed. */
export type ChannelSenders = Record<Channel, ChannelSender>;

const log = createLogger('channels');

/** Writes the message to the service log instead of a provider. */
export function logSender(channel: Channel): ChannelSender {
  return {
    async send(notification) {
      const to = notification.recipients.map((r) => (channel === 'sms' ? r.phoneNumber : r.email)).filter(Boolean);
      log.info(
        { channel, notificationId: notification.id, userId: notification.userId, to, subject: notification.subject },
        `[Notification] ${channel} delivered`
      );
      return { success: true, providerMessage: `${channel}:${notification.id}` };
    },
  };
}

export const createLogSenders = (): ChannelSenders => ({
  email: logSender('email'),
  sms: logSender('sms'),
  in_app: logSender('in_app'),
});
