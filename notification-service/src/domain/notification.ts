import { z } from 'zod';

export const CHANNELS = ['email', 'sms', 'in_app'] as const;
export type Channel = (typeof CHANNELS)[number];

export const NOTIFICATION_TYPES = ['order_confirmed', 'order_cancelled', 'general'] as const;
export type NotificationType = (typeof NOTIFICATION_TYPES)[number];

export type NotificationStatus = 'PENDING' | 'SENT' | 'FAILED';

export const MAX_RETRIES = 3;

export const RecipientSchema = z.object({
  kind: z.enum(['to', 'cc', 'bcc']).default('to'),
  email: z.string().email().optional(),
  phoneNumber: z.string().min(1).optional(),
});
export type Recipient = z.infer<typeof RecipientSchema>;

export interface DeliveryAttempt {
  attemptNumber: number;
  at: string;
  success: boolean;
  providerMessage: string | null;
  error: string | null;
}

export interface Notification {
  id: string;
  userId: string;
  channel: Channel;
  type: NotificationType;
  subject: string;
  content: string;
  recipients: Recipient[];
  status: NotificationStatus;
  retryCount: number;
  /** Not sent before this instant; null means as soon as possible. */
  scheduledAt: string | null;
  dedupeKey?: string;
  attempts: DeliveryAttempt[];
  errorMessage: string | null;
  isActive: boolean;
  createdAt: string;
  createdBy: string;
  updatedAt: string;
}

export type NotificationUpdate = Partial<Pick<Notification, 'status' | 'retryCount' | 'scheduledAt' | 'errorMessage' | 'isActive'>>;

export const CreateNotificationSchema = z.object({
  userId: z.string().trim().default(''),
  channel: z.enum(CHANNELS),
  type: z.enum(NOTIFICATION_TYPES).default('general'),
  subject: z.string().min(1).max(200),
  content: z.string().min(1),
  recipients: z.array(RecipientSchema).default([]),
  scheduledAt: z.string().datetime().optional(),
  dedupeKey: z.string().min(1).optional(),
  createdBy: z.string().min(1).default('api'),
});
export type CreateNotificationInput = z.input<typeof CreateNotificationSchema>;
export type CreateNotificationRequest = z.infer<typeof CreateNotificationSchema>;

/** Business checks the body schema cannot express; an empty list means valid. */
export function creationErrors(request: CreateNotificationRequest): string[] {
  const errors: string[] = [];
  if (!request.userId) errors.push('userId is required.');
  if (request.recipients.length === 0) errors.push('At least one recipient is required.');
  if (request.channel === 'email' && !request.recipients.some((r) => r.email)) {
    errors.push('Email channel requires at least one email recipient.');
  }
  if (request.channel === 'sms' && !request.recipients.some((r) => r.phoneNumber)) {
    errors.push('SMS channel requires at least one phone number recipient.');
  }
  return errors;
}
