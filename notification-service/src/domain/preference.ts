import { z } from 'zod';
import type { Channel } from './notification';

const Clock = z.string().regex(/^([01]\d|2[0-3]):[0-5]\d$/, 'expected HH:mm (UTC)');

export const PreferenceSchema = z
  .object({
    userId: z.string().trim().min(1),
    emailEnabled: z.boolean().default(true),
    smsEnabled: z.boolean().default(true),
    inAppEnabled: z.boolean().default(true),
    doNotDisturb: z.boolean().default(false),
    quietHoursStart: Clock.nullable().default(null),
    quietHoursEnd: Clock.nullable().default(null),
    maxDailyNotifications: z.number().int().nonnegative().nullable().default(null),
  })
  .refine((p) => (p.quietHoursStart === null) === (p.quietHoursEnd === null), {
    message: 'quietHoursStart and quietHoursEnd must be set together',
    path: ['quietHoursEnd'],
  });
export type PreferenceInput = z.infer<typeof PreferenceSchema>;

export interface UserPreference extends PreferenceInput {
  isActive: boolean;
  updatedAt: string;
}

export function channelEnabled(pref: UserPreference, channel: Channel): boolean {
  const enabled: Record<Channel, boolean> = {
    email: pref.emailEnabled,
    sms: pref.smsEnabled,
    in_app: pref.inAppEnabled,
  };
  return enabled[channel];
}

const DND_RETRY_MS = 15 * 60 * 1000;
const DAY_MS = 24 * 60 * 60 * 1000;

const minutesOf = (clock: string): number => {
  const [h = 0, m = 0] = clock.split(':').map(Number);
  return h * 60 + m;
};

/**
 * End of the quiet-hours window `now` falls in, or null when it is outside
 * the window. Windows whose start is after their end wrap past midnight.
 */
export function quietHoursEnd(pref: Pick<UserPreference, 'quietHoursStart' | 'quietHoursEnd'>, now: Date): Date | null {
  if (pref.quietHoursStart === null || pref.quietHoursEnd === null) return null;
  const start = minutesOf(pref.quietHoursStart);
  const end = minutesOf(pref.quietHoursEnd);
  const current = now.getUTCHours() * 60 + now.getUTCMinutes();

  const inside = start <= end ? current >= start && current < end : current >= start || current < end;
  if (!inside) return null;

  const endsAt = Date.UTC(now.getUTCFullYear(), now.getUTCMonth(), now.getUTCDate(), Math.floor(end / 60), end % 60);
  return new Date(endsAt > now.getTime() ? endsAt : endsAt + DAY_MS);
}

/** When a send for this user must be pushed back to, or null if it may go now. */
export function deferUntil(pref: UserPreference, now: Date): Date | null {
  const windowEnd = quietHoursEnd(pref, now);
  if (windowEnd) return windowEnd;
  if (pref.doNotDisturb) return new Date(now.getTime() + DND_RETRY_MS);
  return null;
}
