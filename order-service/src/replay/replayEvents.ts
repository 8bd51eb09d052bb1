import { createLogger, EventPublisher, EventType, ROUTES, ValidationError } from 'saga-messaging';
import type { EventLog, EventLogFilter } from '../repositories/eventsRepo';

const log = createLogger('replay');

export interface ReplayArgs extends EventLogFilter {
  help: boolean;
}

const isEventType = (v: string): v is EventType => Object.prototype.hasOwnProperty.call(ROUTES, v);

const isIsoTimestamp = (v: string): boolean => !Number.isNaN(Date.parse(v));

/** Accepts `--key=value` and `--key value`; unknown keys are ignored. */
export function parseReplayArgs(argv: string[]): ReplayArgs {
  const out = new Map<string, string>();
  for (let i = 0; i < argv.length; i++) {
    const a = argv[i];
    if (!a || !a.startsWith('--')) continue;
    const body = a.slice(2);
    const eq = body.indexOf('=');
    if (eq >= 0) {
      out.set(body.slice(0, eq), body.slice(eq + 1));
      continue;
    }
    const next = argv[i + 1];
    if (next !== undefined && !next.startsWith('--')) {
      out.set(body, next);
      i++;
    } else {
      out.set(body, 'true');
    }
  }

  const type = out.get('type');
  if (type !== undefined && !isEventType(type)) {
    throw new ValidationError(`Unknown event type "${type}"`, [`expected one of ${Object.keys(ROUTES).join(', ')}`]);
  }
  for (const key of ['from', 'to']) {
    const v = out.get(key);
    if (v !== undefined && !isIsoTimestamp(v)) throw new ValidationError(`--${key} must be an ISO-8601 timestamp`);
  }

  return {
    ...(type ? { type } : {}),
    ...(out.has('orderId') ? { orderId: out.get('orderId') } : {}),
    ...(out.has('from') ? { from: out.get('from') } : {}),
    ...(out.has('to') ? { to: out.get('to') } : {}),
    help: out.has('h') || out.has('help'),
  };
}

export interface ReplaySummary {
  published: number;
  failed: number;
}

/**
 * Republishes logged events in occurrence order with an `x-replay` header.
 * Consumers dedupe on eventId, so a replayed event that was already handled
 * is acked without effect.
 */
export async function replayEvents(events: EventLog, publisher: EventPublisher, filter: EventLogFilter): Promise<ReplaySummary> {
  const summary: ReplaySummary = { published: 0, failed: 0 };
  for await (const evt of events.find(filter)) {
    try {
      await publisher.publishEvent(evt, { 'x-replay': true });
      summary.published++;
      if (summary.published % 100 === 0) log.info({ count: summary.published }, '[Replay] published events');
    } catch (err) {
      summary.failed++;
      log.error({ err, eventId: evt.eventId, type: evt.type }, '[Replay] publish failed');
    }
  }
  log.info({ ...summary, filter }, '[Replay] done');
  return summary;
}
