import type { Channel, ConfirmChannel, ConsumeMessage } from 'amqplib';
import type { BreakerSettings } from '../config';
import { routeFor, SagaEvent } from '../events';
import { createLogger } from '../logger';
import { withBreaker } from '../utils/breaker';
import type { ConnectionManager } from './connection';
import type {
  EventPublisher,
  Headers,
  InboundMessage,
  PublishOptions,
  SubscribeOptions,
  Subscriber,
  Subscription,
} from './transport';

const log = createLogger('mq.bus');

interface ActiveSubscription {
  queue: string;
  onMessage: (msg: InboundMessage) => Promise<void>;
  options: SubscribeOptions;
  channel: Channel | null;
  consumerTag: string | null;
  cancelled: boolean;
}

/**
 * AMQP implementation of the publish/subscribe primitive. Publishes go through
 * one confirm channel and resolve on the broker ack; every subscription gets a
 * channel of its own so queues never wait on each other. Subscriptions are
 * re-established after the connection manager reports a reconnect.
 */
export class MessageBus implements EventPublisher, Subscriber {
  private confirmChannel: Promise<ConfirmChannel> | null = null;
  private readonly subscriptions: ActiveSubscription[] = [];
  private readonly guardedPublish: (exchange: string, routingKey: string, content: Buffer, options: PublishOptions) => Promise<void>;

  constructor(private readonly connection: ConnectionManager, private readonly service: string, breaker: BreakerSettings) {
    this.guardedPublish = withBreaker(
      'mq.publish',
      (exchange: string, routingKey: string, content: Buffer, options: PublishOptions) =>
        this.confirmPublish(exchange, routingKey, content, options),
      breaker
    );
    connection.on('disconnected', () => {
      this.confirmChannel = null;
      for (const sub of this.subscriptions) {
        sub.channel = null;
        sub.consumerTag = null;
      }
    });
    connection.on('reconnected', () => {
      this.resubscribeAll().catch((err: unknown) => log.error({ err }, '[MQ] resubscribe failed'));
    });
  }

  async publish(exchange: string, routingKey: string, body: unknown, options: PublishOptions = {}): Promise<void> {
    const content = Buffer.isBuffer(body) ? body : Buffer.from(JSON.stringify(body));
    await this.guardedPublish(exchange, routingKey, content, options);
  }

  async publishEvent(event: SagaEvent, headers: Headers = {}): Promise<void> {
    const route = routeFor(event.type);
    await this.publish(route.exchange, route.routingKey, event, {
      correlationId: event.correlationId,
      messageId: event.eventId,
      headers: { 'x-event-type': event.type, ...headers },
    });
  }

  async subscribe(
    queue: string,
    onMessage: (msg: InboundMessage) => Promise<void>,
    options: SubscribeOptions
  ): Promise<Subscription> {
    const sub: ActiveSubscription = { queue, onMessage, options, channel: null, consumerTag: null, cancelled: false };
    this.subscriptions.push(sub);
    await this.attach(sub);
    return {
      cancel: async () => {
        sub.cancelled = true;
        const idx = this.subscriptions.indexOf(sub);
        if (idx >= 0) this.subscriptions.splice(idx, 1);
        await this.detach(sub);
      },
    };
  }

  private async confirmPublish(exchange: string, routingKey: string, content: Buffer, options: PublishOptions): Promise<void> {
    const ch = await this.getConfirmChannel();
    await new Promise<void>((resolve, reject) => {
      const ok = ch.publish(
        exchange,
        routingKey,
        content,
        {
          contentType: 'application/json',
          persistent: true,
          correlationId: options.correlationId,
          messageId: options.messageId,
          appId: this.service,
          headers: {
            ...(options.correlationId ? { 'x-correlation-id': options.correlationId } : {}),
            ...options.headers,
          },
        },
        (err: unknown) => (err ? reject(err instanceof Error ? err : new Error(`Broker rejected publish to ${routingKey}`)) : resolve())
      );
      if (!ok) log.warn({ routingKey }, '[MQ] publish backpressure');
    });
  }

  private getConfirmChannel(): Promise<ConfirmChannel> {
    if (!this.confirmChannel) {
      const pending = this.connection.createConfirmChannel().then((ch) => {
        ch.on('close', () => {
          if (this.confirmChannel === pending) this.confirmChannel = null;
        });
        return ch;
      });
      pending.catch(() => {
        if (this.confirmChannel === pending) this.confirmChannel = null;
      });
      this.confirmChannel = pending;
    }
    return this.confirmChannel;
  }

  private async attach(sub: ActiveSubscription): Promise<void> {
    const ch = await this.connection.createChannel(sub.options.prefetch);
    sub.channel = ch;
    const reply = await ch.consume(
      sub.queue,
      (msg: ConsumeMessage | null) => {
        if (!msg) {
          log.warn({ queue: sub.queue }, '[MQ] consumer cancelled by broker');
          return;
        }
        sub.onMessage(toInbound(sub.queue, ch, msg)).catch((err: unknown) => {
          log.error({ err, queue: sub.queue }, '[MQ] unhandled delivery error');
          ch.nack(msg, false, true);
        });
      },
      { noAck: false }
    );
    sub.consumerTag = reply.consumerTag;
    log.info({ queue: sub.queue, prefetch: sub.options.prefetch }, '[MQ] consuming');
  }

  private async detach(sub: ActiveSubscription): Promise<void> {
    const ch = sub.channel;
    sub.channel = null;
    if (!ch) return;
    try {
      if (sub.consumerTag) await ch.cancel(sub.consumerTag);
      await ch.close();
    } catch (err) {
      log.warn({ err, queue: sub.queue }, '[MQ] error while cancelling consumer');
    }
  }

  private async resubscribeAll(): Promise<void> {
    for (const sub of this.subscriptions) {
      if (sub.cancelled || sub.channel) continue;
      await this.attach(sub);
    }
  }
}

function toInbound(queue: string, ch: Channel, msg: ConsumeMessage): InboundMessage {
  const headers: Headers = { ...(msg.properties.headers ?? {}) };
  const correlationId = stringOrUndefined(msg.properties.correlationId) ?? stringOrUndefined(headers['x-correlation-id']);
  return {
    queue,
    body: msg.content,
    routingKey: msg.fields.routingKey,
    headers,
    correlationId,
    messageId: stringOrUndefined(msg.properties.messageId),
    redelivered: msg.fields.redelivered,
    ack: () => ch.ack(msg),
    nack: (requeue: boolean) => ch.nack(msg, false, requeue),
  };
}

const stringOrUndefined = (v: unknown): string | undefined => (typeof v === 'string' && v.length > 0 ? v : undefined);
