import type { SagaEvent } from '../events';

export type Headers = Record<string, unknown>;

export interface PublishOptions {
  correlationId?: string;
  messageId?: string;
  headers?: Headers;
}

/** Resolves once the broker has accepted the message; rejects when it has not. */
export interface Publisher {
  publish(exchange: string, routingKey: string, body: unknown, options?: PublishOptions): Promise<void>;
}

export interface EventPublisher extends Publisher {
  publishEvent(event: SagaEvent, headers?: Headers): Promise<void>;
}

export interface InboundMessage {
  queue: string;
  body: Buffer;
  routingKey: string;
  headers: Headers;
  correlationId?: string;
  messageId?: string;
  redelivered: boolean;
  ack(): void;
  nack(requeue: boolean): void;
}

export interface Subscription {
  cancel(): Promise<void>;
}

export interface SubscribeOptions {
  prefetch: number;
}

export interface Subscriber {
  subscribe(
    queue: string,
    onMessage: (msg: InboundMessage) => Promise<void>,
    options: SubscribeOptions
  ): Promise<Subscription>;
}

export const attemptOf = (headers: Headers): number => {
  const raw = headers['x-attempt'];
  const n = typeof raw === 'number' ? raw : Number(raw ?? 0);
  return Number.isFinite(n) && n > 0 ? n : 0;
};
