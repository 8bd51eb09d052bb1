import amqplib from 'amqplib';
import type { Channel, ConfirmChannel } from 'amqplib';
import { EventEmitter } from 'events';
import { createLogger } from '../logger';
import { backoffDelay, sleep } from '../utils/breaker';

const log = createLogger('mq.connection');

/** The part of an amqplib connection the manager relies on. */
export interface AmqpConnection {
  createChannel(): Promise<Channel>;
  createConfirmChannel(): Promise<ConfirmChannel>;
  close(): Promise<void>;
  on(event: 'error', listener: (err: Error) => void): unknown;
  on(event: 'close', listener: () => void): unknown;
}

export type AmqpConnector = (url: string) => Promise<AmqpConnection>;

export interface ConnectionManagerOptions {
  prefetch?: number;
  maxBackoffMs?: number;
  connector?: AmqpConnector;
}

/**
 * Owns the single broker connection of a process. `start()` connects (retrying
 * with exponential backoff), a dropped connection is re-established in the
 * background and announced with `reconnected`, and `close()` tears it down for
 * good. Channels are created on demand; callers that hit a dropped connection
 * wait for the next one instead of failing.
 */
export class ConnectionManager extends EventEmitter {
  private conn: AmqpConnection | null = null;
  private connecting: Promise<AmqpConnection> | null = null;
  private closing = false;
  private readonly connector: AmqpConnector;

  constructor(private readonly url: string, private readonly options: ConnectionManagerOptions = {}) {
    super();
    this.connector = options.connector ?? ((u) => amqplib.connect(u));
  }

  async start(): Promise<void> {
    this.closing = false;
    await this.getConnection();
  }

  isConnected(): boolean {
    return this.conn !== null;
  }

  async getConnection(): Promise<AmqpConnection> {
    if (this.conn) return this.conn;
    if (!this.connecting) {
      this.connecting = this.connectWithRetry().finally(() => {
        this.connecting = null;
      });
    }
    return this.connecting;
  }

  async createChannel(prefetch = this.options.prefetch ?? 1): Promise<Channel> {
    const conn = await this.getConnection();
    const ch = await conn.createChannel();
    if (prefetch > 0) await ch.prefetch(prefetch);
    ch.on('error', (err: Error) => log.error({ err }, '[MQ] channel error'));
    return ch;
  }

  async createConfirmChannel(): Promise<ConfirmChannel> {
    const conn = await this.getConnection();
    const ch = await conn.createConfirmChannel();
    ch.on('error', (err: Error) => log.error({ err }, '[MQ] confirm channel error'));
    return ch;
  }

  async close(): Promise<void> {
    this.closing = true;
    const conn = this.conn;
    this.conn = null;
    if (!conn) return;
    try {
      await conn.close();
      log.info('[MQ] connection closed');
    } catch (err) {
      log.warn({ err }, '[MQ] error while closing connection');
    }
  }

  private async connectWithRetry(): Promise<AmqpConnection> {
    let attempt = 0;
    while (true) {
      if (this.closing) throw new Error('Connection manager is closed');
      try {
        const conn = await this.connector(this.url);
        conn.on('error', (err: Error) => log.error({ err }, '[MQ] connection error'));
        conn.on('close', () => this.onClose(conn));
        this.conn = conn;
        log.info({ url: redact(this.url) }, '[MQ] connected');
        return conn;
      } catch (err) {
        attempt++;
        const backoff = backoffDelay(attempt, 1000, this.options.maxBackoffMs ?? 30000);
        log.warn({ attempt, backoff, err }, '[MQ] connect failed, retrying');
        await sleep(backoff);
      }
    }
  }

  private onClose(conn: AmqpConnection): void {
    if (this.conn !== conn) return;
    this.conn = null;
    if (this.closing) return;
    log.warn('[MQ] connection lost, reconnecting');
    this.emit('disconnected');
    this.getConnection().then(
      () => this.emit('reconnected'),
      (err: unknown) => log.error({ err }, '[MQ] reconnect aborted')
    );
  }
}

const redact = (url: string): string => url.replace(/\/\/([^:@/]+):([^@/]+)@/, '//$1:***@');
