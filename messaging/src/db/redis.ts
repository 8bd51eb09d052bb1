import { createClient } from 'redis';
import { createLogger } from '../logger';
import type { ProcessedEventStore } from '../processed/store';

const log = createLogger('redis');

export type RedisClient = ReturnType<typeof createClient>;

export async function connectRedis(url: string, maxReconnectAttempts = 10): Promise<RedisClient> {
  const client = createClient({
    url,
    socket: {
      reconnectStrategy: (retries) => {
        if (retries >= maxReconnectAttempts) {
          log.error({ retries }, '[Redis] max reconnection attempts reached');
          return false;
        }
        const delay = Math.min(1000 * 2 ** retries, 30000);
        log.warn({ delay, attempt: retries + 1 }, '[Redis] reconnecting');
        return delay;
      },
    },
  });
  client.on('error', (err: unknown) => log.error({ err }, '[Redis] connection error'));
  client.on('ready', () => log.info('[Redis] client ready'));
  client.on('end', () => log.warn('[Redis] connection ended'));
  await client.connect();
  return client;
}

export async function closeRedis(client: RedisClient | null): Promise<void> {
  if (!client?.isOpen) return;
  try {
    await client.quit();
  } catch (err) {
    log.warn({ err }, '[Redis] error while disconnecting');
  }
}

export class RedisProcessedEventStore implements ProcessedEventStore {
  constructor(private readonly client: RedisClient, private readonly ttlSeconds: number) {}

  async has(key: string): Promise<boolean> {
    return (await this.client.exists(key)) === 1;
  }

  async mark(key: string): Promise<void> {
    // NX keeps the first processing time when two deliveries race.
    await this.client.set(key, new Date().toISOString(), { NX: true, EX: this.ttlSeconds });
  }
}
