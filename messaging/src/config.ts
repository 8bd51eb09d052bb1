import dotenv from 'dotenv';
dotenv.config();

export const toNumber = (v: string | undefined, def: number): number => {
  if (v === undefined || v.trim() === '') return def;
  const n = Number(v);
  if (Number.isNaN(n)) {
    throw new Error(`Expected a number but got "${v}"`);
  }
  return n;
};

export const toBool = (v: string | undefined, def: boolean): boolean => {
  if (v === undefined || v.trim() === '') return def;
  return v !== 'false' && v !== '0';
};

export const getEnvVar = (name: string, defaultValue?: string): string => {
  const value = process.env[name] || defaultValue;
  if (!value) {
    throw new Error(`Environment variable ${name} is required but not set`);
  }
  return value;
};

export interface BreakerSettings {
  enabled: boolean;
  /** `false` waits for the action however long it runs; a timed-out action keeps running otherwise. */
  timeout: number | false;
  resetTimeout: number;
  errorThresholdPercentage: number;
  volumeThreshold: number;
}

export interface MessagingConfig {
  NODE_ENV: string;
  LOG_LEVEL: string;
  RABBITMQ_URL: string;
  MONGO_URL: string;
  MONGO_TRANSACTIONS: boolean;
  REDIS_URL: string;
  PREFETCH: number;
  CONSUMER_MAX_RETRIES: number;
  CONSUMER_RETRY_DELAY_MS: number;
  PROCESSED_TTL_SECONDS: number;
  READY_TIMEOUT_MS: number;
  MQ_BREAKER: BreakerSettings;
  DB_BREAKER: BreakerSettings;
}

function breakerFromEnv(prefix: 'MQ' | 'DB', defaults: { timeout: number; resetTimeout: number }): BreakerSettings {
  const env = process.env;
  return {
    enabled: toBool(env[`${prefix}_BREAKER_ENABLED`], true),
    timeout: toNumber(env[`${prefix}_BREAKER_TIMEOUT_MS`], defaults.timeout),
    resetTimeout: toNumber(env[`${prefix}_BREAKER_RESET_TIMEOUT_MS`], defaults.resetTimeout),
    errorThresholdPercentage: toNumber(env[`${prefix}_BREAKER_ERROR_THRESHOLD_PERCENT`], 50),
    volumeThreshold: toNumber(env[`${prefix}_BREAKER_VOLUME_THRESHOLD`], 5),
  };
}

/**
 * Settings every service shares. Each service spreads this into its own
 * `config` object and adds SERVICE_NAME, PORT and its database URL.
 */
export function loadMessagingConfig(defaults: { mongoUrl: string }): MessagingConfig {
  const env = process.env;
  return {
    NODE_ENV: env.NODE_ENV || 'development',
    LOG_LEVEL: env.LOG_LEVEL || 'info',
    RABBITMQ_URL: env.RABBITMQ_URL || 'amqp://localhost:5672',
    MONGO_URL: env.MONGO_URL || defaults.mongoUrl,
    MONGO_TRANSACTIONS: toBool(env.MONGO_TRANSACTIONS, false),
    REDIS_URL: env.REDIS_URL || 'redis://localhost:6379',
    PREFETCH: toNumber(env.PREFETCH, 1),
    CONSUMER_MAX_RETRIES: toNumber(env.CONSUMER_MAX_RETRIES, 3),
    CONSUMER_RETRY_DELAY_MS: toNumber(env.CONSUMER_RETRY_DELAY_MS, 5000),
    PROCESSED_TTL_SECONDS: toNumber(env.PROCESSED_TTL_SECONDS, 86400),
    READY_TIMEOUT_MS: toNumber(env.READY_TIMEOUT_MS, 1500),
    MQ_BREAKER: breakerFromEnv('MQ', { timeout: 2000, resetTimeout: 3000 }),
    DB_BREAKER: breakerFromEnv('DB', { timeout: 3000, resetTimeout: 5000 }),
  };
}
