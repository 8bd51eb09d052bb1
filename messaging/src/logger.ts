import pino from 'pino';

const NODE_ENV = process.env.NODE_ENV || 'development';

const loggerConfig: pino.LoggerOptions = {
  level: process.env.LOG_LEVEL || (NODE_ENV === 'test' ? 'silent' : 'info'),
  base: { service: process.env.SERVICE_NAME },
  formatters: {
    level: (label) => {
      return { level: label.toUpperCase() };
    },
  },
  timestamp: pino.stdTimeFunctions.isoTime,
  ...(NODE_ENV === 'development' && {
    transport: {
      target: 'pino-pretty',
      options: {
        colorize: true,
        translateTime: 'yyyy-mm-dd HH:MM:ss',
        ignore: 'pid,hostname',
      },
    },
  }),
};

export const logger = pino(loggerConfig);

export type Logger = pino.Logger;

export const createLogger = (component: string): Logger => {
  return logger.child({ component });
};

export const logCircuitBreaker = (
  operation: string,
  state: 'open' | 'closed' | 'half-open',
  reason?: string
) => {
  logger.warn({ operation, circuitBreakerState: state, reason }, `Circuit breaker ${state} for operation: ${operation}`);
};

export default logger;
