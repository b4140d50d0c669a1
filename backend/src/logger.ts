import pino from 'pino';
import type { Logger } from 'pino';

function createLogger(): Logger {
  const env = process.env.NODE_ENV || 'development';
  const level = process.env.LOG_LEVEL || (env === 'production' ? 'info' : 'debug');
  const pretty = process.env.LOG_PRETTY ? process.env.LOG_PRETTY === 'true' : env === 'development';

  return pino({
    level,
    base: {
      env,
      service: 'online-orders-etl',
    },
    formatters: {
      level: (label) => {
        return { level: label };
      },
    },
    timestamp: pino.stdTimeFunctions.isoTime,
    ...(pretty && {
      transport: {
        target: 'pino-pretty',
        options: {
          colorize: true,
          translateTime: 'SYS:standard',
          ignore: 'pid,hostname',
        },
      },
    }),
  });
}

export const logger = createLogger();

/**
 * Create a child logger with additional context
 */
export function createChildLogger(context: Record<string, unknown>): Logger {
  return logger.child(context);
}

export type { Logger };
