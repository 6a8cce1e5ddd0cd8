import pino, { type DestinationStream, type Level, type Logger } from 'pino';

export interface CreateLoggerOptions {
  level?: Level;
  /** Write JSON lines here instead of stdout / pino-pretty */
  destination?: DestinationStream;
}

/**
 * Create the service logger. Pretty printing is used outside production
 * and test runs; everywhere else output is one JSON object per line.
 */
export function createLogger(options: CreateLoggerOptions = {}): Logger {
  const environment = process.env.NODE_ENV || 'development';
  const pretty =
    !options.destination &&
    environment !== 'production' &&
    environment !== 'test';

  const config: pino.LoggerOptions = {
    level: options.level || process.env.LOG_LEVEL || 'info',

    // Pretty print in development, JSON in production
    transport: pretty
      ? {
          target: 'pino-pretty',
          options: {
            colorize: true,
            translateTime: 'HH:MM:ss Z',
            ignore: 'pid,hostname',
          },
        }
      : undefined,

    // Base fields added to all logs
    base: {
      service: process.env.SERVICE_NAME || 'store-service',
      env: environment,
    },

    timestamp: pino.stdTimeFunctions.isoTime,

    formatters: {
      level: (label) => {
        return { level: label.toUpperCase() };
      },
    },
  };

  return options.destination ? pino(config, options.destination) : pino(config);
}

export const logger = createLogger();

/**
 * Create child logger with additional context
 */
export function createChildLogger(context: Record<string, unknown>): Logger {
  return logger.child(context);
}
