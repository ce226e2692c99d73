/**
 * Logger
 * 
 * Pino-based structured logger for all packages. Writes to stderr so
 * stdout stays free for command output such as `--json`.
 */

import pino from 'pino';

const LOG_LEVEL = process.env['LOG_LEVEL'] ?? 'info';
const NODE_ENV = process.env['NODE_ENV'] ?? 'production';

const isDevelopment = NODE_ENV === 'development';

export const logger = pino(
  {
    level: LOG_LEVEL,
    formatters: {
      level: (label: string) => ({ level: label }),
    },
    timestamp: pino.stdTimeFunctions.isoTime,
    base: {
      service: 'hls-kit',
      env: NODE_ENV,
    },
    transport: isDevelopment ? {
      target: 'pino-pretty',
      options: {
        colorize: true,
        ignore: 'pid,hostname',
        destination: 2,
      },
    } : undefined,
  },
  isDevelopment ? undefined : pino.destination(2)
);

export type Logger = typeof logger;

/**
 * Create a child logger with additional context
 */
export function createLogger(context: Record<string, unknown>): Logger {
  return logger.child(context);
}
