/**
 * Logger
 * 
 * Pino-based structured logger factory for all packages.
 * Each caller builds its own logger and passes it down explicitly.
 */

import { pino, type Logger as PinoLogger, type LoggerOptions } from 'pino';

export type Logger = PinoLogger;

export interface CreateLoggerOptions {
  level?: string;
  pretty?: boolean;
}

function defaultOptions(options: CreateLoggerOptions): LoggerOptions {
  const nodeEnv = process.env['NODE_ENV'] ?? 'development';
  const pretty = options.pretty ?? nodeEnv === 'development';

  return {
    level: options.level ?? process.env['LOG_LEVEL'] ?? 'info',
    formatters: {
      level: (label: string) => ({ level: label }),
    },
    timestamp: pino.stdTimeFunctions.isoTime,
    base: {
      service: 'streamplan',
      env: nodeEnv,
    },
    transport: pretty ? {
      target: 'pino-pretty',
      options: {
        colorize: true,
        ignore: 'pid,hostname',
      },
    } : undefined,
  };
}

/**
 * Create a logger with additional context
 */
export function createLogger(
  context: Record<string, unknown> = {},
  options: CreateLoggerOptions = {}
): Logger {
  return pino(defaultOptions(options)).child(context);
}

/**
 * Logger that drops everything, for callers that do not care
 */
export function createSilentLogger(): Logger {
  return pino({ level: 'silent' });
}
