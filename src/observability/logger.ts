import pino from 'pino';
import type { Logger as PinoLogger } from 'pino';
import type { LogContext, LogLevel } from './types.js';

/** Structured logger interface for the platform. */
export interface Logger {
  debug(msg: string, context?: LogContext): void;
  info(msg: string, context?: LogContext): void;
  warn(msg: string, context?: LogContext): void;
  error(msg: string, context?: LogContext): void;
  fatal(msg: string, context?: LogContext): void;
  child(bindings: Record<string, unknown>): Logger;
}

/** Adapt pino's `(obj, msg)` call shape to our `(msg, context)` one. */
function wrap(instance: PinoLogger): Logger {
  const logAt =
    (level: LogLevel) =>
    (msg: string, context?: LogContext): void => {
      if (context) {
        instance[level](context, msg);
      } else {
        instance[level](msg);
      }
    };

  return {
    debug: logAt('debug'),
    info: logAt('info'),
    warn: logAt('warn'),
    error: logAt('error'),
    fatal: logAt('fatal'),
    child: (bindings) => wrap(instance.child(bindings)),
  };
}

/** Create a structured pino logger instance. */
export function createLogger(options?: { level?: string; name?: string }): Logger {
  const pinoInstance = pino({
    name: options?.name ?? 'tma-platform',
    level: options?.level ?? process.env['LOG_LEVEL'] ?? 'info',
    transport:
      process.env['NODE_ENV'] === 'development'
        ? { target: 'pino-pretty', options: { colorize: true } }
        : undefined,
    serializers: {
      err: pino.stdSerializers.err,
    },
    redact: {
      paths: [
        'apiKey',
        'authorization',
        'botToken',
        'password',
        'secret',
        '*.apiKey',
        '*.botToken',
        '*.password',
        '*.authorization',
      ],
      censor: '[REDACTED]',
    },
  });

  return wrap(pinoInstance);
}
