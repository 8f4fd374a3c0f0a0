import pino from 'pino';
import type { DestinationStream, Logger as PinoLogger } from 'pino';
import type { LogContext } from './types.js';

/** Structured logger interface for the refresher. */
export interface Logger {
  debug(msg: string, context?: LogContext): void;
  info(msg: string, context?: LogContext): void;
  warn(msg: string, context?: LogContext): void;
  error(msg: string, context?: LogContext): void;
  fatal(msg: string, context?: LogContext): void;
  child(bindings: Record<string, unknown>): Logger;
}

export interface LoggerOptions {
  level?: string;
  name?: string;
  /** Alternate output stream; ignored when pretty printing is on. */
  destination?: DestinationStream;
}

/** Adapt pino's (object, message) call order to the Logger interface. */
function wrapPino(instance: PinoLogger): Logger {
  return {
    debug(msg, context) {
      instance.debug(context ?? {}, msg);
    },
    info(msg, context) {
      instance.info(context ?? {}, msg);
    },
    warn(msg, context) {
      instance.warn(context ?? {}, msg);
    },
    error(msg, context) {
      instance.error(context ?? {}, msg);
    },
    fatal(msg, context) {
      instance.fatal(context ?? {}, msg);
    },
    child(bindings) {
      return wrapPino(instance.child(bindings));
    },
  };
}

/** Create a structured pino logger instance. */
export function createLogger(options?: LoggerOptions): Logger {
  const pretty = process.env['NODE_ENV'] === 'development';
  const pinoOptions = {
    name: options?.name ?? 'project-refresher',
    level: options?.level ?? process.env['LOG_LEVEL'] ?? 'info',
    transport: pretty ? { target: 'pino-pretty', options: { colorize: true } } : undefined,
    serializers: {
      err: pino.stdSerializers.err,
    },
    redact: {
      paths: ['apiKey', 'authorization', 'password', 'secret', '*.apiKey', '*.password'],
      censor: '[REDACTED]',
    },
  };

  const instance =
    options?.destination && !pretty ? pino(pinoOptions, options.destination) : pino(pinoOptions);

  return wrapPino(instance);
}
