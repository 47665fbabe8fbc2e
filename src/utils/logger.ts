import pino from "pino";
import { getLogLevel, shouldUsePretty } from "./config";

/**
 * Create the base logger instance.
 *
 * Output goes to stderr: stdout belongs to the prompts.
 */
function createBaseLogger(): pino.Logger {
  const level = getLogLevel();

  if (shouldUsePretty()) {
    return pino({
      level,
      transport: {
        target: "pino-pretty",
        options: {
          colorize: true,
          translateTime: "HH:MM:ss",
          ignore: "pid,hostname",
          destination: 2,
        },
      },
    });
  }

  return pino(
    {
      level,
      base: {
        pid: process.pid,
      },
    },
    pino.destination(2)
  );
}

const baseLogger = createBaseLogger();

/**
 * Logger interface that provides structured logging with context
 */
export interface Logger {
  trace(message: string, context?: Record<string, unknown>): void;
  debug(message: string, context?: Record<string, unknown>): void;
  info(message: string, context?: Record<string, unknown>): void;
  warn(message: string, context?: Record<string, unknown>, error?: unknown): void;
  error(message: string, context?: Record<string, unknown>, error?: unknown): void;

  // Child loggers with context
  child(bindings: Record<string, unknown>): Logger;
}

function withError(context: Record<string, unknown> | undefined, error: unknown): Record<string, unknown> {
  if (error === undefined) {
    return context ?? {};
  }
  return error instanceof Error ? { ...context, err: error } : { ...context, error };
}

function wrap(target: pino.Logger): Logger {
  return {
    trace: (message, context) => target.trace(context ?? {}, message),
    debug: (message, context) => target.debug(context ?? {}, message),
    info: (message, context) => target.info(context ?? {}, message),
    warn: (message, context, error) => target.warn(withError(context, error), message),
    error: (message, context, error) => target.error(withError(context, error), message),
    child: (bindings) => wrap(target.child(bindings)),
  };
}

/**
 * Default logger instance (use this for most cases)
 */
export const logger = wrap(baseLogger);

/**
 * Create a logger with context (e.g., for a specific module or command)
 */
export function createContextLogger(context: Record<string, unknown>): Logger {
  return logger.child(context);
}
