/**
 * @fileoverview Structured logging with Pino
 * @module core/instrumentation/logger
 */

/* eslint-disable import/no-named-as-default, import/no-named-as-default-member */

import pino, { type Logger } from 'pino';

import { getConfig } from '../config';
import type { LoggingConfig } from '../config/schema';

/**
 * Create base logger instance
 *
 * @param config - Logging configuration
 * @param serviceName - Value of the `service` binding
 * @returns Pino logger instance
 */
export function createLogger(config: LoggingConfig, serviceName: string): Logger {
  const pinoConfig: pino.LoggerOptions = {
    level: config.level,
    formatters: {
      level: (label) => ({ level: label }),
    },
    serializers: {
      err: pino.stdSerializers.err,
      error: pino.stdSerializers.err,
    },
    timestamp: pino.stdTimeFunctions.isoTime,
    base: {
      service: serviceName,
    },
  };

  // Add pretty printing in development
  if (config.pretty) {
    return pino(
      pinoConfig,
      pino.transport({
        target: 'pino-pretty',
        options: {
          colorize: true,
          translateTime: 'SYS:standard',
          ignore: 'pid,hostname',
          messageFormat: '[{service}] {msg}',
        },
      }) as pino.DestinationStream
    );
  }

  return pino(pinoConfig);
}

let defaultLogger: Logger | null = null;

/**
 * Shared logger built from the environment configuration
 */
export function getLogger(): Logger {
  if (!defaultLogger) {
    const config = getConfig();
    defaultLogger = createLogger(config.logging, config.serviceName);
  }
  return defaultLogger;
}

/**
 * Create child logger with additional context
 */
export function withContext(logger: Logger, context: Record<string, unknown>): Logger {
  return logger.child(context);
}

/**
 * Log operation timing
 */
export function logTiming(
  logger: Logger,
  operation: string,
  duration: number,
  context?: Record<string, unknown>
): void {
  logger.info(
    {
      operation,
      duration,
      ...context,
    },
    `Operation completed in ${duration}ms`
  );
}

/**
 * Log error with stack trace
 */
export function logError(logger: Logger, error: Error, context?: Record<string, unknown>): void {
  logger.error(
    {
      error: {
        message: error.message,
        name: error.name,
        stack: error.stack,
      },
      ...context,
    },
    error.message
  );
}
