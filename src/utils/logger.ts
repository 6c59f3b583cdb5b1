/**
 * Centralized logging service using Pino
 * Provides structured logging with configurable log levels
 *
 * Everything is written to stderr: stdout carries the MCP message stream.
 */

import pino from 'pino';
import type { Logger } from 'pino';
import { getConfig } from '../config.js';
import { getCorrelationContext } from './correlation.js';

const STDERR_FD = 2;

// Lazy logger initialization to avoid calling getConfig() at import time
let loggerInstance: Logger | null = null;

/**
 * Gets or creates the logger instance
 */
function getLogger(): Logger {
  if (!loggerInstance) {
    const config = getConfig();
    const level = config.logLevel.toLowerCase();

    loggerInstance = config.nodeEnv === 'development'
      ? pino({
          level,
          // Use pino-pretty in development for human-readable output
          transport: {
            target: 'pino-pretty',
            options: {
              colorize: true,
              translateTime: 'SYS:standard',
              ignore: 'pid,hostname',
              destination: STDERR_FD,
            },
          },
        })
      : pino({ level }, pino.destination(STDERR_FD));
  }

  return loggerInstance;
}

/**
 * Adds the active correlation ID and tool name (if any) to the log context
 */
function withCorrelationId(context?: Record<string, unknown>): Record<string, unknown> | undefined {
  const correlation = getCorrelationContext();
  if (!correlation) {
    return context;
  }
  const { correlationId, toolName } = correlation;
  return toolName ? { correlationId, tool: toolName, ...context } : { correlationId, ...context };
}

/**
 * Log a DEBUG message with optional context
 * @param message - Log message
 * @param context - Optional context object
 */
export function debug(message: string, context?: Record<string, unknown>): void {
  const logger = getLogger();
  const merged = withCorrelationId(context);
  if (merged) {
    logger.debug(merged, message);
  } else {
    logger.debug(message);
  }
}

/**
 * Log an INFO message with optional context
 * @param message - Log message
 * @param context - Optional context object
 */
export function info(message: string, context?: Record<string, unknown>): void {
  const logger = getLogger();
  const merged = withCorrelationId(context);
  if (merged) {
    logger.info(merged, message);
  } else {
    logger.info(message);
  }
}

/**
 * Log a WARN message with optional context
 * @param message - Log message
 * @param context - Optional context object
 */
export function warn(message: string, context?: Record<string, unknown>): void {
  const logger = getLogger();
  const merged = withCorrelationId(context);
  if (merged) {
    logger.warn(merged, message);
  } else {
    logger.warn(message);
  }
}

/**
 * Log an ERROR message with optional context
 * @param message - Log message
 * @param context - Optional context object
 */
export function error(message: string, context?: Record<string, unknown>): void {
  const logger = getLogger();
  const merged = withCorrelationId(context);
  if (merged) {
    logger.error(merged, message);
  } else {
    logger.error(message);
  }
}

/**
 * Flushes and drops the logger instance (process exit, tests)
 */
export function resetLogger(): void {
  loggerInstance?.flush();
  loggerInstance = null;
}
