/**
 * Pino Logger Factory
 *
 * Structured logging for parse tracing and lenient-mode diagnostics.
 */

import { pino, type Logger, type LoggerOptions } from 'pino';

export type LogLevel = 'trace' | 'debug' | 'info' | 'warn' | 'error' | 'fatal' | 'silent';

const LOG_LEVELS: readonly LogLevel[] = ['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent'];

/**
 * Logger configuration
 */
export interface LoggerConfig {
  /** Log level (default: LOG_LEVEL from the environment, else info) */
  level?: LogLevel;

  /** Base bindings (always included in logs) */
  base?: Record<string, unknown>;
}

export function logLevelFromEnv(value: string | undefined): LogLevel {
  return LOG_LEVELS.find(level => level === value?.toLowerCase()) ?? 'info';
}

/**
 * Create a pino logger instance
 */
export function createLogger(config?: LoggerConfig): Logger {
  const options: LoggerOptions = {
    level: config?.level ?? logLevelFromEnv(process.env.LOG_LEVEL),
    base: { service: 'tagtext', ...config?.base }
  };
  return pino(options);
}

/**
 * Create a child logger with additional context
 */
export function createChildLogger(parent: Logger, bindings: Record<string, unknown>): Logger {
  return parent.child(bindings);
}
