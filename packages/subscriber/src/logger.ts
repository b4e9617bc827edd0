// SPDX-FileCopyrightText: 2025-present Kriasoft
// SPDX-License-Identifier: MIT

/**
 * Logger adapter interface for structured logging in the subscriber.
 *
 * Allows applications to integrate their own logging solutions (Winston, Pino,
 * structured logging services) instead of console output.
 *
 * @example
 * ```typescript
 * import { createSubscriber, type LoggerAdapter } from "@resp-pubsub/subscriber";
 *
 * class MyLogger implements LoggerAdapter {
 *   debug(context: string, message: string, data?: unknown) {
 *     console.debug(`[${context}] ${message}`, data);
 *   }
 *   info(context: string, message: string, data?: unknown) {
 *     console.log(`[${context}] ${message}`, data);
 *   }
 *   warn(context: string, message: string, data?: unknown) {
 *     console.warn(`[${context}] ${message}`, data);
 *   }
 *   error(context: string, message: string, data?: unknown) {
 *     console.error(`[${context}] ${message}`, data);
 *   }
 * }
 *
 * const subscriber = createSubscriber({
 *   address: "127.0.0.1:6379",
 *   logger: new MyLogger(),
 * });
 * ```
 */
export interface LoggerAdapter {
  /**
   * Log a debug-level message
   *
   * @param context - Category or source of the log (e.g., "connection", "stream")
   * @param message - Log message
   * @param data - Optional structured data
   */
  debug(context: string, message: string, data?: unknown): void;

  /**
   * Log an info-level message
   */
  info(context: string, message: string, data?: unknown): void;

  /**
   * Log a warning-level message
   */
  warn(context: string, message: string, data?: unknown): void;

  /**
   * Log an error-level message
   *
   * @param data - Optional structured data (error details, stack trace, etc.)
   */
  error(context: string, message: string, data?: unknown): void;
}

export type LogLevel = "debug" | "info" | "warn" | "error";

export interface LoggerOptions {
  /**
   * Custom log function. Replaces console output entirely when given.
   *
   * @example
   * ```typescript
   * const logger = createLogger({
   *   log: (level, context, message, data) => {
   *     logService.log({ level, context, message, data, timestamp: new Date() });
   *   },
   * });
   * ```
   */
  log?: (
    level: LogLevel,
    context: string,
    message: string,
    data?: unknown,
  ) => void;

  /**
   * Minimum log level to output (default: "debug")
   */
  minLevel?: LogLevel;
}

const LEVELS: Record<LogLevel, number> = { debug: 0, info: 1, warn: 2, error: 3 };

const CONSOLE: Record<
  LogLevel,
  (message: string, data?: unknown) => void
> = {
  debug: (message, data) => console.debug(message, data),
  info: (message, data) => console.info(message, data),
  warn: (message, data) => console.warn(message, data),
  error: (message, data) => console.error(message, data),
};

/**
 * Create a logger adapter with custom configuration
 */
export function createLogger(options: LoggerOptions = {}): LoggerAdapter {
  const minLevelValue = LEVELS[options.minLevel ?? "debug"];

  const emit = (
    level: LogLevel,
    context: string,
    message: string,
    data?: unknown,
  ): void => {
    if (LEVELS[level] < minLevelValue) return;
    if (options.log) {
      options.log(level, context, message, data);
    } else {
      CONSOLE[level](`[${context}] ${message}`, data);
    }
  };

  return {
    debug: (context, message, data) => emit("debug", context, message, data),
    info: (context, message, data) => emit("info", context, message, data),
    warn: (context, message, data) => emit("warn", context, message, data),
    error: (context, message, data) => emit("error", context, message, data),
  };
}

/**
 * Log context constants used by the subscriber
 *
 * Applications can use these to filter or categorize logs
 */
export const LOG_CONTEXT = {
  CONNECTION: "connection",
  SUBSCRIPTION: "subscription",
  STREAM: "stream",
} as const;
