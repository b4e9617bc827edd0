// SPDX-FileCopyrightText: 2025-present Kriasoft
// SPDX-License-Identifier: MIT

import { z } from "zod";
import { connectTcp } from "./connection.js";
import { ConfigurationError } from "./errors.js";
import { createLogger, type LoggerAdapter } from "./logger.js";
import type {
  ConnectionFactory,
  ResolvedRetryOptions,
  ResolvedSubscriberOptions,
  ServerAddress,
  SubscriberOptions,
} from "./types.js";

export const DEFAULT_RETRY: ResolvedRetryOptions = {
  maxAttempts: 8,
  maxDelayMs: 64_000,
  jitterMs: 1_000,
};

/**
 * Parse `host:port` or `[ipv6]:port`.
 *
 * @returns undefined if the text is not an address with a port in 1..65535
 */
export function parseAddress(text: string): ServerAddress | undefined {
  const match = /^\[([^\]\s]+)\]:(\d{1,5})$/.exec(text) ??
    /^([^\s:[\]]+):(\d{1,5})$/.exec(text);
  if (!match) return undefined;

  const [, host, portText] = match;
  const port = Number(portText);
  if (host === undefined || port < 1 || port > 65_535) return undefined;
  return { host, port };
}

const addressSchema = z.string().transform((value, ctx): ServerAddress => {
  const address = parseAddress(value);
  if (!address) {
    ctx.addIssue({
      code: "custom",
      message: `Expected "host:port" or "[ipv6]:port", got ${JSON.stringify(value)}`,
    });
    return z.NEVER;
  }
  return address;
});

const retrySchema = z.strictObject({
  maxAttempts: z.number().int().min(0).default(DEFAULT_RETRY.maxAttempts),
  maxDelayMs: z.number().int().min(0).default(DEFAULT_RETRY.maxDelayMs),
  jitterMs: z.number().int().min(0).default(DEFAULT_RETRY.jitterMs),
});

const optionsSchema = z.strictObject({
  address: addressSchema,
  retry: retrySchema.optional(),
  idleTimeoutMs: z.number().int().positive().optional(),
  logger: z
    .custom<LoggerAdapter>(isLoggerAdapter, {
      error: "Expected an object with debug, info, warn and error methods",
    })
    .optional(),
  connect: z
    .custom<ConnectionFactory>((value) => typeof value === "function", {
      error: "Expected a connection factory function",
    })
    .optional(),
});

/**
 * Validate options and fill in defaults.
 *
 * @throws {ConfigurationError} listing every invalid option
 */
export function resolveOptions(
  options: SubscriberOptions,
): ResolvedSubscriberOptions {
  const result = optionsSchema.safeParse(options);
  if (!result.success) {
    const issues = result.error.issues.map(
      (issue) => `${issue.path.map(String).join(".")}: ${issue.message}`,
    );
    throw new ConfigurationError(
      `Invalid subscriber options: ${issues.join("; ")}`,
      issues,
    );
  }

  const parsed = result.data;
  return {
    address: parsed.address,
    retry: parsed.retry ?? DEFAULT_RETRY,
    idleTimeoutMs: parsed.idleTimeoutMs,
    logger: parsed.logger ?? createLogger({ minLevel: "warn" }),
    connect: parsed.connect ?? connectTcp,
  };
}

function isLoggerAdapter(value: unknown): value is LoggerAdapter {
  if (typeof value !== "object" || value === null) return false;
  return (["debug", "info", "warn", "error"] as const).every(
    (level) => level in value && typeof Reflect.get(value, level) === "function",
  );
}
