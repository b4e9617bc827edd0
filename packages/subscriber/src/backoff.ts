// SPDX-FileCopyrightText: 2025-present Kriasoft
// SPDX-License-Identifier: MIT

import type { ResolvedRetryOptions } from "./types.js";

/**
 * Delay before retry number `attempt` (1-based): `attempt²` seconds capped at
 * `maxDelayMs`, plus uniform jitter in `[0, jitterMs)`.
 *
 * @example
 * ```typescript
 * // attempts 1..8 without jitter: 1s, 4s, 9s, 16s, 25s, 36s, 49s, 64s
 * calculateBackoff(3, { maxDelayMs: 64_000, jitterMs: 0 }); // 9000
 * ```
 */
export function calculateBackoff(
  attempt: number,
  options: Pick<ResolvedRetryOptions, "maxDelayMs" | "jitterMs">,
  random: () => number = Math.random,
): number {
  const base = Math.min(attempt * attempt * 1000, options.maxDelayMs);
  const jitter = Math.floor(random() * options.jitterMs);
  return base + jitter;
}
