// SPDX-FileCopyrightText: 2025-present Kriasoft
// SPDX-License-Identifier: MIT

/**
 * Outbound pub/sub commands, sent in the inline form `<VERB> <name>\r\n`.
 */

export type CommandType =
  | "subscribe"
  | "unsubscribe"
  | "psubscribe"
  | "punsubscribe";

export interface Command {
  readonly type: CommandType;
  /** Channel name, or glob pattern for the pattern commands. */
  readonly name: string;
}

const VERBS: Record<CommandType, string> = {
  subscribe: "SUBSCRIBE",
  unsubscribe: "UNSUBSCRIBE",
  psubscribe: "PSUBSCRIBE",
  punsubscribe: "PUNSUBSCRIBE",
};

/**
 * Render a command as wire text.
 *
 * @example
 * ```typescript
 * renderCommand({ type: "psubscribe", name: "news.*" }); // "PSUBSCRIBE news.*\r\n"
 * ```
 */
export function renderCommand(command: Command): string {
  return `${VERBS[command.type]} ${command.name}\r\n`;
}

/**
 * Whether `name` survives inline command tokenization unchanged: non-empty,
 * no whitespace or control characters, and no leading quote (the server
 * would parse a quoted argument).
 */
export function isInlineSafe(name: string): boolean {
  // eslint-disable-next-line no-control-regex
  return /^(?!["'])[^\s\u0000-\u001f\u007f]+$/.test(name);
}
