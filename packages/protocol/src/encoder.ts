// SPDX-FileCopyrightText: 2025-present Kriasoft
// SPDX-License-Identifier: MIT

import type { ProtocolValue } from "./value.js";

const CRLF = "\r\n";

/**
 * Render a value in RESP wire form. Bulk lengths count UTF-8 bytes.
 *
 * @throws {TypeError} if a simple string or error text contains CR or LF,
 * which the line-based forms cannot carry
 */
export function encode(value: ProtocolValue): string {
  switch (value.kind) {
    case "null":
      return `$-1${CRLF}`;
    case "simple":
      return `+${assertLine(value.value)}${CRLF}`;
    case "error":
      return `-${assertLine(value.value)}${CRLF}`;
    case "integer":
      return `:${value.value}${CRLF}`;
    case "bulk":
      return `$${Buffer.byteLength(value.value, "utf8")}${CRLF}${value.value}${CRLF}`;
    case "array":
      return `*${value.items.length}${CRLF}${value.items.map(encode).join("")}`;
  }
}

function assertLine(text: string): string {
  if (/[\r\n]/.test(text)) {
    throw new TypeError(
      `Line value cannot contain CR or LF: ${JSON.stringify(text)}`,
    );
  }
  return text;
}
