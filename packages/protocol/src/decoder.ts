// SPDX-FileCopyrightText: 2025-present Kriasoft
// SPDX-License-Identifier: MIT

/**
 * Incremental RESP decoder.
 *
 * Works on text that has already passed UTF-8 validation (see `text.ts`).
 * Bulk lengths on the wire count UTF-8 bytes, so the decoder measures
 * payloads in bytes rather than UTF-16 code units.
 *
 * Parsing is all-or-nothing per top-level value: a value is either complete
 * and consumed, or left in the buffer untouched for the next read. Input that
 * can never parse is reported as a failure instead of being retried forever.
 */

import { INT64_MAX, INT64_MIN, resp, type ProtocolValue } from "./value.js";

export interface DecodeFailure {
  /** Offset of the top-level value that failed to parse. */
  readonly offset: number;
  readonly reason: string;
}

export interface DecodeResult {
  /** Values parsed in wire order. */
  readonly values: ProtocolValue[];
  /**
   * Input left after the last complete value: an incomplete trailing value,
   * or everything from the failure offset onward.
   */
  readonly remainder: string;
  readonly failure?: DecodeFailure;
  /**
   * Lower bound, in UTF-8 bytes, of the input still missing before the
   * trailing value can complete. Set only when a bulk payload is pending.
   */
  readonly needed?: number;
}

interface Complete<T> {
  readonly status: "complete";
  readonly value: T;
  /** Offset just past the parsed input. */
  readonly next: number;
}

interface Incomplete {
  readonly status: "incomplete";
  readonly needed?: number;
}

interface Invalid {
  readonly status: "invalid";
  readonly reason: string;
}

export type DecodeStep<T = ProtocolValue> = Complete<T> | Incomplete | Invalid;

type Token =
  | { readonly type: "value"; readonly value: ProtocolValue }
  | { readonly type: "array"; readonly count: number };

interface Frame {
  readonly items: ProtocolValue[];
  readonly count: number;
}

const CR = "\r";
const LF = "\n";

const INCOMPLETE: Incomplete = { status: "incomplete" };

function complete<T>(value: T, next: number): Complete<T> {
  return { status: "complete", value, next };
}

function invalid(reason: string): Invalid {
  return { status: "invalid", reason };
}

/**
 * Parse every complete value at the front of `buffer`.
 *
 * Stops at the first incomplete value, or at the first value that can never
 * parse (reported in `failure`). Never throws.
 */
export function decode(buffer: string): DecodeResult {
  const values: ProtocolValue[] = [];
  let offset = 0;

  while (offset < buffer.length) {
    const step = decodeValue(buffer, offset);
    if (step.status === "incomplete") {
      const remainder = buffer.slice(offset);
      return step.needed === undefined
        ? { values, remainder }
        : { values, remainder, needed: step.needed };
    }
    if (step.status === "invalid") {
      return {
        values,
        remainder: buffer.slice(offset),
        failure: { offset, reason: step.reason },
      };
    }
    values.push(step.value);
    offset = step.next;
  }

  return { values, remainder: buffer.slice(offset) };
}

/**
 * Parse one value starting at `offset`.
 *
 * Nested arrays are tracked on an explicit stack, so nesting depth is bounded
 * by the input rather than the call stack.
 */
export function decodeValue(input: string, offset = 0): DecodeStep {
  const stack: Frame[] = [];
  let position = offset;

  for (;;) {
    const token = readToken(input, position);
    if (token.status !== "complete") {
      return token;
    }
    position = token.next;

    let value: ProtocolValue;
    if (token.value.type === "array") {
      if (token.value.count > 0) {
        stack.push({ items: [], count: token.value.count });
        continue;
      }
      value = { kind: "array", items: [] };
    } else {
      value = token.value.value;
    }

    // Attach to the enclosing arrays, closing every one that fills up
    for (;;) {
      const frame = stack[stack.length - 1];
      if (frame === undefined) {
        return complete(value, position);
      }
      frame.items.push(value);
      if (frame.items.length < frame.count) {
        break;
      }
      stack.pop();
      value = { kind: "array", items: frame.items };
    }
  }
}

function readToken(input: string, position: number): DecodeStep<Token> {
  if (position >= input.length) {
    return INCOMPLETE;
  }

  const prefix = input.charAt(position);
  switch (prefix) {
    case "+":
    case "-": {
      const line = readLine(input, position + 1);
      if (line.status !== "complete") return line;
      const value =
        prefix === "+" ? resp.simple(line.value) : resp.error(line.value);
      return complete({ type: "value", value }, line.next);
    }

    case ":": {
      const line = readLine(input, position + 1);
      if (line.status !== "complete") return line;
      const integer = parseInteger(line.value);
      if (integer === undefined) {
        return invalid(`Invalid integer "${line.value}"`);
      }
      return complete(
        { type: "value", value: { kind: "integer", value: integer } },
        line.next,
      );
    }

    case "$":
      return readBulk(input, position);

    case "*": {
      const line = readLine(input, position + 1);
      if (line.status !== "complete") return line;
      if (line.value === "-1") {
        return complete({ type: "value", value: resp.null() }, line.next);
      }
      const count = parseLength(line.value);
      if (count === undefined) {
        return invalid(`Invalid array length "${line.value}"`);
      }
      return complete({ type: "array", count }, line.next);
    }

    default:
      return invalid(`Unknown type prefix ${JSON.stringify(prefix)}`);
  }
}

function readBulk(input: string, position: number): DecodeStep<Token> {
  const header = readLine(input, position + 1);
  if (header.status !== "complete") return header;

  if (header.value === "-1") {
    return complete({ type: "value", value: resp.null() }, header.next);
  }

  const length = parseLength(header.value);
  if (length === undefined) {
    return invalid(`Invalid bulk length "${header.value}"`);
  }

  const payload = skipBytes(input, header.next, length);
  if (payload.status === "incomplete") {
    // The payload and its CRLF are still to come
    return { status: "incomplete", needed: length - payload.counted + 2 };
  }
  if (payload.status === "invalid") return payload;
  const end = payload.next;

  if (input.length < end + 2) {
    if (input.length === end + 1 && input.charAt(end) !== CR) {
      return invalid("Bulk payload is not terminated by CRLF");
    }
    return INCOMPLETE;
  }
  if (input.charAt(end) !== CR || input.charAt(end + 1) !== LF) {
    return invalid("Bulk payload is not terminated by CRLF");
  }

  return complete(
    { type: "value", value: resp.bulk(input.slice(header.next, end)) },
    end + 2,
  );
}

/**
 * Read up to the next CRLF. A bare CR or LF inside the line can never
 * become valid, so it is reported as invalid.
 */
function readLine(input: string, start: number): DecodeStep<string> {
  for (let index = start; index < input.length; index++) {
    const char = input.charAt(index);
    if (char === LF) {
      return invalid("Line contains a bare LF");
    }
    if (char === CR) {
      if (index + 1 >= input.length) {
        return INCOMPLETE;
      }
      if (input.charAt(index + 1) !== LF) {
        return invalid("Line contains a bare CR");
      }
      return complete(input.slice(start, index), index + 2);
    }
  }
  return INCOMPLETE;
}

type PartialSkip = { readonly status: "incomplete"; readonly counted: number };

/**
 * Advance over `byteLength` UTF-8 bytes worth of text. When the input runs
 * out first, reports how many bytes it did count.
 */
function skipBytes(
  input: string,
  start: number,
  byteLength: number,
): Complete<number> | PartialSkip | Invalid {
  let index = start;
  let bytes = 0;

  while (bytes < byteLength) {
    const codePoint = input.codePointAt(index);
    if (codePoint === undefined) {
      return { status: "incomplete", counted: bytes };
    }
    bytes += utf8Width(codePoint);
    index += codePoint > 0xffff ? 2 : 1;
  }

  if (bytes !== byteLength) {
    return invalid("Bulk length ends inside a multi-byte character");
  }
  return complete(bytes, index);
}

/** UTF-8 length of `text`. */
function utf8ByteLength(text: string): number {
  let bytes = 0;
  for (let index = 0; index < text.length; index++) {
    const codePoint = text.codePointAt(index);
    if (codePoint === undefined) break;
    bytes += utf8Width(codePoint);
    if (codePoint > 0xffff) index++;
  }
  return bytes;
}

function utf8Width(codePoint: number): number {
  if (codePoint < 0x80) return 1;
  if (codePoint < 0x800) return 2;
  if (codePoint < 0x10000) return 3;
  return 4;
}

function parseLength(text: string): number | undefined {
  if (!/^\d+$/.test(text)) {
    return undefined;
  }
  const length = Number(text);
  return Number.isSafeInteger(length) ? length : undefined;
}

function parseInteger(text: string): bigint | undefined {
  if (!/^[+-]?\d+$/.test(text)) {
    return undefined;
  }
  const value = BigInt(text.startsWith("+") ? text.slice(1) : text);
  return value < INT64_MIN || value > INT64_MAX ? undefined : value;
}

/**
 * Stateful decoder owning the accumulation buffer.
 *
 * Unparseable input is disposed of whole: RESP has no resync marker, so
 * anything buffered after a malformed value cannot be trusted either.
 *
 * @example
 * ```typescript
 * const decoder = new RespDecoder();
 * decoder.feed("*3\r\n$7\r\nmessage\r\n");   // { values: [] }
 * decoder.feed("$4\r\nnews\r\n$2\r\nhi\r\n"); // { values: [array] }
 * ```
 */
export class RespDecoder {
  private buffer = "";
  /** Bytes a pending bulk still needs before a parse can get further. */
  private awaiting = 0;

  /** Number of buffered UTF-16 code units awaiting more input. */
  get pending(): number {
    return this.buffer.length;
  }

  /**
   * Append text and parse everything now complete. On failure the result's
   * `remainder` holds the discarded input.
   *
   * While a large bulk payload arrives in pieces, the buffer is not parsed
   * again until enough bytes have come in to finish it.
   */
  feed(text: string): DecodeResult {
    this.buffer += text;
    if (this.awaiting > 0) {
      this.awaiting -= utf8ByteLength(text);
      if (this.awaiting > 0) {
        return { values: [], remainder: this.buffer, needed: this.awaiting };
      }
    }

    const result = decode(this.buffer);
    this.buffer = result.failure ? "" : result.remainder;
    this.awaiting = result.needed ?? 0;
    return result;
  }

  reset(): void {
    this.buffer = "";
    this.awaiting = 0;
  }
}
