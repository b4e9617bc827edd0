// SPDX-FileCopyrightText: 2025-present Kriasoft
// SPDX-License-Identifier: MIT

/**
 * Decoded RESP values.
 *
 * One variant per wire type. Values are plain frozen-by-convention objects:
 * the decoder never mutates a value after handing it out.
 */

export interface NullValue {
  readonly kind: "null";
}

export interface SimpleStringValue {
  readonly kind: "simple";
  readonly value: string;
}

export interface ErrorTextValue {
  readonly kind: "error";
  readonly value: string;
}

export interface IntegerValue {
  readonly kind: "integer";
  /** Signed 64-bit integer. */
  readonly value: bigint;
}

export interface BulkValue {
  readonly kind: "bulk";
  readonly value: string;
}

export interface ArrayValue {
  readonly kind: "array";
  readonly items: readonly ProtocolValue[];
}

export type ProtocolValue =
  | NullValue
  | SimpleStringValue
  | ErrorTextValue
  | IntegerValue
  | BulkValue
  | ArrayValue;

export type ProtocolValueKind = ProtocolValue["kind"];

export const INT64_MIN = -(2n ** 63n);
export const INT64_MAX = 2n ** 63n - 1n;

const NULL: NullValue = { kind: "null" };

/**
 * Value constructors.
 *
 * @example
 * ```typescript
 * const reply = resp.array(resp.bulk("subscribe"), resp.bulk("news"), resp.integer(1));
 * ```
 */
export const resp = {
  null: (): NullValue => NULL,
  simple: (value: string): SimpleStringValue => ({ kind: "simple", value }),
  error: (value: string): ErrorTextValue => ({ kind: "error", value }),
  integer: (value: bigint | number): IntegerValue => ({
    kind: "integer",
    value: BigInt(value),
  }),
  bulk: (value: string): BulkValue => ({ kind: "bulk", value }),
  array: (...items: ProtocolValue[]): ArrayValue => ({ kind: "array", items }),
} as const;

/**
 * Text carried by a value, for the kinds that carry text.
 */
export function textOf(value: ProtocolValue | undefined): string | undefined {
  if (value?.kind === "bulk" || value?.kind === "simple") {
    return value.value;
  }
  return undefined;
}
