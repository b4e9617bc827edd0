// SPDX-FileCopyrightText: 2025-present Kriasoft
// SPDX-License-Identifier: MIT

/**
 * @resp-pubsub/protocol - RESP wire format for pub/sub clients
 *
 * - Incremental decoding of fragmented socket reads
 * - Value encoding (bulk lengths in UTF-8 bytes)
 * - Inline SUBSCRIBE/UNSUBSCRIBE/PSUBSCRIBE/PUNSUBSCRIBE rendering
 * - Fail-closed UTF-8 decoding of socket chunks
 */

export { decode, decodeValue, RespDecoder } from "./decoder.js";
export type { DecodeFailure, DecodeResult, DecodeStep } from "./decoder.js";
export { encode } from "./encoder.js";
export { renderCommand, isInlineSafe } from "./command.js";
export type { Command, CommandType } from "./command.js";
export { Utf8ChunkDecoder, MalformedUtf8Error } from "./text.js";
export { resp, textOf, INT64_MAX, INT64_MIN } from "./value.js";
export type {
  ArrayValue,
  BulkValue,
  ErrorTextValue,
  IntegerValue,
  NullValue,
  ProtocolValue,
  ProtocolValueKind,
  SimpleStringValue,
} from "./value.js";
