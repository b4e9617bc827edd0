// SPDX-FileCopyrightText: 2025-present Kriasoft
// SPDX-License-Identifier: MIT

import { TextDecoder } from "node:util";

/**
 * Raised when a chunk of socket bytes is not valid UTF-8.
 */
export class MalformedUtf8Error extends Error {
  constructor(
    public readonly byteLength: number,
    options?: { cause?: unknown },
  ) {
    super(`Received ${byteLength} bytes that are not valid UTF-8`, options);
    this.name = "MalformedUtf8Error";
  }
}

/**
 * Streaming UTF-8 decoder for socket chunks.
 *
 * Multi-byte sequences split across reads are held until the rest arrives.
 * Invalid input fails closed: the whole chunk is rejected, along with any
 * partial sequence held from the previous chunk, and decoding restarts clean.
 */
export class Utf8ChunkDecoder {
  private decoder = Utf8ChunkDecoder.create();

  private static create(): TextDecoder {
    // ignoreBOM keeps a leading U+FEFF in the first payload instead of eating it
    return new TextDecoder("utf-8", { fatal: true, ignoreBOM: true });
  }

  /**
   * @throws {MalformedUtf8Error} if the chunk is not valid UTF-8
   */
  decode(chunk: Uint8Array): string {
    try {
      return this.decoder.decode(chunk, { stream: true });
    } catch (error) {
      this.decoder = Utf8ChunkDecoder.create();
      throw new MalformedUtf8Error(chunk.byteLength, { cause: error });
    }
  }

  /** Drop any partial sequence held from a previous chunk. */
  reset(): void {
    this.decoder = Utf8ChunkDecoder.create();
  }
}
