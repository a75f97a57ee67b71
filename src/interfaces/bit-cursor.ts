/**
 * @module interfaces/bit-cursor
 * @description IBitCursor — the single sequential reader over a bit stream.
 *
 * The cursor owns the whole input and a read offset. Reads only ever move
 * the offset forward; there is no seek and no rewind. Callers measure how
 * much a sub-parse consumed by differencing `bitsConsumed()` before and
 * after it.
 */

import type { BitCount, BitSequence } from "../types/branded.js";

/**
 * Errors that may be thrown while reading or producing a bit stream.
 */
export class BitstreamError extends Error {
  constructor(
    message: string,
    public readonly code:
      | "UNEXPECTED_END_OF_STREAM"
      | "INVALID_READ_WIDTH"
      | "INVALID_HEX_DIGIT"
  ) {
    super(message);
    this.name = "BitstreamError";
  }
}

/**
 * The result of a single read: the raw bits and the unsigned integer
 * they encode, big-endian.
 */
export interface BitRead {
  readonly bits: BitSequence;
  readonly value: bigint;
}

/**
 * @interface IBitCursor
 */
export interface IBitCursor {
  /**
   * @command
   * @description Consumes the next `n` bits, most significant first.
   *
   * @postcondition Offset advanced by exactly `n`. On failure the offset
   *               is left where it was.
   * @throws {BitstreamError} code=UNEXPECTED_END_OF_STREAM if fewer than `n` bits remain.
   * @throws {BitstreamError} code=INVALID_READ_WIDTH if `n` is not a non-negative integer.
   */
  read(n: number): BitRead;

  /**
   * @command
   * @description Like `read`, returning only the integer as a number.
   * For header fields no wider than 32 bits.
   *
   * @throws {BitstreamError} code=INVALID_READ_WIDTH if `n` exceeds 32.
   */
  readInt(n: number): number;

  // ─── Queries ────────────────────────────────────────────────────

  /** Bits consumed so far. */
  bitsConsumed(): BitCount;

  /** Bits left to read. */
  bitsRemaining(): BitCount;
}
