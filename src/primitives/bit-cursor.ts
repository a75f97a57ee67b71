/**
 * @module primitives/bit-cursor
 * @description Forward-only reader over an in-memory bit sequence.
 */

import type { BitRead, IBitCursor } from "../interfaces/bit-cursor.js";
import { BitstreamError } from "../interfaces/bit-cursor.js";
import type { BitCount, BitSequence } from "../types/branded.js";
import { toBitCount, toBitSequence } from "../types/branded.js";

/**
 * Widest field `readInt` returns as a plain number.
 */
const MAX_INT_WIDTH = 32;

/**
 * BitCursor — the only mutable state of a parse.
 *
 * @example
 * ```ts
 * const cursor = new BitCursor(hexToBits("D2FE28"));
 * cursor.readInt(3); // 6
 * cursor.bitsConsumed(); // 3
 * ```
 */
export class BitCursor implements IBitCursor {
  private offset = 0;

  constructor(private readonly bits: BitSequence) {}

  read(n: number): BitRead {
    this.ensureAvailable(n);

    const bits = toBitSequence(this.bits.subarray(this.offset, this.offset + n));
    let value = 0n;
    for (const bit of bits) {
      value = (value << 1n) | BigInt(bit);
    }

    this.offset += n;
    return { bits, value };
  }

  readInt(n: number): number {
    if (n > MAX_INT_WIDTH) {
      throw new BitstreamError(
        `readInt() is limited to ${MAX_INT_WIDTH} bits, requested ${n}`,
        "INVALID_READ_WIDTH"
      );
    }
    this.ensureAvailable(n);

    let value = 0;
    for (let i = 0; i < n; i++) {
      value = value * 2 + (this.bits[this.offset + i] ?? 0);
    }

    this.offset += n;
    return value;
  }

  // ─── Queries ────────────────────────────────────────────────────

  bitsConsumed(): BitCount {
    return toBitCount(this.offset);
  }

  bitsRemaining(): BitCount {
    return toBitCount(this.bits.length - this.offset);
  }

  // ─── Private ────────────────────────────────────────────────────

  private ensureAvailable(n: number): void {
    if (!Number.isInteger(n) || n < 0) {
      throw new BitstreamError(
        `Read width must be a non-negative integer, got ${n}`,
        "INVALID_READ_WIDTH"
      );
    }
    const remaining = this.bits.length - this.offset;
    if (n > remaining) {
      throw new BitstreamError(
        `Unexpected end of stream at bit ${this.offset}: needed ${n}, ${remaining} left`,
        "UNEXPECTED_END_OF_STREAM"
      );
    }
  }
}
