/**
 * @module types/branded
 * @description Branded types for the packet wire format.
 *
 * A raw number read off the stream is not automatically a version or a
 * type code. Brands keep header fields from being mixed up with bit
 * offsets and lengths at the compiler level.
 *
 * @example
 * ```ts
 * const raw = 6;
 * // Type error: number is not assignable to PacketVersion
 * const v: PacketVersion = raw;
 * ```
 */

/** Unique symbol for branding. Not exported — internal only. */
declare const __brand: unique symbol;

/**
 * Generic branded type utility.
 * Intersects a base type with a phantom brand field that exists only
 * at the type level, never at runtime.
 */
export type Brand<T, B extends string> = T & { readonly [__brand]: B };

// ─── Bit Values ─────────────────────────────────────────────────────

/** A single bit. */
export type Bit = 0 | 1;

/**
 * A sequence of bits, one element per bit, each 0 or 1.
 * Most significant bit first.
 */
export type BitSequence = Brand<Uint8Array, "BitSequence">;

// ─── Header Brands ──────────────────────────────────────────────────

/** The 3-bit packet version (0–7). */
export type PacketVersion = Brand<number, "PacketVersion">;

/** The 3-bit packet type code (0–7). */
export type TypeCode = 0 | 1 | 2 | 3 | 4 | 5 | 6 | 7;

/** A count of bits, either consumed or declared by a header field. */
export type BitCount = Brand<number, "BitCount">;

// ─── Constructors ───────────────────────────────────────────────────

/**
 * Brand a bit array, checking that every element is 0 or 1.
 * @throws {RangeError} On any other element.
 */
export function toBitSequence(values: ArrayLike<number>): BitSequence {
  const bits = Uint8Array.from(values);
  for (let i = 0; i < bits.length; i++) {
    if (bits[i] !== 0 && bits[i] !== 1) {
      throw new RangeError(`Bit ${i} is ${bits[i]}, expected 0 or 1`);
    }
  }
  return bits as BitSequence;
}

/** Narrow a number to a 3-bit type code. */
export function isTypeCode(n: number): n is TypeCode {
  return Number.isInteger(n) && n >= 0 && n <= 7;
}

/**
 * Brand a packet version.
 * @throws {RangeError} If `n` does not fit in 3 bits.
 */
export function toPacketVersion(n: number): PacketVersion {
  if (!Number.isInteger(n) || n < 0 || n > 7) {
    throw new RangeError(`Packet version must be in [0, 7], got ${n}`);
  }
  return n as PacketVersion;
}

/**
 * Brand a bit count.
 * @throws {RangeError} If `n` is not a non-negative integer.
 */
export function toBitCount(n: number): BitCount {
  if (!Number.isInteger(n) || n < 0) {
    throw new RangeError(`Bit count must be a non-negative integer, got ${n}`);
  }
  return n as BitCount;
}
