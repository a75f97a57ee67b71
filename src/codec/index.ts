/**
 * @module codec
 * @description Hex/bit conversion and packet serialization.
 *
 * Input arrives as a line of hexadecimal digits, each expanding to four
 * bits, most significant first. The encoder writes a Packet tree back
 * into that format, so a decoded tree can be re-framed or a test tree
 * built without hand-assembling bits.
 */

import { BitstreamError } from "../interfaces/bit-cursor.js";
import { PacketError } from "../interfaces/packet-parser.js";
import type { BitSequence } from "../types/branded.js";
import { toBitSequence } from "../types/branded.js";
import type { Packet } from "../types/packet.js";
import {
  BIT_COUNT_WIDTH,
  LENGTH_TYPE_WIDTH,
  LITERAL_NIBBLE_WIDTH,
  SUB_COUNT_WIDTH,
  TYPE_CODE_WIDTH,
  VERSION_WIDTH,
  typeCodeOf,
} from "../types/packet.js";

const HEX_DIGIT = /^[0-9a-fA-F]$/;

// ─── Hex ────────────────────────────────────────────────────────────

/**
 * Expand a hex string into bits. Surrounding whitespace is ignored.
 *
 * @throws {BitstreamError} code=INVALID_HEX_DIGIT on any non-hex character.
 */
export function hexToBits(hex: string): BitSequence {
  const digits = hex.trim();
  const bits = new Uint8Array(digits.length * 4);

  for (let i = 0; i < digits.length; i++) {
    const ch = digits.charAt(i);
    if (!HEX_DIGIT.test(ch)) {
      throw new BitstreamError(
        `Invalid hex digit ${JSON.stringify(ch)} at position ${i}`,
        "INVALID_HEX_DIGIT"
      );
    }
    const nibble = parseInt(ch, 16);
    bits[i * 4] = (nibble >> 3) & 1;
    bits[i * 4 + 1] = (nibble >> 2) & 1;
    bits[i * 4 + 2] = (nibble >> 1) & 1;
    bits[i * 4 + 3] = nibble & 1;
  }

  return toBitSequence(bits);
}

/**
 * Collapse bits into upper-case hex. A partial final digit is padded
 * with zero bits on the right.
 */
export function bitsToHex(bits: BitSequence): string {
  let hex = "";
  for (let i = 0; i < bits.length; i += 4) {
    let nibble = 0;
    for (let j = 0; j < 4; j++) {
      nibble = (nibble << 1) | (bits[i + j] ?? 0);
    }
    hex += nibble.toString(16).toUpperCase();
  }
  return hex;
}

// ─── Literal Groups ─────────────────────────────────────────────────

/**
 * Encode a non-negative integer as 5-bit groups: a continuation bit
 * followed by a nibble, most significant nibble first. Zero is a single
 * `00000` group.
 *
 * @throws {RangeError} If `value` is negative.
 */
export function encodeLiteralBits(value: bigint): BitSequence {
  if (value < 0n) {
    throw new RangeError(`Literal values are non-negative, got ${value}`);
  }

  const nibbles: number[] = [];
  let rest = value;
  do {
    nibbles.unshift(Number(rest & 0xfn));
    rest >>= 4n;
  } while (rest > 0n);

  const out = new BitWriter();
  nibbles.forEach((nibble, i) => {
    out.write(i < nibbles.length - 1 ? 1 : 0, 1);
    out.write(nibble, LITERAL_NIBBLE_WIDTH);
  });
  return out.finish();
}

// ─── Packets ────────────────────────────────────────────────────────

/**
 * Serialize a Packet tree. Operators keep the framing they were decoded
 * with; the declared bit total or child count is recomputed from the
 * children actually written.
 *
 * @throws {PacketError} code=FIELD_OVERFLOW if a header field cannot hold its value.
 */
export function encodePacket(packet: Packet): BitSequence {
  const out = new BitWriter();
  out.write(packet.version, VERSION_WIDTH);
  out.write(typeCodeOf(packet.kind), TYPE_CODE_WIDTH);

  if (packet.kind === "LITERAL") {
    out.append(encodeLiteralBits(packet.value));
    return out.finish();
  }

  const children = packet.children.map(encodePacket);
  if (packet.lengthType === "BIT_COUNT") {
    const total = children.reduce((sum, bits) => sum + bits.length, 0);
    out.write(0, LENGTH_TYPE_WIDTH);
    out.write(total, BIT_COUNT_WIDTH);
  } else {
    out.write(1, LENGTH_TYPE_WIDTH);
    out.write(children.length, SUB_COUNT_WIDTH);
  }
  for (const child of children) {
    out.append(child);
  }
  return out.finish();
}

// ─── Writer ─────────────────────────────────────────────────────────

class BitWriter {
  private readonly bits: number[] = [];

  write(value: number, width: number): void {
    if (value < 0 || value >= 2 ** width) {
      throw new PacketError(
        `Value ${value} does not fit in a ${width}-bit field`,
        "FIELD_OVERFLOW"
      );
    }
    for (let shift = width - 1; shift >= 0; shift--) {
      this.bits.push(Math.floor(value / 2 ** shift) % 2);
    }
  }

  append(bits: BitSequence): void {
    for (const bit of bits) {
      this.bits.push(bit);
    }
  }

  finish(): BitSequence {
    return toBitSequence(this.bits);
  }
}
