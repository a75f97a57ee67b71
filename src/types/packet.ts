/**
 * @module types/packet
 * @description Packet — one node of a decoded expression tree.
 *
 * Every packet starts with a 6-bit header:
 *
 * | version (3b) | type code (3b) | body |
 *
 * Type code 4 is a literal whose body is a chain of 5-bit groups
 * (continuation bit + nibble). Every other code is an operator whose body
 * is a length-type flag followed by either a 15-bit total of sub-packet
 * bits or an 11-bit count of sub-packets.
 *
 * The kind set is closed. Packets are frozen once the parser builds them.
 */

import type { BitCount, PacketVersion, TypeCode } from "./branded.js";

// ─── Field Widths ───────────────────────────────────────────────────

export const VERSION_WIDTH = 3;
export const TYPE_CODE_WIDTH = 3;
export const LITERAL_GROUP_FLAG_WIDTH = 1;
export const LITERAL_NIBBLE_WIDTH = 4;
export const LENGTH_TYPE_WIDTH = 1;
export const BIT_COUNT_WIDTH = 15;
export const SUB_COUNT_WIDTH = 11;

// ─── Kinds ──────────────────────────────────────────────────────────

export type OperatorKind =
  | "SUM"
  | "PRODUCT"
  | "MINIMUM"
  | "MAXIMUM"
  | "GREATER_THAN"
  | "LESS_THAN"
  | "EQUAL_TO";

export type PacketKind = OperatorKind | "LITERAL";

/** Relational kinds take exactly two operands. */
export type RelationalKind = Extract<
  OperatorKind,
  "GREATER_THAN" | "LESS_THAN" | "EQUAL_TO"
>;

/** Type code → kind, indexed by the 3-bit code. */
export const PACKET_KINDS = [
  "SUM",
  "PRODUCT",
  "MINIMUM",
  "MAXIMUM",
  "LITERAL",
  "GREATER_THAN",
  "LESS_THAN",
  "EQUAL_TO",
] as const satisfies readonly PacketKind[];

/**
 * How an operator declared the extent of its children.
 *
 * - `BIT_COUNT`: flag 0, a 15-bit total of child bits follows.
 * - `SUB_COUNT`: flag 1, an 11-bit number of children follows.
 */
export type LengthType = "BIT_COUNT" | "SUB_COUNT";

// ─── Packet Union ───────────────────────────────────────────────────

interface PacketHeader {
  readonly version: PacketVersion;
  /** Bits consumed by this packet, descendants included. */
  readonly bitLength: BitCount;
}

export interface LiteralPacket extends PacketHeader {
  readonly kind: "LITERAL";
  /** Arbitrary-precision, non-negative. */
  readonly value: bigint;
  readonly children: readonly [];
}

export interface OperatorPacket extends PacketHeader {
  readonly kind: OperatorKind;
  readonly lengthType: LengthType;
  readonly children: readonly Packet[];
}

export type Packet = LiteralPacket | OperatorPacket;

// ─── Helpers ────────────────────────────────────────────────────────

/** Resolve the kind for a 3-bit type code. */
export function kindOf(typeCode: TypeCode): PacketKind {
  return PACKET_KINDS[typeCode];
}

/** Resolve the 3-bit type code for a kind. */
export function typeCodeOf(kind: PacketKind): TypeCode {
  switch (kind) {
    case "SUM":
      return 0;
    case "PRODUCT":
      return 1;
    case "MINIMUM":
      return 2;
    case "MAXIMUM":
      return 3;
    case "LITERAL":
      return 4;
    case "GREATER_THAN":
      return 5;
    case "LESS_THAN":
      return 6;
    case "EQUAL_TO":
      return 7;
  }
}

/**
 * Yield the packet itself and then every descendant, pre-order.
 */
export function* descendants(packet: Packet): Generator<Packet> {
  yield packet;
  for (const child of packet.children) {
    yield* descendants(child);
  }
}
