/**
 * @module primitives/packet-parser
 * @description Recursive-descent packet parser.
 *
 * One call level per nested packet. The two operator framings are told
 * apart by the length-type flag alone:
 *
 * | flag | field    | meaning                                  |
 * |------|----------|------------------------------------------|
 * | 0    | 15 bits  | total bits occupied by the children      |
 * | 1    | 11 bits  | number of children                       |
 *
 * In bit-count mode each child's size is measured by the cursor offset
 * delta, so a child that runs past the declared total is caught as soon
 * as it completes.
 */

import { BitPacketEmitter } from "./base-emitter.js";
import type { IBitCursor } from "../interfaces/bit-cursor.js";
import type {
  IPacketParser,
  PacketParserOptions,
} from "../interfaces/packet-parser.js";
import { PacketError } from "../interfaces/packet-parser.js";
import type { BitCount, PacketVersion, TypeCode } from "../types/branded.js";
import { isTypeCode, toBitCount, toPacketVersion } from "../types/branded.js";
import type {
  LengthType,
  LiteralPacket,
  OperatorKind,
  OperatorPacket,
  Packet,
} from "../types/packet.js";
import {
  BIT_COUNT_WIDTH,
  LENGTH_TYPE_WIDTH,
  LITERAL_GROUP_FLAG_WIDTH,
  LITERAL_NIBBLE_WIDTH,
  SUB_COUNT_WIDTH,
  TYPE_CODE_WIDTH,
  VERSION_WIDTH,
  kindOf,
} from "../types/packet.js";

export const DEFAULT_MAX_DEPTH = 1024;

const NO_CHILDREN: readonly [] = [];
Object.freeze(NO_CHILDREN);

/**
 * PacketParser — turns a prefix of the bit stream into exactly one Packet.
 *
 * @example
 * ```ts
 * const parser = new PacketParser();
 * const packet = parser.parse(new BitCursor(hexToBits("D2FE28")));
 * packet.kind; // "LITERAL"
 * ```
 */
export class PacketParser extends BitPacketEmitter implements IPacketParser {
  private readonly maxDepth: number;

  constructor(options: PacketParserOptions = {}) {
    super();
    this.maxDepth = options.maxDepth ?? DEFAULT_MAX_DEPTH;
  }

  parse(cursor: IBitCursor): Packet {
    return this.parsePacket(cursor, 0);
  }

  // ─── Private ────────────────────────────────────────────────────

  private parsePacket(cursor: IBitCursor, depth: number): Packet {
    if (depth > this.maxDepth) {
      throw new PacketError(
        `Packet nesting exceeds ${this.maxDepth} levels at bit ${cursor.bitsConsumed()}`,
        "MAX_DEPTH_EXCEEDED"
      );
    }

    const start = cursor.bitsConsumed();
    const version = toPacketVersion(cursor.readInt(VERSION_WIDTH));
    const typeCode = readTypeCode(cursor);
    const kind = kindOf(typeCode);

    const packet =
      kind === "LITERAL"
        ? this.parseLiteral(cursor, version, start)
        : this.parseOperator(cursor, depth, version, kind, start);

    if (this.hasListeners("PACKET_DECODED")) {
      this.emit({ type: "PACKET_DECODED", packet, offset: start, depth });
    }
    return packet;
  }

  private parseLiteral(
    cursor: IBitCursor,
    version: PacketVersion,
    start: BitCount
  ): LiteralPacket {
    let value = 0n;
    let more: number;
    do {
      more = cursor.readInt(LITERAL_GROUP_FLAG_WIDTH);
      const nibble = cursor.read(LITERAL_NIBBLE_WIDTH);
      value = (value << BigInt(LITERAL_NIBBLE_WIDTH)) | nibble.value;
    } while (more === 1);

    const packet: LiteralPacket = {
      kind: "LITERAL",
      version,
      value,
      children: NO_CHILDREN,
      bitLength: consumedSince(cursor, start),
    };
    return Object.freeze(packet);
  }

  private parseOperator(
    cursor: IBitCursor,
    depth: number,
    version: PacketVersion,
    kind: OperatorKind,
    start: BitCount
  ): OperatorPacket {
    const lengthType: LengthType =
      cursor.readInt(LENGTH_TYPE_WIDTH) === 0 ? "BIT_COUNT" : "SUB_COUNT";

    const children =
      lengthType === "BIT_COUNT"
        ? this.parseByBitCount(cursor, depth)
        : this.parseBySubCount(cursor, depth);

    const packet: OperatorPacket = {
      kind,
      version,
      lengthType,
      children: Object.freeze(children),
      bitLength: consumedSince(cursor, start),
    };
    return Object.freeze(packet);
  }

  private parseByBitCount(cursor: IBitCursor, depth: number): Packet[] {
    const declared = cursor.readInt(BIT_COUNT_WIDTH);
    const children: Packet[] = [];
    let consumed = 0;

    while (consumed < declared) {
      const before = cursor.bitsConsumed();
      children.push(this.parsePacket(cursor, depth + 1));
      consumed += consumedSince(cursor, before);

      if (consumed > declared) {
        throw new PacketError(
          `Sub-packets occupy ${consumed} bits, header declared ${declared}`,
          "FRAMING_MISMATCH"
        );
      }
    }
    return children;
  }

  private parseBySubCount(cursor: IBitCursor, depth: number): Packet[] {
    const count = cursor.readInt(SUB_COUNT_WIDTH);
    const children: Packet[] = [];
    for (let i = 0; i < count; i++) {
      children.push(this.parsePacket(cursor, depth + 1));
    }
    return children;
  }
}

function readTypeCode(cursor: IBitCursor): TypeCode {
  const code = cursor.readInt(TYPE_CODE_WIDTH);
  if (!isTypeCode(code)) {
    // Unreachable for a 3-bit field.
    throw new RangeError(`Type code out of range: ${code}`);
  }
  return code;
}

function consumedSince(cursor: IBitCursor, start: BitCount): BitCount {
  return toBitCount(cursor.bitsConsumed() - start);
}
