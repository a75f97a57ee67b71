import { encodeLiteralBits } from "../src/codec/index.js";
import type { BitCount, BitSequence } from "../src/types/branded.js";
import { toBitCount, toBitSequence, toPacketVersion } from "../src/types/branded.js";
import type {
  LengthType,
  LiteralPacket,
  OperatorKind,
  OperatorPacket,
  Packet,
} from "../src/types/packet.js";

/** Bits from a binary string; spaces are ignored. */
export function bits(binary: string): BitSequence {
  return toBitSequence([...binary.replace(/\s+/g, "")].map(Number));
}

/** Run `fn` and return whatever it throws. */
export function thrownBy(fn: () => unknown): unknown {
  try {
    fn();
  } catch (err) {
    return err;
  }
  throw new Error("Expected function to throw");
}

export function lit(value: bigint | number, version = 0): LiteralPacket {
  const v = BigInt(value);
  return {
    kind: "LITERAL",
    version: toPacketVersion(version),
    value: v,
    children: [],
    bitLength: toBitCount(6 + encodeLiteralBits(v).length),
  };
}

export function op(
  kind: OperatorKind,
  children: Packet[],
  version = 0,
  lengthType: LengthType = "SUB_COUNT"
): OperatorPacket {
  const header = 6 + 1 + (lengthType === "BIT_COUNT" ? 15 : 11);
  const body = children.reduce((sum, child) => sum + child.bitLength, 0);
  const bitLength: BitCount = toBitCount(header + body);
  return {
    kind,
    version: toPacketVersion(version),
    lengthType,
    children,
    bitLength,
  };
}

export function asOperator(packet: Packet | undefined): OperatorPacket {
  if (packet === undefined || packet.kind === "LITERAL") {
    throw new Error(`Expected an operator packet, got ${packet?.kind}`);
  }
  return packet;
}

export function literalValue(packet: Packet | undefined): bigint {
  if (packet === undefined || packet.kind !== "LITERAL") {
    throw new Error(`Expected a literal packet, got ${packet?.kind}`);
  }
  return packet.value;
}
