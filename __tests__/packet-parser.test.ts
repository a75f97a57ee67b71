import { describe, it, expect, beforeEach, vi } from "vitest";
import { PacketParser } from "../src/primitives/packet-parser.js";
import { BitCursor } from "../src/primitives/bit-cursor.js";
import { hexToBits, encodeLiteralBits, encodePacket } from "../src/codec/index.js";
import { evaluate } from "../src/primitives/expression-evaluator.js";
import { BitstreamError } from "../src/interfaces/bit-cursor.js";
import { PacketError } from "../src/interfaces/packet-parser.js";
import type { PacketDecodedEvent } from "../src/types/events.js";
import type { BitSequence } from "../src/types/branded.js";
import { toBitSequence } from "../src/types/branded.js";
import type { Packet } from "../src/types/packet.js";
import { asOperator, bits, lit, literalValue, op, thrownBy } from "./helpers.js";

// SUM v3 (bit-count, 40) [ PRODUCT v5 (sub-count, 2) [ 6 (v2), 7 (v4) ] ]
const NESTED =
  "011 000 0 000000000101000" +
  "101 001 1 00000000010" +
  "010 100 00110" +
  "100 100 00111";

// MAXIMUM v7 (sub-count, 3) [ 1 (v2), 2 (v4), 3 (v1) ]
const SUB_COUNT =
  "111 011 1 00000000011" +
  "010 100 00001" +
  "100 100 00010" +
  "001 100 00011";

describe("PacketParser", () => {
  let parser: PacketParser;

  beforeEach(() => {
    parser = new PacketParser();
  });

  function parseBits(input: BitSequence): Packet {
    return parser.parse(new BitCursor(input));
  }

  describe("literal packets", () => {
    it("should decode D2FE28 as version 6, value 2021", () => {
      const packet = parseBits(hexToBits("D2FE28"));
      expect(packet.kind).toBe("LITERAL");
      expect(packet.version).toBe(6);
      expect(literalValue(packet)).toBe(2021n);
      expect(packet.children).toEqual([]);
      expect(packet.bitLength).toBe(21);
    });

    it("should decode a single 00000 group as value 0", () => {
      const packet = parseBits(bits("000 100 00000"));
      expect(literalValue(packet)).toBe(0n);
      expect(packet.bitLength).toBe(11);
    });

    it.each([
      0n,
      15n,
      16n,
      2n ** 64n,
      (1n << 68n) + 5n,
      (1n << 130n) - 1n,
    ])("should reproduce %s from its nibble groups", (value) => {
      const groups = encodeLiteralBits(value);
      const packet = parseBits(toBitSequence([...bits("000 100"), ...groups]));
      expect(literalValue(packet)).toBe(value);
      expect(packet.bitLength).toBe(6 + groups.length);
    });

    it("should use 18 groups for a 69-bit value", () => {
      const packet = parseBits(
        toBitSequence([...bits("000 100"), ...encodeLiteralBits((1n << 68n) + 5n)])
      );
      expect(packet.bitLength).toBe(6 + 18 * 5);
    });

    it("should throw UNEXPECTED_END_OF_STREAM if the group chain is cut off", () => {
      const err = thrownBy(() => parseBits(bits("000 100 10001")));
      expect(err).toBeInstanceOf(BitstreamError);
      expect(err).toMatchObject({ code: "UNEXPECTED_END_OF_STREAM" });
    });
  });

  describe("bit-count operators", () => {
    it("should decode 38006F45291200 into two literal children", () => {
      const packet = parseBits(hexToBits("38006F45291200"));
      expect(packet.kind).toBe("LESS_THAN");
      expect(packet.version).toBe(1);

      const operator = asOperator(packet);
      expect(operator.lengthType).toBe("BIT_COUNT");
      expect(operator.children.map(literalValue)).toEqual([10n, 20n]);
      expect(operator.children.map((c) => c.bitLength)).toEqual([11, 16]);
    });

    it("should count header, framing field and children in bitLength", () => {
      const packet = asOperator(parseBits(hexToBits("38006F45291200")));
      const childBits = packet.children.reduce((sum, c) => sum + c.bitLength, 0);
      expect(packet.bitLength).toBe(6 + 1 + 15 + childBits);
      expect(packet.bitLength).toBe(49);
    });

    it("should accept a declared total of 0 as no children", () => {
      const packet = asOperator(parseBits(bits("000 000 0 000000000000000")));
      expect(packet.kind).toBe("SUM");
      expect(packet.children).toEqual([]);
      expect(packet.bitLength).toBe(22);
    });

    it("should throw UNEXPECTED_END_OF_STREAM when declared children are missing", () => {
      const err = thrownBy(() => parseBits(bits("000 000 0 000000000001011")));
      expect(err).toBeInstanceOf(BitstreamError);
      expect(err).toMatchObject({ code: "UNEXPECTED_END_OF_STREAM" });
    });

    it("should throw FRAMING_MISMATCH when a child overruns the declared total", () => {
      // Declares 10 bits, but the child literal takes 11.
      const err = thrownBy(() =>
        parseBits(bits("000 000 0 000000000001010" + "000 100 00001"))
      );
      expect(err).toBeInstanceOf(PacketError);
      expect(err).toMatchObject({ code: "FRAMING_MISMATCH" });
    });
  });

  describe("sub-count operators", () => {
    it("should parse exactly the declared number of children", () => {
      const packet = asOperator(parseBits(bits(SUB_COUNT + "0000")));
      expect(packet.kind).toBe("MAXIMUM");
      expect(packet.lengthType).toBe("SUB_COUNT");
      expect(packet.children.map((c) => c.version)).toEqual([2, 4, 1]);
      expect(packet.bitLength).toBe(51);
    });

    it("should leave trailing bits on the cursor", () => {
      const cursor = new BitCursor(bits(SUB_COUNT + "0000"));
      parser.parse(cursor);
      expect(cursor.bitsConsumed()).toBe(51);
      expect(cursor.bitsRemaining()).toBe(4);
    });
  });

  describe("nesting", () => {
    it("should build the full tree with per-packet bit lengths", () => {
      const packet = asOperator(parseBits(bits(NESTED)));
      expect(packet.kind).toBe("SUM");
      expect(packet.bitLength).toBe(62);

      const product = asOperator(packet.children[0]);
      expect(product.kind).toBe("PRODUCT");
      expect(product.bitLength).toBe(40);
      expect(product.children.map(literalValue)).toEqual([6n, 7n]);
    });

    it("should match the root bitLength to the cursor offset", () => {
      const cursor = new BitCursor(bits(NESTED + "00"));
      const packet = parser.parse(cursor);
      expect(packet.bitLength).toBe(cursor.bitsConsumed());
    });

    it("should freeze every packet and child list", () => {
      const packet = asOperator(parseBits(bits(NESTED)));
      expect(Object.isFrozen(packet)).toBe(true);
      expect(Object.isFrozen(packet.children)).toBe(true);
      expect(Object.isFrozen(asOperator(packet.children[0]).children[0])).toBe(true);
    });

    it("should throw MAX_DEPTH_EXCEEDED past the configured depth", () => {
      const shallow = new PacketParser({ maxDepth: 1 });
      const err = thrownBy(() => shallow.parse(new BitCursor(bits(NESTED))));
      expect(err).toBeInstanceOf(PacketError);
      expect(err).toMatchObject({ code: "MAX_DEPTH_EXCEEDED" });
    });

    it("should accept nesting exactly at the configured depth", () => {
      const exact = new PacketParser({ maxDepth: 2 });
      expect(exact.parse(new BitCursor(bits(NESTED))).bitLength).toBe(62);
    });

    it("should reject nesting past the default depth until maxDepth is raised", () => {
      let chain: Packet = lit(9);
      for (let i = 0; i < 1100; i++) {
        chain = op("SUM", [chain]);
      }
      const encoded = encodePacket(chain);

      const err = thrownBy(() => parser.parse(new BitCursor(encoded)));
      expect(err).toBeInstanceOf(PacketError);
      expect(err).toMatchObject({ code: "MAX_DEPTH_EXCEEDED" });

      const deep = new PacketParser({ maxDepth: 5000 });
      const packet = deep.parse(new BitCursor(encoded));
      expect(packet.bitLength).toBe(encoded.length);
      expect(evaluate(packet)).toBe(9n);
    });
  });

  describe("PACKET_DECODED events", () => {
    it("should emit children before their parent with start offsets", () => {
      const events: PacketDecodedEvent[] = [];
      parser.on("PACKET_DECODED", (event) => events.push(event));
      parseBits(bits(NESTED));

      expect(events.map((e) => [e.packet.kind, e.offset, e.depth])).toEqual([
        ["LITERAL", 40, 2],
        ["LITERAL", 51, 2],
        ["PRODUCT", 22, 1],
        ["SUM", 0, 0],
      ]);
    });

    it("should report offsets whose span equals each packet's bitLength", () => {
      const events: PacketDecodedEvent[] = [];
      parser.on("PACKET_DECODED", (event) => events.push(event));
      parseBits(bits(NESTED));

      // Each literal ends where the next packet starts.
      const [first, second, product] = events;
      expect((first?.offset ?? 0) + (first?.packet.bitLength ?? 0)).toBe(second?.offset);
      expect((product?.offset ?? 0) + (product?.packet.bitLength ?? 0)).toBe(62);
    });

    it("should not emit once the listener is removed", () => {
      const listener = vi.fn();
      parser.on("PACKET_DECODED", listener);
      parser.off("PACKET_DECODED", listener);
      parseBits(hexToBits("D2FE28"));
      expect(listener).not.toHaveBeenCalled();
    });
  });
});
