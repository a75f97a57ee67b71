/**
 * @module decoder
 * @description PacketDecoder — wires the cursor, parser and traversals
 * together for a whole hex transmission.
 *
 * A transmission holds exactly one root packet. Hex input is padded to a
 * whole number of digits, so a few trailing bits usually follow the root;
 * they are reported, and rejected only when `strictPadding` is set and
 * any of them is non-zero.
 *
 * @example
 * ```ts
 * const decoder = new PacketDecoder();
 * const { versionSum, value } = decoder.decodeHex("D2FE28");
 * // versionSum === 6, value === 2021n
 * ```
 */

import { BitPacketEmitter } from "./primitives/base-emitter.js";
import { BitCursor } from "./primitives/bit-cursor.js";
import { PacketParser } from "./primitives/packet-parser.js";
import { evaluate } from "./primitives/expression-evaluator.js";
import { totalVersion } from "./primitives/version-accumulator.js";
import { hexToBits } from "./codec/index.js";
import { EvaluationError } from "./interfaces/evaluator.js";
import { PacketError } from "./interfaces/packet-parser.js";
import { resolveConfig } from "./config.js";
import type { DecoderConfig, DecoderConfigInput } from "./config.js";
import { Logger } from "./observability/logger.js";
import type { BitCount, BitSequence } from "./types/branded.js";
import type { Packet } from "./types/packet.js";

// ─── Result ───────────────────────────────────────────────────────

export interface DecodeResult {
  readonly packet: Packet;
  readonly versionSum: number;
  /** Evaluated root, or `null` when the tree does not evaluate. */
  readonly value: bigint | null;
  /** Set whenever `value` is `null`. */
  readonly evaluationError?: EvaluationError;
  /** Bits occupied by the root packet. */
  readonly bitsConsumed: BitCount;
  /** Bits left on the stream after the root packet. */
  readonly trailingBits: BitCount;
}

// ─── Orchestrator ─────────────────────────────────────────────────

export class PacketDecoder extends BitPacketEmitter {
  readonly config: DecoderConfig;
  private readonly parser: PacketParser;
  private readonly logger: Logger;

  constructor(config: DecoderConfigInput = {}, logger?: Logger) {
    super();
    this.config = resolveConfig(config);
    this.logger = logger ?? new Logger(this.config.debug);
    this.parser = new PacketParser({ maxDepth: this.config.maxDepth });

    // Forward parser events to our own listeners and the debug log.
    this.parser.on("PACKET_DECODED", (event) => {
      this.logger.packet(event.packet, event.offset, event.depth);
      this.emit(event);
    });
  }

  /**
   * Decode a hex transmission.
   *
   * @throws {BitstreamError} code=INVALID_HEX_DIGIT or UNEXPECTED_END_OF_STREAM.
   * @throws {PacketError} on framing violations.
   */
  decodeHex(hex: string): DecodeResult {
    return this.decodeBits(hexToBits(hex));
  }

  /**
   * Decode a transmission that is already a bit sequence.
   */
  decodeBits(bits: BitSequence): DecodeResult {
    const cursor = new BitCursor(bits);
    const packet = this.parser.parse(cursor);
    const bitsConsumed = cursor.bitsConsumed();
    const trailingBits = cursor.bitsRemaining();

    if (this.config.strictPadding && trailingBits > 0) {
      const tail = cursor.read(trailingBits);
      if (tail.value !== 0n) {
        throw new PacketError(
          `Non-zero data in ${trailingBits} bits after the root packet`,
          "TRAILING_DATA"
        );
      }
    }

    const versionSum = totalVersion(packet);
    let value: bigint | null = null;
    let evaluationError: EvaluationError | undefined;
    try {
      value = evaluate(packet);
    } catch (err) {
      if (!(err instanceof EvaluationError)) throw err;
      evaluationError = err;
      this.logger.warn("Packet tree does not evaluate", {
        reason: err.message,
      });
    }

    this.emit({
      type: "DECODE_COMPLETE",
      versionSum,
      value,
      bitsConsumed,
      trailingBits,
    });

    return {
      packet,
      versionSum,
      value,
      ...(evaluationError ? { evaluationError } : {}),
      bitsConsumed,
      trailingBits,
    };
  }
}
