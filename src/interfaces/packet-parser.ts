/**
 * @module interfaces/packet-parser
 * @description IPacketParser — recursive-descent decoding of one packet.
 *
 * A parse consumes exactly the bits that belong to the root packet and
 * its descendants: no over-read, no under-read. Anything after the root
 * is left on the cursor for the caller to inspect.
 */

import type { IBitCursor } from "./bit-cursor.js";
import type { IBitPacketEmitter } from "./event-emitter.js";
import type { Packet } from "../types/packet.js";

/**
 * Errors that may be thrown for structurally invalid packets.
 */
export class PacketError extends Error {
  constructor(
    message: string,
    public readonly code:
      | "FRAMING_MISMATCH"
      | "MAX_DEPTH_EXCEEDED"
      | "TRAILING_DATA"
      | "FIELD_OVERFLOW"
  ) {
    super(message);
    this.name = "PacketError";
  }
}

export interface PacketParserOptions {
  /**
   * Deepest nesting accepted below the root. Default: 1024.
   *
   * The format itself has no depth bound; this caps recursion so a
   * degenerate chain fails with MAX_DEPTH_EXCEEDED instead of overflowing
   * the call stack. Raise it for inputs known to nest deeper.
   */
  maxDepth?: number;
}

/**
 * @interface IPacketParser
 * @description Emits PACKET_DECODED for every packet it completes,
 * children before their parent.
 */
export interface IPacketParser extends IBitPacketEmitter {
  /**
   * @command
   * @description Parses one packet (with all descendants) from the cursor.
   *
   * @returns A frozen Packet tree.
   * @throws {BitstreamError} code=UNEXPECTED_END_OF_STREAM if the stream ends mid-packet.
   * @throws {PacketError} code=FRAMING_MISMATCH if children overrun a declared bit total.
   * @throws {PacketError} code=MAX_DEPTH_EXCEEDED if nesting passes `maxDepth`.
   */
  parse(cursor: IBitCursor): Packet;
}
