/**
 * @module types/events
 * @description Event catalog for the decoder.
 *
 * The parser and the decoder emit typed events so that logging and
 * inspection stay out of the parsing loop.
 */

import type { BitCount } from "./branded.js";
import type { Packet } from "./packet.js";

// ─── Parser Events ──────────────────────────────────────────────────

/** Emitted when a packet and all of its descendants have been parsed. */
export interface PacketDecodedEvent {
  readonly type: "PACKET_DECODED";
  readonly packet: Packet;
  /** Cursor offset at which the packet header started. */
  readonly offset: BitCount;
  /** Nesting depth; the root is 0. */
  readonly depth: number;
}

// ─── Decoder Events ─────────────────────────────────────────────────

/** Emitted once a root packet has been parsed and summarised. */
export interface DecodeCompleteEvent {
  readonly type: "DECODE_COMPLETE";
  readonly versionSum: number;
  /** `null` when the tree does not evaluate. */
  readonly value: bigint | null;
  readonly bitsConsumed: BitCount;
  readonly trailingBits: BitCount;
}

// ─── Event Map ──────────────────────────────────────────────────────

export interface BitPacketEventMap {
  PACKET_DECODED: PacketDecodedEvent;
  DECODE_COMPLETE: DecodeCompleteEvent;
}

export type BitPacketEventType = keyof BitPacketEventMap;

export type BitPacketEvent = BitPacketEventMap[BitPacketEventType];
