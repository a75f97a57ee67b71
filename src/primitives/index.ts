/**
 * @module primitives
 * @description The cursor, the parser and the two tree traversals,
 * plus the base event emitter.
 */

export { BitPacketEmitter } from "./base-emitter.js";
export { BitCursor } from "./bit-cursor.js";
export { PacketParser, DEFAULT_MAX_DEPTH } from "./packet-parser.js";
export { evaluate } from "./expression-evaluator.js";
export { totalVersion } from "./version-accumulator.js";
