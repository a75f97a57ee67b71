/**
 * @module interfaces
 * @description Public interface exports for the packet decoder.
 */

export * from "./event-emitter.js";
export * from "./bit-cursor.js";
export * from "./packet-parser.js";
export * from "./evaluator.js";
