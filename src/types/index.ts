/**
 * @module types
 * @description Public type exports for the packet decoder.
 */

export * from "./branded.js";
export * from "./packet.js";
export * from "./events.js";
