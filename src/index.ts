/**
 * @module bitpacket
 * @description Decoder and evaluator for hex-framed, bit-packed
 * expression packets.
 *
 * Exports the packet types, the cursor/parser contracts and their error
 * classes, the primitives (cursor, parser, evaluator, version sum), the
 * hex codec and packet encoder, configuration, and the PacketDecoder
 * orchestrator.
 *
 * @version 0.1.0
 * @license MIT
 */

// ─── Types ──────────────────────────────────────────────────────────
export * from "./types/index.js";

// ─── Interfaces ─────────────────────────────────────────────────────
export * from "./interfaces/index.js";

// ─── Primitives ─────────────────────────────────────────────────────
export * from "./primitives/index.js";

// ─── Codec ──────────────────────────────────────────────────────────
export * from "./codec/index.js";

// ─── Configuration & Logging ────────────────────────────────────────
export { ConfigError, DecoderConfigSchema, resolveConfig, loadConfig } from "./config.js";
export type { DecoderConfig, DecoderConfigInput } from "./config.js";
export { Logger, LogLevel } from "./observability/logger.js";
export type { LogSink } from "./observability/logger.js";

// ─── Orchestrator ───────────────────────────────────────────────────
export { PacketDecoder } from "./decoder.js";
export type { DecodeResult } from "./decoder.js";
