/**
 * Levelled logging for the decoder.
 *
 * Everything goes to stderr: stdout carries only decoded results.
 */

import type { Packet } from "../types/packet.js";

export enum LogLevel {
  DEBUG = "DEBUG",
  INFO = "INFO",
  WARN = "WARN",
  ERROR = "ERROR",
}

export type LogSink = (line: string) => void;

export class Logger {
  constructor(
    private readonly debugEnabled: boolean,
    private readonly sink: LogSink = (line) => console.error(line)
  ) {}

  private timestamp(): string {
    return new Date().toISOString();
  }

  private format(level: LogLevel, message: string, meta?: unknown): string {
    const metaStr =
      meta === undefined
        ? ""
        : ` ${JSON.stringify(meta, (_key, value: unknown) =>
            typeof value === "bigint" ? value.toString() : value
          )}`;
    return `[${this.timestamp()}] [${level}] ${message}${metaStr}`;
  }

  debug(message: string, meta?: unknown): void {
    if (this.debugEnabled) {
      this.sink(this.format(LogLevel.DEBUG, message, meta));
    }
  }

  info(message: string, meta?: unknown): void {
    this.sink(this.format(LogLevel.INFO, message, meta));
  }

  warn(message: string, meta?: unknown): void {
    this.sink(this.format(LogLevel.WARN, message, meta));
  }

  error(message: string, meta?: unknown): void {
    this.sink(this.format(LogLevel.ERROR, message, meta));
  }

  /**
   * Log one decoded packet (debug only)
   */
  packet(packet: Packet, offset: number, depth: number): void {
    if (!this.debugEnabled) return;

    this.debug(`${"  ".repeat(depth)}${packet.kind} @${offset}`, {
      version: packet.version,
      bits: packet.bitLength,
      ...(packet.kind === "LITERAL"
        ? { value: packet.value }
        : { framing: packet.lengthType, children: packet.children.length }),
    });
  }
}
