/**
 * @module config
 * @description Decoder configuration, validated with zod.
 *
 * Options can be passed directly or read from the environment:
 *
 * | Variable                   | Option          | Default |
 * |----------------------------|-----------------|---------|
 * | `BITPACKET_DEBUG`          | `debug`         | off     |
 * | `BITPACKET_MAX_DEPTH`      | `maxDepth`      | 1024    |
 * | `BITPACKET_STRICT_PADDING` | `strictPadding` | off     |
 */

import { z } from "zod";
import { DEFAULT_MAX_DEPTH } from "./primitives/packet-parser.js";

export class ConfigError extends Error {
  constructor(
    message: string,
    public readonly code: "INVALID_CONFIG"
  ) {
    super(message);
    this.name = "ConfigError";
  }
}

export const DecoderConfigSchema = z.object({
  /** Log every decoded packet to stderr. */
  debug: z.boolean().default(false),
  /** Deepest packet nesting accepted below the root. */
  maxDepth: z.number().int().positive().default(DEFAULT_MAX_DEPTH),
  /** Reject non-zero bits after the root packet. */
  strictPadding: z.boolean().default(false),
});

export type DecoderConfigInput = z.input<typeof DecoderConfigSchema>;
export type DecoderConfig = z.output<typeof DecoderConfigSchema>;

const flag = z
  .enum(["0", "1", "true", "false"])
  .transform((v) => v === "1" || v === "true");

const EnvSchema = z.object({
  BITPACKET_DEBUG: flag.optional(),
  BITPACKET_MAX_DEPTH: z.coerce.number().optional(),
  BITPACKET_STRICT_PADDING: flag.optional(),
});

/**
 * Validate and fill in defaults.
 * @throws {ConfigError} code=INVALID_CONFIG naming every offending field.
 */
export function resolveConfig(input: DecoderConfigInput = {}): DecoderConfig {
  const result = DecoderConfigSchema.safeParse(input);
  if (!result.success) {
    throw new ConfigError(formatIssues(result.error), "INVALID_CONFIG");
  }
  return result.data;
}

/**
 * Build a configuration from environment variables.
 * @throws {ConfigError} code=INVALID_CONFIG on unparseable values.
 */
export function loadConfig(
  env: Record<string, string | undefined> = process.env
): DecoderConfig {
  const result = EnvSchema.safeParse(env);
  if (!result.success) {
    throw new ConfigError(formatIssues(result.error), "INVALID_CONFIG");
  }
  const vars = result.data;
  return resolveConfig({
    debug: vars.BITPACKET_DEBUG,
    maxDepth: vars.BITPACKET_MAX_DEPTH,
    strictPadding: vars.BITPACKET_STRICT_PADDING,
  });
}

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.join(".") || "config"}: ${issue.message}`)
    .join("; ");
}
