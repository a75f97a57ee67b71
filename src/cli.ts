/**
 * Command-line front end: decode the hex transmission in a file and print
 * its version sum and evaluated value, one per line.
 */

import { readFile } from "node:fs/promises";
import { PacketDecoder } from "./decoder.js";
import { loadConfig } from "./config.js";
import { Logger } from "./observability/logger.js";

export const USAGE = "Usage: bitpacket <file>";

export interface CliIO {
  readFile(path: string): Promise<string>;
  stdout(line: string): void;
  stderr(line: string): void;
  env: Record<string, string | undefined>;
}

const processIO: CliIO = {
  readFile: (path) => readFile(path, "utf8"),
  stdout: (line) => console.log(line),
  stderr: (line) => console.error(line),
  env: process.env,
};

/**
 * Run the CLI. Resolves to the process exit code:
 * 0 on success, 1 on a decode failure, 2 on bad usage.
 */
export async function run(argv: readonly string[], io: CliIO = processIO): Promise<number> {
  const [path] = argv;
  if (path === undefined) {
    io.stderr(USAGE);
    return 2;
  }

  try {
    const config = loadConfig(io.env);
    const decoder = new PacketDecoder(config, new Logger(config.debug, io.stderr));
    const text = await io.readFile(path);
    const result = decoder.decodeHex(text.trimEnd());

    io.stdout(String(result.versionSum));
    if (result.evaluationError) {
      io.stderr(`Error: ${result.evaluationError.message}`);
      return 1;
    }
    io.stdout(String(result.value));
    return 0;
  } catch (err) {
    io.stderr(`Error: ${err instanceof Error ? err.message : String(err)}`);
    return 1;
  }
}
