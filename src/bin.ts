#!/usr/bin/env node
/**
 * bitpacket CLI entry point
 */

import { run } from "./cli.js";

run(process.argv.slice(2))
  .then((code) => {
    process.exitCode = code;
  })
  .catch((err: unknown) => {
    console.error("Fatal:", err);
    process.exit(1);
  });
