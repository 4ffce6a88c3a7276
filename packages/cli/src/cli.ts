#!/usr/bin/env node
/**
 * blocking: compile a command document to a keyframe document.
 *
 * Usage:
 *   blocking scene.json                      write out/<name>.keyframes.json
 *   blocking --out build/keys scene.json     choose the output directory
 *   blocking --verbose scene.json            log every pass
 */

import { createConsoleLogger } from "@blocking/core";
import { parseConfig } from "./config/config.js";
import { run } from "./run.js";

/** Entry point for the blocking CLI. */
async function main(): Promise<void> {
  const config = parseConfig(process.argv);
  const logger = createConsoleLogger("blocking", { verbose: config.verbose });
  process.exitCode = await run(config, {
    logger,
    print: (line) => console.log(line),
  });
}

main().catch((err: unknown) => {
  console.error("[blocking] Fatal:", err instanceof Error ? err.message : err);
  process.exitCode = 1;
});
