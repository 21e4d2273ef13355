#!/usr/bin/env node
/**
 * graphform — CLI entry point
 */

import { runCli } from "./program.js";

const controller = new AbortController();

for (const signal of ["SIGINT", "SIGTERM"] as const) {
  process.on(signal, () => {
    if (controller.signal.aborted) process.exit(130);
    process.stderr.write("Cancelling: no new actions will start, waiting for in-flight actions...\n");
    controller.abort();
  });
}

process.exitCode = await runCli(process.argv.slice(2), { signal: controller.signal });
