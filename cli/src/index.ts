#!/usr/bin/env node
import { buildProgram } from "./program.js";
import { loadDotEnvFromCwd } from "./lib/env.js";
import { logger } from "./lib/logger.js";

async function main() {
  await loadDotEnvFromCwd();
  await buildProgram().parseAsync(process.argv);
}

main().catch((e: unknown) => {
  logger.error("docmeta failed", e);
  process.exit(1);
});
