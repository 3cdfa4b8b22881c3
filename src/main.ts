#!/usr/bin/env node

import { logger, formatErr } from "./util/logger.js";
import { parseArgs } from "./util/argParser.js";
import { CanonRunner } from "./runner.js";
import { ExitCodes } from "./util/constants.js";

async function main() {
  const { parsed } = parseArgs();
  const runner = new CanonRunner(parsed);
  process.exitCode = await runner.run();
}

main().catch((e) => {
  logger.fatal("Unexpected error", formatErr(e), "general", ExitCodes.Fatal);
});
