#!/usr/bin/env node
/**
 * src/cli/lookup.ts
 * Resolve a plate through the configured providers and print the record.
 *
 * Usage:
 *   tsx src/cli/lookup.ts ABCD12
 *
 * Exit code:
 *   0 = found
 *   3 = not found / every provider failed
 *   2 = invalid plate
 */

import "dotenv/config";
import { Command } from "commander";
import { loadConfig } from "../config.js";
import { createEngine } from "../engine/factory.js";

const program = new Command();
program.argument("<plate>", "license plate, any formatting");
program.parse(process.argv);
const [plate = ""] = program.args;

async function main() {
  const engine = await createEngine(loadConfig());
  try {
    const record = await engine.resolvePlate(plate);
    console.log(JSON.stringify(record, null, 2));
    process.exitCode = record.found ? 0 : record.errorCode === "invalid_input" ? 2 : 3;
  } finally {
    await engine.close();
  }
}

main().catch((e: unknown) => {
  console.error("[lookup]", e);
  process.exit(1);
});
