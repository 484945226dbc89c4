#!/usr/bin/env node
/**
 * src/cli/build-index.ts
 * Registry CSV exports -> plate index JSON (the file PLATE_INDEX_FILE points at).
 *
 * Usage:
 *   tsx src/cli/build-index.ts --out data/vehicles.index.json exports/*.csv
 *
 * Exports may be given in any order; the month tag in each file name decides
 * which one wins for a plate seen twice.
 */

import fs from "node:fs/promises";
import path from "node:path";
import { Command } from "commander";
import { buildPlateIndex } from "../plate/index-builder.js";

const program = new Command();
program
  .argument("<files...>", "registry CSV exports (semicolon separated)")
  .requiredOption("-o, --out <file>", "output index JSON");

program.parse(process.argv);
const opts = program.opts<{ out: string }>();
const files = program.args.map((f) => path.resolve(f));

async function main() {
  const { index, stats } = await buildPlateIndex(files);
  const out = path.resolve(opts.out);
  await fs.mkdir(path.dirname(out), { recursive: true });
  await fs.writeFile(out, JSON.stringify(index), "utf8");
  console.log(JSON.stringify({ out, ...stats }, null, 2));
}

main().catch((e: unknown) => {
  console.error("[build-index]", e);
  process.exit(1);
});
