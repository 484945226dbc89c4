#!/usr/bin/env node
/**
 * src/cli/valuate.ts
 * Market estimate and offer for a vehicle.
 *
 * Usage:
 *   tsx src/cli/valuate.ts --make Toyota --model "Yaris Sport" --year 2019 [--mileage 45000]
 *   tsx src/cli/valuate.ts --plate ABCD12
 */

import "dotenv/config";
import { Command } from "commander";
import { loadConfig } from "../config.js";
import { createEngine } from "../engine/factory.js";
import { formatClp } from "../pricing/format.js";

const program = new Command();
program
  .option("--make <make>")
  .option("--model <model>")
  .option("--year <year>")
  .option("--trim <trim>")
  .option("--mileage <km>")
  .option("--region <region>")
  .option("--plate <plate>", "fill in make/model/year from a plate lookup")
  .option("--json", "print the raw outcome", false);

program.parse(process.argv);
const opts = program.opts<{
  make?: string;
  model?: string;
  year?: string;
  trim?: string;
  mileage?: string;
  region?: string;
  plate?: string;
  json: boolean;
}>();

async function main() {
  const engine = await createEngine(loadConfig());
  try {
    const { json, ...request } = opts;
    const outcome = await engine.resolveValuation(request);
    if (json || !outcome.success) {
      console.log(JSON.stringify(outcome, null, 2));
      process.exitCode = outcome.success ? 0 : 3;
      return;
    }

    const { vehicle, estimate, offer } = outcome;
    console.log(`${vehicle.make} ${vehicle.model} ${vehicle.year}`);
    console.log(`  source            ${estimate.sourceName}${estimate.estimated ? " (estimated)" : ""}`);
    console.log(`  market price      ${formatClp(estimate.averagePrice)}`);
    console.log(`  range             ${formatClp(estimate.minPrice)} - ${formatClp(estimate.maxPrice)}`);
    console.log(`  listings          ${estimate.numListings}`);
    console.log(`  immediate offer   ${formatClp(offer.immediateOffer)}`);
    console.log(`  consignment       ${formatClp(offer.consignmentLiquidation)} (${offer.consignmentTier})`);
  } finally {
    await engine.close();
  }
}

main().catch((e: unknown) => {
  console.error("[valuate]", e);
  process.exit(1);
});
