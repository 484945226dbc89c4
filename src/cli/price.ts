#!/usr/bin/env node
/**
 * src/cli/price.ts
 * Apply the offer formula to a market price, no lookups.
 *
 * Usage:
 *   tsx src/cli/price.ts 9066666
 */

import "dotenv/config";
import { Command } from "commander";
import { loadConfig } from "../config.js";
import { parseAmount } from "../extract/money.js";
import { formatClp } from "../pricing/format.js";
import { computeOffer } from "../pricing/formula.js";

const program = new Command();
program.argument("<marketPrice>", 'market price in CLP, e.g. 9066666 or "$9.066.666"');
program.parse(process.argv);
const [raw = ""] = program.args;

const result = computeOffer(parseAmount(raw), loadConfig().pricing);
if (!result.success) {
  console.error(`[price] ${result.error}: ${raw}`);
  process.exit(2);
}

const { offer, details } = result;
console.log(`Market price            ${formatClp(offer.marketPrice)}`);
console.log(`Immediate offer         ${formatClp(offer.immediateOffer)} (x${details.purchaseMultiplier})`);
console.log(`Consignment liquidation ${formatClp(offer.consignmentLiquidation)} (${offer.consignmentTier})`);
