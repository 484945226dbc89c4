/**
 * src/plate/providers/ai-search.ts
 * Ask a search-grounded model what vehicle a plate is registered to.
 */

import { NotFoundError, ProviderUnavailableError } from "../../errors.js";
import { parseFirstJsonObject } from "../../extract/json-block.js";
import { extractYear } from "../../extract/result-table.js";
import { describeErrors, validateAiPlateReply } from "../../schema/index.js";
import type { CompletionBackend } from "../../backends/completion.js";
import type { VehicleRecord } from "../../types/valuation.js";
import type { PlateProvider } from "../resolver.js";

export function buildPlatePrompt(plate: string): string {
  return [
    `Find the vehicle registered in Chile under the license plate (patente) ${plate}.`,
    "Search public Chilean vehicle lookup sites and registry listings.",
    "Report only the make, model and manufacturing year. Do not guess: if no source shows this plate, say so.",
    "",
    "Respond with JSON only:",
    "{",
    '  "found": true | false,',
    '  "make": "<make, e.g. TOYOTA>",',
    '  "model": "<model, e.g. YARIS>",',
    '  "year": "<4-digit year>",',
    '  "reason": "<why not found, when found is false>"',
    "}",
  ].join("\n");
}

export class AiSearchPlateProvider implements PlateProvider {
  readonly name = "ai-search";

  constructor(private readonly backend: CompletionBackend) {}

  async lookup(plate: string, signal: AbortSignal): Promise<VehicleRecord> {
    const { text } = await this.backend.complete({ prompt: buildPlatePrompt(plate), grounded: true, signal });

    const reply = parseFirstJsonObject(text);
    if (!validateAiPlateReply(reply)) {
      throw new ProviderUnavailableError(`unexpected plate reply: ${describeErrors(validateAiPlateReply.errors)}`);
    }
    if (!reply.found) {
      throw new NotFoundError(reply.reason || `No source lists plate ${plate}`);
    }

    const make = reply.make?.trim();
    const model = reply.model?.trim();
    if (!make && !model) throw new ProviderUnavailableError("reply marked found without make or model");

    const record: VehicleRecord = { plate, found: true };
    if (make) record.make = make;
    if (model) record.model = model;
    const year = reply.year == null ? undefined : extractYear(String(reply.year));
    if (year) record.year = year;
    return record;
  }
}
