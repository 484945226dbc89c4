/**
 * src/schema/index.ts
 * AJV (2020-12) validators for configuration and for model replies.
 */

import Ajv2020Module from "ajv/dist/2020.js";
import addFormatsModule from "ajv-formats";
import type { ErrorObject, Options } from "ajv";
import configSchema from "./config.schema.json" with { type: "json" };
import aiPlateReplySchema from "./aiPlateReply.schema.json" with { type: "json" };
import aiPriceReplySchema from "./aiPriceReply.schema.json" with { type: "json" };
import searchMetadataSchema from "./searchMetadata.schema.json" with { type: "json" };
import plateIndexFileSchema from "./plateIndexFile.schema.json" with { type: "json" };
import type { AppConfig } from "../config.js";
import type { PlateIndexFile } from "../plate/plate-index.js";
import type { AiPlateReply, AiPriceReply, SearchMetadata } from "../types/replies.js";

function createAjv(opts: Options = {}) {
  const ajv = new Ajv2020Module.default({ allErrors: true, strict: "log", allowUnionTypes: true, ...opts });
  addFormatsModule.default(ajv);
  return ajv;
}

export const ajv = createAjv();

// Fills defaults and turns env strings into numbers while validating.
const configAjv = createAjv({ useDefaults: true, coerceTypes: true });

export const validateConfig = configAjv.compile<AppConfig>(configSchema);
export const validateAiPlateReply = ajv.compile<AiPlateReply>(aiPlateReplySchema);
export const validateAiPriceReply = ajv.compile<AiPriceReply>(aiPriceReplySchema);
export const validateSearchMetadata = ajv.compile<SearchMetadata>(searchMetadataSchema);
export const validatePlateIndexFile = ajv.compile<PlateIndexFile>(plateIndexFileSchema);

export function describeErrors(errors: ErrorObject[] | null | undefined): string {
  if (!errors?.length) return "unknown validation error";
  return errors.map((e) => `${e.instancePath || "/"} ${e.message ?? "is invalid"}`).join("; ");
}
