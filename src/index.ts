export { loadConfig, timeoutFor, PLATE_PROVIDER_NAMES, PRICE_PROVIDER_NAMES } from "./config.js";
export type { AppConfig, PlateProviderName, PriceProviderName } from "./config.js";
export * from "./errors.js";
export type * from "./types/valuation.js";

export { ValuationEngine } from "./engine/valuation-engine.js";
export type { ValuationEngineDeps, ValuationOutcome, ValuationRequest } from "./engine/valuation-engine.js";
export { createEngine } from "./engine/factory.js";
export type { Backends, EngineOverrides } from "./engine/factory.js";

export { PlateResolver } from "./plate/resolver.js";
export type { PlateProvider, PlateResolverOptions } from "./plate/resolver.js";
export { isValidPlate, normalizePlate } from "./plate/plate.js";
export { InMemoryPlateIndex, SupabasePlateIndex } from "./plate/plate-index.js";
export type { PlateIndex, PlateIndexEntry, PlateIndexFile } from "./plate/plate-index.js";
export { buildPlateIndex } from "./plate/index-builder.js";

export { MarketPriceResolver } from "./market/resolver.js";
export type { MarketPriceResolverOptions, PriceProvider } from "./market/resolver.js";
export { depreciatedPrice, depreciationEstimate, DEFAULT_DEPRECIATION } from "./market/depreciation.js";

export {
  computeOffer,
  consignmentLiquidation,
  consignmentTier,
  immediateOffer,
  DEFAULT_PRICING_RULES,
} from "./pricing/formula.js";
export type { PricingDetails, PricingResult, PricingRules } from "./pricing/formula.js";
export { formatClp } from "./pricing/format.js";

export { QuotaGate } from "./quota/gate.js";
export type { QuotaAdmission } from "./quota/gate.js";
export { MemoryCounterStore, SupabaseCounterStore } from "./quota/stores.js";
export type { CounterStore } from "./quota/stores.js";

export { extractAmounts, parseAmount } from "./extract/money.js";
export { normalizeModel } from "./extract/model-name.js";

export type { CompletionBackend, CompletionRequest, CompletionResult } from "./backends/completion.js";
export type { PageFetcher } from "./backends/page-fetcher.js";
export type { BrowserSession, FormSubmission } from "./backends/browser.js";
