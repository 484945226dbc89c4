/**
 * src/market/providers/ai-valuation.ts
 * Appraisal by a search-grounded model.
 *
 * The model reports its own min/avg/max plus the listings it looked at. The
 * reported average wins; listing prices become year-tagged candidates so the
 * resolver can count how many of them are plausible.
 */

import { ProviderUnavailableError } from "../../errors.js";
import { parseFirstJsonObject } from "../../extract/json-block.js";
import { parseAmount } from "../../extract/money.js";
import { extractYear } from "../../extract/result-table.js";
import { describeErrors, validateAiPriceReply } from "../../schema/index.js";
import type { CompletionBackend } from "../../backends/completion.js";
import type { AiPriceReply } from "../../types/replies.js";
import type {
  GroundingCitation,
  MarketListing,
  PriceCandidate,
  PriceObservation,
  PriceQuery,
  ReportedRange,
} from "../../types/valuation.js";
import type { PriceProvider } from "../resolver.js";

export interface AiValuationOptions {
  /** Used when the query names no region. */
  region: string;
  /** A citation is kept only when its URI contains one of these. */
  sourceDomains: string[];
}

export function buildValuationPrompt(query: PriceQuery, region: string): string {
  const vehicle = [query.year, query.make, query.model, query.trim].filter(Boolean).join(" ");
  const mileage = query.mileage ?? 0;

  return `Act as a senior vehicle appraiser specializing exclusively in the Chilean used car market.

TARGET VEHICLE: ${vehicle}
MILEAGE: ${mileage} km
LOCATION: ${region}, Chile
CURRENCY: CLP (Chilean peso)

SEARCH AND ANALYSIS PROTOCOL:
1. Verify prices only on Chilean sites: chileautos.cl, mercadolibre.cl, yapo.cl, autocosmos.cl, kavak.com/cl, macal.cl, autofact.cl.
   Exclude prices in USD, EUR or UF unless converted to CLP. Exclude foreign sites.
2. Factor in the mileage (${mileage} km) and analyze at least 3-5 specific listings.
3. Copy the direct URL of every listing you used into "foundListings".

RETURN JSON ONLY (no markdown):
{
  "minPrice": number (integer, CLP),
  "maxPrice": number (integer, CLP),
  "avgPrice": number (integer, CLP),
  "currency": "CLP",
  "marketAnalysis": "string (2-3 sentences on availability and price range)",
  "confidenceScore": number (0-100),
  "foundListings": [
    { "title": "string (e.g. Chileautos - 2019 Toyota Rav4 - $15.000.000)", "url": "string", "price": "string" }
  ]
}`;
}

export function mergeCitations(
  grounding: GroundingCitation[],
  reply: AiPriceReply,
  sourceDomains: string[],
): GroundingCitation[] {
  const fromListings: GroundingCitation[] = [];
  for (const listing of reply.foundListings ?? []) {
    if (listing.url) fromListings.push({ title: listing.title || "Listado vehículo", uri: listing.url });
  }

  const unique = new Map<string, GroundingCitation>();
  for (const source of [...grounding, ...fromListings]) {
    if (!source.uri || unique.has(source.uri)) continue;
    if (!sourceDomains.some((d) => source.uri.includes(d))) continue;
    unique.set(source.uri, source);
  }
  return [...unique.values()];
}

function listingCandidates(reply: AiPriceReply): PriceCandidate[] {
  const out: PriceCandidate[] = [];
  for (const listing of reply.foundListings ?? []) {
    const amount = parseAmount(listing.price);
    if (amount === undefined) continue;
    const year = extractYear(listing.title ?? "");
    out.push({
      amount,
      year: year ? Number.parseInt(year, 10) : undefined,
      source: listing.url ?? undefined,
    });
  }
  return out;
}

function reportedListings(reply: AiPriceReply): MarketListing[] {
  return (reply.foundListings ?? []).map((listing) => {
    const out: MarketListing = { title: listing.title || "Listado vehículo" };
    if (listing.url) out.url = listing.url;
    const price = parseAmount(listing.price);
    if (price !== undefined) out.price = price;
    return out;
  });
}

function reportedRange(reply: AiPriceReply): ReportedRange | undefined {
  const averagePrice = parseAmount(reply.avgPrice);
  if (averagePrice === undefined) return undefined;
  return {
    averagePrice,
    minPrice: parseAmount(reply.minPrice),
    maxPrice: parseAmount(reply.maxPrice),
  };
}

export class AiValuationProvider implements PriceProvider {
  readonly name = "ai-valuation";
  readonly yearTagged = true;

  constructor(private readonly backend: CompletionBackend, private readonly opts: AiValuationOptions) {}

  async collect(query: PriceQuery, signal: AbortSignal): Promise<PriceObservation> {
    const prompt = buildValuationPrompt(query, query.region || this.opts.region);
    const { text, citations } = await this.backend.complete({ prompt, grounded: true, signal });

    const reply = parseFirstJsonObject(text);
    if (!validateAiPriceReply(reply)) {
      throw new ProviderUnavailableError(`unexpected valuation reply: ${describeErrors(validateAiPriceReply.errors)}`);
    }

    const observation: PriceObservation = {
      candidates: listingCandidates(reply),
      reported: reportedRange(reply),
      sources: mergeCitations(citations, reply, this.opts.sourceDomains),
    };
    const listings = reportedListings(reply);
    if (listings.length) observation.listings = listings;
    if (reply.marketAnalysis) observation.analysis = reply.marketAnalysis;
    if (typeof reply.confidenceScore === "number") observation.confidence = reply.confidenceScore;
    return observation;
  }
}
