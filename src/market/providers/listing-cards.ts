import { extractYear } from "../../extract/result-table.js";
import type { PageFetcher } from "../../backends/page-fetcher.js";
import type { PriceCandidate, PriceObservation, PriceQuery } from "../../types/valuation.js";
import { loadSpaced } from "../page-text.js";
import type { PriceProvider } from "../resolver.js";
import type { PriceSite } from "../sites.js";

const CARD_CLASS = /card|listing|item/i;
const MIN_PRICE_DIGITS = 7;

/**
 * Search result pages that show one card per listing. Each card with a model
 * year and a price of at least seven digits becomes a year-tagged candidate.
 */
export class ListingCardsProvider implements PriceProvider {
  readonly name: string;
  readonly yearTagged = true;

  constructor(private readonly fetcher: PageFetcher, private readonly site: PriceSite) {
    this.name = site.name;
  }

  async collect(query: PriceQuery, signal: AbortSignal): Promise<PriceObservation> {
    const url = this.site.buildUrl(query);
    if (!url) return { candidates: [] };

    const html = await this.fetcher.fetchPage(url, signal);
    return { candidates: parseListingCards(html, url) };
  }
}

export function parseListingCards(html: string, source?: string): PriceCandidate[] {
  const $ = loadSpaced(html);
  const out: PriceCandidate[] = [];

  $("article, div, li").each((_, el) => {
    if (!CARD_CLASS.test($(el).attr("class") ?? "")) return;
    const text = $(el).text().replace(/\s+/g, " ");

    const year = extractYear(text);
    const price = text.match(/\$\s*[\d.,]+/)?.[0].replace(/\D/g, "") ?? "";
    if (!year || price.length < MIN_PRICE_DIGITS) return;

    out.push({ amount: Number.parseInt(price, 10), year: Number.parseInt(year, 10), source });
  });
  return out;
}
