import { DEFAULT_PRICE_BAND, extractAmounts } from "../../extract/money.js";
import type { PageFetcher } from "../../backends/page-fetcher.js";
import type { PriceBand, PriceObservation, PriceQuery } from "../../types/valuation.js";
import { pageText } from "../page-text.js";
import type { PriceProvider } from "../resolver.js";
import type { PriceSite } from "../sites.js";

/** Every "$x.xxx.xxx" amount on a valuation or search page. Amounts carry no year. */
export class PagePriceProvider implements PriceProvider {
  readonly name: string;
  readonly yearTagged = false;

  constructor(
    private readonly fetcher: PageFetcher,
    private readonly site: PriceSite,
    private readonly band: PriceBand = DEFAULT_PRICE_BAND,
  ) {
    this.name = site.name;
  }

  async collect(query: PriceQuery, signal: AbortSignal): Promise<PriceObservation> {
    const url = this.site.buildUrl(query);
    if (!url) return { candidates: [] };

    const html = await this.fetcher.fetchPage(url, signal);
    const amounts = extractAmounts(pageText(html), { band: this.band });
    return { candidates: amounts.map((amount) => ({ amount, source: url })) };
  }
}
