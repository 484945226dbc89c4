/**
 * src/market/sites.ts
 * URL builders for listing and valuation pages.
 */

import { normalizeModel, slugMake } from "../extract/model-name.js";
import type { PriceQuery } from "../types/valuation.js";

export interface PriceSite {
  name: string;
  /** undefined when this site has nothing distinct to ask for the query. */
  buildUrl(query: PriceQuery): string | undefined;
}

const modelToken = (q: PriceQuery) => normalizeModel(q.model);
const modelWord = (q: PriceQuery) => normalizeModel(q.model, { maxWords: 1 });

export const PRICE_SITES = {
  autofact: {
    name: "autofact",
    buildUrl: (q) => `https://www.autofact.cl/valor-comercial-autos/${slugMake(q.make)}/${modelToken(q)}/${q.year}`,
  },
  // Retry with the bare model word ("grand_cherokee" -> "grand"), unless that is what was already asked.
  "autofact-simple": {
    name: "autofact-simple",
    buildUrl: (q) => {
      const word = modelWord(q);
      if (!word || word === modelToken(q)) return undefined;
      return `https://www.autofact.cl/valor-comercial-autos/${slugMake(q.make)}/${word}/${q.year}`;
    },
  },
  chileautos: {
    name: "chileautos",
    buildUrl: (q) =>
      `https://www.chileautos.cl/vehiculos/autos-veh%C3%ADculo/${slugMake(q.make)}/${modelWord(q)}/${q.year}-ano/`,
  },
  mercadolibre: {
    name: "mercadolibre",
    buildUrl: (q) =>
      `https://vehiculos.mercadolibre.cl/${slugMake(q.make)}-${modelToken(q).replace(/_/g, "-")}-${q.year}_NoIndex_True`,
  },
} satisfies Record<string, PriceSite>;
