/** Shapes of the JSON objects search-grounded models are asked to return. */

export interface AiPlateReply {
  found: boolean;
  make?: string | null;
  model?: string | null;
  year?: string | number | null;
  reason?: string | null;
}

export type ReplyAmount = number | string | null;

export interface AiListing {
  title?: string | null;
  url?: string | null;
  price?: ReplyAmount;
}

export interface AiPriceReply {
  minPrice?: ReplyAmount;
  maxPrice?: ReplyAmount;
  avgPrice?: ReplyAmount;
  currency?: string | null;
  marketAnalysis?: string | null;
  confidenceScore?: number | null;
  foundListings?: AiListing[];
}

export interface SearchMetadata {
  citations?: string[];
  search_results?: Array<{ title?: string | null; url: string }>;
}
