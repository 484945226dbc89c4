export type ConsignmentTier = "PERCENTAGE_BASED" | "FIXED_FEE";

export type ErrorCode =
  | "not_found"
  | "provider_unavailable"
  | "invalid_input"
  | "quota_exceeded"
  | "infrastructure_degraded"
  | "cancelled";

export interface ProviderFailure {
  source: string;
  code: ErrorCode;
  reason: string;
}

/** Vehicle fields any plate provider may fill in. */
export interface VehicleFields {
  make?: string;
  model?: string;
  year?: string;      // 4 digits
  ownerName?: string;
  ownerId?: string;   // national id (RUT) when the source exposes it
}

export interface VehicleRecord extends VehicleFields {
  plate: string;
  found: boolean;
  sourceName?: string;
  errorReason?: string;
  errorCode?: ErrorCode;
  failures?: ProviderFailure[];
}

export interface PriceCandidate {
  amount: number;
  year?: number;
  source?: string;
}

export interface GroundingCitation {
  title: string;
  uri: string;
}

/** A range a provider reports on its own (AI appraisals), as opposed to raw listings. */
export interface ReportedRange {
  averagePrice: number;
  minPrice?: number;
  maxPrice?: number;
}

/** A listing an appraiser reports having looked at. */
export interface MarketListing {
  title: string;
  url?: string;
  price?: number;
}

export interface PriceObservation {
  candidates: PriceCandidate[];
  reported?: ReportedRange;
  sources?: GroundingCitation[];
  listings?: MarketListing[];
  analysis?: string;
  confidence?: number;
}

export interface PriceQuery {
  make: string;
  model: string;
  year: string;
  trim?: string;
  mileage?: number;
  region?: string;
}

export interface PriceEstimate {
  averagePrice: number;
  minPrice: number;
  maxPrice: number;
  numListings: number;
  sourceName: string;
  estimated: boolean;
  sources?: GroundingCitation[];
  listings?: MarketListing[];
  analysis?: string;
  confidence?: number;
}

export interface Offer {
  marketPrice: number;
  immediateOffer: number | null;
  consignmentLiquidation: number | null;
  consignmentTier: ConsignmentTier;
}

export interface PriceBand {
  min: number;
  max: number;
}
