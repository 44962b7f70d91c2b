export interface PriceRange {
  min: number | null;
  max: number | null;
}

/**
 * Structured preferences extracted from a free-form query.
 * POI keys absent from the catalog are tolerated and ignored by scoring.
 */
export interface Intent {
  assetTypes: string[];
  mustHave: string[];
  niceToHave: string[];
  avoidPoi: string[];
  /** true: wants pets allowed, false: prefers no pets around, null: unspecified */
  petFriendly: boolean | null;
  priceRange: PriceRange;
}
