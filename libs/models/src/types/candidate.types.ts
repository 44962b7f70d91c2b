/** Flat attribute map as stored by the listing index. */
export type RawCandidateRecord = Record<string, unknown>;

export interface CandidateAttributes {
  id: string;
  assetTypeId: number | null;
  assetTypeName: string | null;
  petFriendly: boolean | null;
  /** null when the source price is 0, absent or not a number */
  sellingPrice: number | null;
  latitude: number | null;
  longitude: number | null;
  locality: string | null;
  road: string | null;
  /** Raw POI distances keyed by catalog key; classified by the data quality assessor */
  poiDistances: Readonly<Record<string, unknown>>;
  /** Names of the nearest POI per catalog key, when the index has them */
  poiNames: Readonly<Record<string, string>>;
}
