export type PoiDataStatus = 'present' | 'missing' | 'unusable';

export interface DataQualityReport {
  assetId: string;
  /** Checked keys with a verified distance */
  availablePoiKeys: string[];
  /** Checked keys without one; disjoint from availablePoiKeys */
  missingPoiKeys: string[];
  /** Missing keys whose raw value was present but malformed */
  unusablePoiKeys: string[];
  hasValidPrice: boolean;
  hasValidAssetType: boolean;
  hasValidLocation: boolean;
  /** 0-1 */
  qualityScore: number;
  warnings: string[];
}
