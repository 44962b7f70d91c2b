import { ProximityCurve } from '../enums';

export interface PoiDefinition {
  readonly radius: number;
  readonly weight: number;
  readonly curve: ProximityCurve;
  readonly category: string;
  readonly displayName: string;
  readonly isRapidTransit: boolean;
}

export type PoiCatalog = Readonly<Record<string, PoiDefinition>>;

export interface AssetTypeConfig {
  /** Intent label -> accepted asset type IDs */
  readonly labels: Readonly<Record<string, readonly number[]>>;
  readonly condoAssetTypeIds: readonly number[];
  readonly petFriendlyAssetTypeIds: readonly number[];
}

export interface ScoringWeights {
  readonly assetTypeMatch: number;
  readonly assetTypeMismatch: number;
  readonly transportMismatch: number;
  readonly mustHavePoiBase: number;
  readonly mustHavePoiTooFar: number;
  readonly niceToHavePoi: number;
  readonly petFriendlyExplicit: number;
  readonly petFriendlyInferred: number;
  readonly petNotAllowed: number;
  readonly petStatusUnknown: number;
  readonly petFriendlyUnwanted: number;
  readonly nearVetBonus: number;
  readonly priceInRange: number;
  readonly priceOutOfRange: number;
  readonly avoidPoiSuccess: number;
  readonly avoidPoiFailure: number;
  readonly locationVeryClose: number;
  readonly locationClose: number;
  readonly locationFar: number;
  readonly avoidLocationHitHard: number;
  readonly avoidLocationHitSoft: number;
  readonly avoidLocationSuccess: number;
}

export const HARD_CONSTRAINTS = [
  'wrongAssetType',
  'wrongTransportType',
  'mustHavePoiTooFar',
  'avoidPoiTooClose',
  'targetLocationTooFar',
] as const;

export type HardConstraint = (typeof HARD_CONSTRAINTS)[number];

export type HardConstraintConfig = Readonly<Record<HardConstraint, boolean>>;

export interface TargetLocationConfig {
  readonly radiusVeryClose: number;
  readonly radiusClose: number;
  readonly radiusFarLimit: number;
}

export interface AvoidLocationConfig {
  readonly radiusHitHard: number;
  readonly radiusHitSoft: number;
}

export interface PoiRulesConfig {
  /** Share of the catalog radius under which an avoided POI is "too close" */
  readonly avoidRadiusRatio: number;
  readonly minProximityFactor: number;
  readonly legacyRailKey: string;
  /** Legacy rail counts as "nearby" under this distance, independent of its catalog radius */
  readonly legacyRailRadius: number;
  readonly veterinaryKey: string;
}

export interface DataQualityConfig {
  readonly missingDataSentinels: readonly number[];
  /** Any distance at or above this is treated as a sentinel */
  readonly sentinelFloor: number;
}

export interface RankingWeights {
  readonly structured: number;
  readonly semantic: number;
  readonly lifestyle: number;
}

export interface RankingConfig {
  readonly candidatePoolSize: number;
  readonly topN: number;
  readonly minFinalScore: number;
  readonly weights: RankingWeights;
}

export interface SearchConfig {
  readonly poiCatalog: PoiCatalog;
  readonly assetTypes: AssetTypeConfig;
  readonly weights: ScoringWeights;
  readonly hardConstraints: HardConstraintConfig;
  readonly targetLocation: TargetLocationConfig;
  readonly avoidLocation: AvoidLocationConfig;
  readonly poiRules: PoiRulesConfig;
  readonly dataQuality: DataQualityConfig;
  readonly ranking: RankingConfig;
}

export function isHardConstraint(value: string): value is HardConstraint {
  return HARD_CONSTRAINTS.some((name) => name === value);
}
