import {
  AvoidLocationConfig,
  DataQualityConfig,
  HardConstraintConfig,
  PoiRulesConfig,
  RankingConfig,
  ScoringWeights,
  TargetLocationConfig,
} from './search-config.types';

// Positive values reward, negative ones penalize; all are additive.
export const DEFAULT_SCORING_WEIGHTS: ScoringWeights = {
  assetTypeMatch: 2.0,
  assetTypeMismatch: -10.0,   // only when wrongAssetType is soft
  transportMismatch: -20.0,   // only when wrongTransportType is soft
  mustHavePoiBase: 1.5,       // multiplied by proximity factor
  mustHavePoiTooFar: -15.0,   // only when mustHavePoiTooFar is soft
  niceToHavePoi: 0.25,
  petFriendlyExplicit: 1.5,
  petFriendlyInferred: 0.5,   // detached / semi-detached / townhome
  petNotAllowed: -8.0,
  petStatusUnknown: -2.0,
  petFriendlyUnwanted: -2.0,  // noise proxy when the user does not want pets around
  nearVetBonus: 0.25,
  priceInRange: 0.5,
  priceOutOfRange: -3.0,
  avoidPoiSuccess: 0.3,
  avoidPoiFailure: -5.0,      // only when avoidPoiTooClose is soft
  locationVeryClose: 3.0,
  locationClose: 1.5,
  locationFar: -2.0,          // only when targetLocationTooFar is soft
  avoidLocationHitHard: -5.0,
  avoidLocationHitSoft: -2.0,
  avoidLocationSuccess: 0.5,
};

export const DEFAULT_HARD_CONSTRAINTS: HardConstraintConfig = {
  wrongAssetType: true,
  wrongTransportType: true,
  mustHavePoiTooFar: true,
  avoidPoiTooClose: true,
  targetLocationTooFar: true,
};

// Meters
export const DEFAULT_TARGET_LOCATION: TargetLocationConfig = {
  radiusVeryClose: 2000,
  radiusClose: 5000,
  radiusFarLimit: 10000,
};

export const DEFAULT_AVOID_LOCATION: AvoidLocationConfig = {
  radiusHitHard: 2000,
  radiusHitSoft: 5000,
};

export const DEFAULT_POI_RULES: PoiRulesConfig = {
  avoidRadiusRatio: 0.6,
  minProximityFactor: 0.1,
  legacyRailKey: 'train_station',
  legacyRailRadius: 2500,
  veterinaryKey: 'veterinary',
};

export const DEFAULT_DATA_QUALITY: DataQualityConfig = {
  missingDataSentinels: [99999],
  sentinelFloor: 90000,
};

export const DEFAULT_RANKING: RankingConfig = {
  candidatePoolSize: 100,
  topN: 5,
  minFinalScore: 0.35,
  weights: {
    structured: 0.7,
    semantic: 0.2,
    lifestyle: 0.05,
  },
};
