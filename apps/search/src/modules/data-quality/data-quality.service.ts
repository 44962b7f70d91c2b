import { Injectable } from '@nestjs/common';
import {
  Coordinates,
  InjectSearchConfig,
  SearchConfig,
  getPoiDefinition,
  hasOwnKey,
  isValidCoordinates,
} from '@libs/common';
import { CandidateAttributes, DataQualityReport, Intent, PoiDataStatus } from '@libs/models';

// Weights of the quality score components, sum = 1
const QUALITY_SCORE_WEIGHTS = {
  poiCompleteness: 0.4,
  price: 0.3,
  assetType: 0.2,
  location: 0.1,
};

/**
 * Separates "known far" from "unknown": a POI distance is only ever used once
 * it has been classified as present. Sentinel distances (99999 and anything
 * from 90000 up) mean the index had no data, not that the POI is far away.
 */
@Injectable()
export class DataQualityService {
  public constructor(@InjectSearchConfig() private readonly config: SearchConfig) {}

  public classify(value: unknown): PoiDataStatus {
    if (value === null || value === undefined) {
      return 'missing';
    }

    const numeric = this.toNumber(value);

    if (numeric === null) {
      return 'unusable';
    }

    if (this.isSentinel(numeric)) {
      return 'missing';
    }

    return numeric < 0 ? 'unusable' : 'present';
  }

  public assess(
    attributes: CandidateAttributes,
    requiredKeys: readonly string[],
    optionalKeys: readonly string[] = [],
  ): DataQualityReport {
    const { poiCatalog } = this.config;
    const isKnown = (key: string): boolean => getPoiDefinition(poiCatalog, key) !== undefined;

    const required = new Set(requiredKeys.filter(isKnown));
    const checked = new Set([...required, ...optionalKeys.filter(isKnown)]);

    const availablePoiKeys: string[] = [];
    const missingPoiKeys: string[] = [];
    const unusablePoiKeys: string[] = [];
    const warnings: string[] = [];

    for (const key of checked) {
      const status = this.classify(this.rawDistance(attributes, key));

      if (status === 'present') {
        availablePoiKeys.push(key);
        continue;
      }

      missingPoiKeys.push(key);
      if (status === 'unusable') {
        unusablePoiKeys.push(key);
      }

      if (required.has(key)) {
        warnings.push(`No data for ${poiCatalog[key].displayName} (cannot verify)`);
      }
    }

    const hasValidPrice = attributes.sellingPrice !== null && attributes.sellingPrice > 0;
    const hasValidAssetType = attributes.assetTypeId !== null && Number.isInteger(attributes.assetTypeId);
    const hasValidLocation =
      Boolean(attributes.locality?.trim() || attributes.road?.trim()) || this.verifiedCoordinates(attributes) !== null;

    const poiCompleteness = availablePoiKeys.length / Math.max(checked.size, 1);
    const qualityScore =
      poiCompleteness * QUALITY_SCORE_WEIGHTS.poiCompleteness +
      (hasValidPrice ? QUALITY_SCORE_WEIGHTS.price : 0) +
      (hasValidAssetType ? QUALITY_SCORE_WEIGHTS.assetType : 0) +
      (hasValidLocation ? QUALITY_SCORE_WEIGHTS.location : 0);

    return {
      assetId: attributes.id,
      availablePoiKeys,
      missingPoiKeys,
      unusablePoiKeys,
      hasValidPrice,
      hasValidAssetType,
      hasValidLocation,
      qualityScore,
      warnings,
    };
  }

  /** Must-haves are required; nice-to-haves and avoided POIs are checked but optional. */
  public assessForIntent(attributes: CandidateAttributes, intent: Intent): DataQualityReport {
    return this.assess(attributes, intent.mustHave, [...intent.niceToHave, ...intent.avoidPoi]);
  }

  /**
   * Distance in meters only when verified present; null otherwise.
   * Never substitute a "far away" number for null.
   */
  public verifiedDistance(attributes: CandidateAttributes, key: string): number | null {
    const raw = this.rawDistance(attributes, key);

    return this.classify(raw) === 'present' ? this.toNumber(raw) : null;
  }

  public verifiedCoordinates(attributes: CandidateAttributes): Coordinates | null {
    if (attributes.latitude === null || attributes.longitude === null) {
      return null;
    }

    const coords = { latitude: attributes.latitude, longitude: attributes.longitude };

    return isValidCoordinates(coords) ? coords : null;
  }

  private rawDistance(attributes: CandidateAttributes, key: string): unknown {
    return hasOwnKey(attributes.poiDistances, key) ? attributes.poiDistances[key] : undefined;
  }

  private isSentinel(value: number): boolean {
    const { missingDataSentinels, sentinelFloor } = this.config.dataQuality;

    return missingDataSentinels.includes(value) || value >= sentinelFloor;
  }

  private toNumber(value: unknown): number | null {
    if (typeof value === 'number') {
      return Number.isFinite(value) ? value : null;
    }

    if (typeof value === 'string' && value.trim() !== '') {
      const parsed = Number(value.trim());
      return Number.isFinite(parsed) ? parsed : null;
    }

    return null;
  }
}
