import { Injectable } from '@nestjs/common';
import { InjectSearchConfig, SearchConfig, hasOwnKey, isValidLatitude, isValidLongitude } from '@libs/common';
import { CandidateAttributes, RawCandidateRecord } from '@libs/models';

/**
 * Maps the flat attribute map of the listing index to CandidateAttributes.
 * Dirty values become null rather than errors; POI distances are copied raw
 * for the data quality assessor to classify.
 */
@Injectable()
export class CandidateAttributesMapper {
  public constructor(@InjectSearchConfig() private readonly config: SearchConfig) {}

  public fromRecord(record: RawCandidateRecord, id?: string): CandidateAttributes {
    const poiDistances: Record<string, unknown> = {};
    const poiNames: Record<string, string> = {};

    for (const key of Object.keys(this.config.poiCatalog)) {
      if (hasOwnKey(record, key)) {
        poiDistances[key] = record[key];
      }

      const name = this.extractText(record[`${key}_name`]);
      if (name) {
        poiNames[key] = name;
      }
    }

    const price = this.extractNumber(record.asset_details_selling_price);
    const latitude = this.extractNumber(record.latitude) ?? this.extractNumber(record.location_latitude);
    const longitude = this.extractNumber(record.longitude) ?? this.extractNumber(record.location_longitude);

    return {
      id: id ?? this.extractText(record.id) ?? this.extractText(record.asset_id) ?? 'unknown',
      assetTypeId: this.extractInteger(record.asset_type_id),
      assetTypeName: this.extractText(record.asset_type_fixed) ?? this.extractText(record.asset_type_name),
      petFriendly: this.extractBoolean(record.pet_friendly),
      sellingPrice: price !== null && price > 0 ? price : null,
      latitude: latitude !== null && isValidLatitude(latitude) ? latitude : null,
      longitude: longitude !== null && isValidLongitude(longitude) ? longitude : null,
      locality: this.extractText(record.location_village_th),
      road: this.extractText(record.location_road_th),
      poiDistances,
      poiNames,
    };
  }

  private extractNumber(value: unknown): number | null {
    if (typeof value === 'number') return Number.isFinite(value) ? value : null;
    if (typeof value === 'string' && value.trim() !== '') {
      const num = Number(value.trim());
      return Number.isFinite(num) ? num : null;
    }
    return null;
  }

  private extractInteger(value: unknown): number | null {
    const num = this.extractNumber(value);
    return num !== null && Number.isInteger(num) ? num : null;
  }

  private extractBoolean(value: unknown): boolean | null {
    if (typeof value === 'boolean') return value;
    if (typeof value === 'string') {
      const normalized = value.trim().toLowerCase();
      if (normalized === 'true') return true;
      if (normalized === 'false') return false;
    }
    return null;
  }

  private extractText(value: unknown): string | null {
    if (typeof value === 'number' && Number.isFinite(value)) return String(value);
    if (typeof value !== 'string') return null;
    const trimmed = value.trim();
    return trimmed.length > 0 ? trimmed : null;
  }
}
