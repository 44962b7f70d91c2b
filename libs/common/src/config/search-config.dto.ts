import { Type } from 'class-transformer';
import {
  IsArray,
  IsBoolean,
  IsEnum,
  IsInt,
  IsNotEmpty,
  IsNumber,
  IsObject,
  IsPositive,
  IsString,
  Max,
  Min,
  ValidateIf,
  ValidateNested,
} from 'class-validator';

import { ProximityCurve } from '../enums';

// Unlike @IsOptional, rejects explicit nulls so they never overwrite a default.
const IfDefined = (): PropertyDecorator => ValidateIf((_object: object, value: unknown) => value !== undefined);

export class PoiDefinitionDto {
  @IsPositive()
  radius!: number;

  @IsNumber()
  @Min(0)
  weight!: number;

  @IsEnum(ProximityCurve)
  curve!: ProximityCurve;

  @IsString()
  @IsNotEmpty()
  category!: string;

  @IsString()
  @IsNotEmpty()
  displayName!: string;

  @IsBoolean()
  isRapidTransit!: boolean;
}

export class AssetTypeConfigDto {
  @IsObject()
  labels!: Record<string, unknown>;

  @IsArray()
  @IsInt({ each: true })
  condoAssetTypeIds!: number[];

  @IsArray()
  @IsInt({ each: true })
  petFriendlyAssetTypeIds!: number[];
}

export class ScoringWeightsOverrideDto {
  @IfDefined() @IsNumber() assetTypeMatch?: number;
  @IfDefined() @IsNumber() assetTypeMismatch?: number;
  @IfDefined() @IsNumber() transportMismatch?: number;
  @IfDefined() @IsNumber() mustHavePoiBase?: number;
  @IfDefined() @IsNumber() mustHavePoiTooFar?: number;
  @IfDefined() @IsNumber() niceToHavePoi?: number;
  @IfDefined() @IsNumber() petFriendlyExplicit?: number;
  @IfDefined() @IsNumber() petFriendlyInferred?: number;
  @IfDefined() @IsNumber() petNotAllowed?: number;
  @IfDefined() @IsNumber() petStatusUnknown?: number;
  @IfDefined() @IsNumber() petFriendlyUnwanted?: number;
  @IfDefined() @IsNumber() nearVetBonus?: number;
  @IfDefined() @IsNumber() priceInRange?: number;
  @IfDefined() @IsNumber() priceOutOfRange?: number;
  @IfDefined() @IsNumber() avoidPoiSuccess?: number;
  @IfDefined() @IsNumber() avoidPoiFailure?: number;
  @IfDefined() @IsNumber() locationVeryClose?: number;
  @IfDefined() @IsNumber() locationClose?: number;
  @IfDefined() @IsNumber() locationFar?: number;
  @IfDefined() @IsNumber() avoidLocationHitHard?: number;
  @IfDefined() @IsNumber() avoidLocationHitSoft?: number;
  @IfDefined() @IsNumber() avoidLocationSuccess?: number;
}

export class HardConstraintOverrideDto {
  @IfDefined() @IsBoolean() wrongAssetType?: boolean;
  @IfDefined() @IsBoolean() wrongTransportType?: boolean;
  @IfDefined() @IsBoolean() mustHavePoiTooFar?: boolean;
  @IfDefined() @IsBoolean() avoidPoiTooClose?: boolean;
  @IfDefined() @IsBoolean() targetLocationTooFar?: boolean;
}

export class TargetLocationOverrideDto {
  @IfDefined() @IsPositive() radiusVeryClose?: number;
  @IfDefined() @IsPositive() radiusClose?: number;
  @IfDefined() @IsPositive() radiusFarLimit?: number;
}

export class AvoidLocationOverrideDto {
  @IfDefined() @IsPositive() radiusHitHard?: number;
  @IfDefined() @IsPositive() radiusHitSoft?: number;
}

export class PoiRulesOverrideDto {
  @IfDefined() @IsNumber() @Min(0) @Max(1) avoidRadiusRatio?: number;
  @IfDefined() @IsNumber() @Min(0) @Max(1) minProximityFactor?: number;
  @IfDefined() @IsString() @IsNotEmpty() legacyRailKey?: string;
  @IfDefined() @IsPositive() legacyRailRadius?: number;
  @IfDefined() @IsString() @IsNotEmpty() veterinaryKey?: string;
}

export class DataQualityOverrideDto {
  @IfDefined() @IsArray() @IsNumber({}, { each: true }) missingDataSentinels?: number[];
  @IfDefined() @IsPositive() sentinelFloor?: number;
}

export class RankingWeightsOverrideDto {
  @IfDefined() @IsNumber() @Min(0) structured?: number;
  @IfDefined() @IsNumber() @Min(0) semantic?: number;
  @IfDefined() @IsNumber() @Min(0) lifestyle?: number;
}

export class RankingOverrideDto {
  @IfDefined() @IsInt() @IsPositive() candidatePoolSize?: number;
  @IfDefined() @IsInt() @IsPositive() topN?: number;
  @IfDefined() @IsNumber() minFinalScore?: number;

  @IfDefined()
  @ValidateNested()
  @Type(() => RankingWeightsOverrideDto)
  weights?: RankingWeightsOverrideDto;
}

/**
 * Shape of the optional JSON file named by SEARCH_CONFIG_FILE.
 * Every section is partial and merged over the built-in defaults.
 */
export class SearchConfigOverridesDto {
  @IfDefined()
  @IsObject()
  poiCatalog?: Record<string, unknown>;

  @IfDefined()
  @ValidateNested()
  @Type(() => AssetTypeConfigDto)
  assetTypes?: AssetTypeConfigDto;

  @IfDefined()
  @ValidateNested()
  @Type(() => ScoringWeightsOverrideDto)
  weights?: ScoringWeightsOverrideDto;

  @IfDefined()
  @ValidateNested()
  @Type(() => HardConstraintOverrideDto)
  hardConstraints?: HardConstraintOverrideDto;

  @IfDefined()
  @ValidateNested()
  @Type(() => TargetLocationOverrideDto)
  targetLocation?: TargetLocationOverrideDto;

  @IfDefined()
  @ValidateNested()
  @Type(() => AvoidLocationOverrideDto)
  avoidLocation?: AvoidLocationOverrideDto;

  @IfDefined()
  @ValidateNested()
  @Type(() => PoiRulesOverrideDto)
  poiRules?: PoiRulesOverrideDto;

  @IfDefined()
  @ValidateNested()
  @Type(() => DataQualityOverrideDto)
  dataQuality?: DataQualityOverrideDto;

  @IfDefined()
  @ValidateNested()
  @Type(() => RankingOverrideDto)
  ranking?: RankingOverrideDto;
}
