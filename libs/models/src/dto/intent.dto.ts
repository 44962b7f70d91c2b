import { ApiPropertyOptional } from '@nestjs/swagger';
import { Type } from 'class-transformer';
import { IsArray, IsBoolean, IsNumber, IsOptional, IsString, Min, ValidateNested } from 'class-validator';

export class IntentPriceRangeDto {
  @ApiPropertyOptional({ nullable: true, description: 'Inclusive lower bound' })
  @IsOptional()
  @IsNumber()
  @Min(0)
  min?: number | null;

  @ApiPropertyOptional({ nullable: true, description: 'Inclusive upper bound' })
  @IsOptional()
  @IsNumber()
  @Min(0)
  max?: number | null;
}

/**
 * Wire form of the parsed query intent, as produced by the intent extractor.
 */
export class IntentDto {
  @ApiPropertyOptional({ type: [String], description: 'Asset type labels, empty = any type', example: ['condo'] })
  @IsOptional()
  @IsArray()
  @IsString({ each: true })
  asset_types?: string[];

  @ApiPropertyOptional({ type: [String], description: 'POI keys that must be nearby', example: ['bts_station'] })
  @IsOptional()
  @IsArray()
  @IsString({ each: true })
  must_have?: string[];

  @ApiPropertyOptional({ type: [String], description: 'POI keys that earn a bonus when nearby' })
  @IsOptional()
  @IsArray()
  @IsString({ each: true })
  nice_to_have?: string[];

  @ApiPropertyOptional({ type: [String], description: 'POI keys that must not be close' })
  @IsOptional()
  @IsArray()
  @IsString({ each: true })
  avoid_poi?: string[];

  @ApiPropertyOptional({ nullable: true, description: 'true: wants pets allowed, false: prefers no pets, null: any' })
  @IsOptional()
  @IsBoolean()
  pet_friendly?: boolean | null;

  @ApiPropertyOptional({ type: IntentPriceRangeDto })
  @IsOptional()
  @ValidateNested()
  @Type(() => IntentPriceRangeDto)
  price_range?: IntentPriceRangeDto | null;
}
