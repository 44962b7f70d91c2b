import { ApiProperty, ApiPropertyOptional } from '@nestjs/swagger';
import { Type } from 'class-transformer';
import {
  ArrayMinSize,
  IsArray,
  IsInt,
  IsNotEmpty,
  IsNumber,
  IsObject,
  IsOptional,
  IsPositive,
  IsString,
  Max,
  Min,
  ValidateNested,
} from 'class-validator';

import { IntentDto } from './intent.dto';
import { CoordinatesDto, LocationTargetDto } from './location.dto';

export class ScoreRequestDto {
  @ApiProperty({ type: IntentDto })
  @ValidateNested()
  @Type(() => IntentDto)
  intent!: IntentDto;

  @ApiProperty({
    type: 'object',
    additionalProperties: true,
    description: 'Flat listing attribute map (asset_type_id, POI distances, price, coordinates, ...)',
  })
  @IsObject()
  candidate!: Record<string, unknown>;

  @ApiPropertyOptional({ type: CoordinatesDto, description: 'Geocoded target location' })
  @IsOptional()
  @ValidateNested()
  @Type(() => CoordinatesDto)
  target?: CoordinatesDto;

  @ApiPropertyOptional({ type: CoordinatesDto, description: 'Geocoded location to stay away from' })
  @IsOptional()
  @ValidateNested()
  @Type(() => CoordinatesDto)
  avoid?: CoordinatesDto;
}

export class RankCandidateDto {
  @ApiProperty({ description: 'Listing identifier' })
  @IsString()
  @IsNotEmpty()
  id!: string;

  @ApiProperty({ type: 'object', additionalProperties: true, description: 'Flat listing attribute map' })
  @IsObject()
  attributes!: Record<string, unknown>;

  @ApiProperty({ description: 'Semantic similarity from retrieval (0-1)' })
  @IsNumber()
  @Min(0)
  @Max(1)
  semanticScore!: number;

  @ApiPropertyOptional({ description: 'Popularity / lifestyle score (0-1)' })
  @IsOptional()
  @IsNumber()
  @Min(0)
  @Max(1)
  lifestyleScore?: number;
}

export class RankRequestDto {
  @ApiProperty({ type: IntentDto })
  @ValidateNested()
  @Type(() => IntentDto)
  intent!: IntentDto;

  @ApiProperty({ type: [RankCandidateDto], description: 'Candidate pool from semantic retrieval' })
  @IsArray()
  @ArrayMinSize(1)
  @ValidateNested({ each: true })
  @Type(() => RankCandidateDto)
  candidates!: RankCandidateDto[];

  @ApiPropertyOptional({ type: LocationTargetDto })
  @IsOptional()
  @ValidateNested()
  @Type(() => LocationTargetDto)
  target?: LocationTargetDto;

  @ApiPropertyOptional({ type: LocationTargetDto })
  @IsOptional()
  @ValidateNested()
  @Type(() => LocationTargetDto)
  avoid?: LocationTargetDto;

  @ApiPropertyOptional({ description: 'Number of results to return' })
  @IsOptional()
  @IsInt()
  @IsPositive()
  topN?: number;
}
