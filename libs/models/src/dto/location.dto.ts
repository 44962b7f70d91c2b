import { ApiProperty, ApiPropertyOptional } from '@nestjs/swagger';
import { Type } from 'class-transformer';
import { IsNotEmpty, IsNumber, IsOptional, IsString, Max, Min, ValidateNested } from 'class-validator';

export class CoordinatesDto {
  @ApiProperty({ example: 13.7466 })
  @IsNumber()
  @Min(-90)
  @Max(90)
  latitude!: number;

  @ApiProperty({ example: 100.5393 })
  @IsNumber()
  @Min(-180)
  @Max(180)
  longitude!: number;
}

/**
 * A place either already geocoded or given by name.
 * Coordinates take precedence when both are present.
 */
export class LocationTargetDto {
  @ApiPropertyOptional({ type: CoordinatesDto })
  @IsOptional()
  @ValidateNested()
  @Type(() => CoordinatesDto)
  coordinates?: CoordinatesDto;

  @ApiPropertyOptional({ description: 'Free-text place name to geocode', example: 'Siam Paragon' })
  @IsOptional()
  @IsString()
  @IsNotEmpty()
  name?: string;
}
