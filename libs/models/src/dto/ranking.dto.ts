import { ApiProperty, ApiPropertyOptional } from '@nestjs/swagger';

import { ScoringSignalDto } from './scoring-result.dto';

export class RankedListingDto {
  @ApiProperty()
  id!: string;

  @ApiProperty({ description: 'Weighted blend of structured, semantic and lifestyle scores' })
  finalScore!: number;

  @ApiProperty({ description: 'Structured (rule based) score' })
  structuredScore!: number;

  @ApiProperty()
  semanticScore!: number;

  @ApiProperty()
  lifestyleScore!: number;

  @ApiProperty({ description: 'Data quality of the listing (0-1)' })
  qualityScore!: number;

  @ApiProperty({ type: [ScoringSignalDto] })
  positiveSignals!: ScoringSignalDto[];

  @ApiProperty({ type: [ScoringSignalDto] })
  negativeSignals!: ScoringSignalDto[];

  @ApiProperty({ type: 'object', additionalProperties: { type: 'number' } })
  scoreBreakdown!: Record<string, number>;
}

export class DisqualifiedListingDto {
  @ApiProperty()
  id!: string;

  @ApiProperty()
  reason!: string;
}

export class RankingResponseDto {
  @ApiProperty({ type: [RankedListingDto] })
  results!: RankedListingDto[];

  @ApiProperty({ description: 'Candidates received' })
  totalCandidates!: number;

  @ApiProperty({ description: 'Candidates removed by hard constraints' })
  disqualifiedCount!: number;

  @ApiProperty({ type: [DisqualifiedListingDto] })
  disqualified!: DisqualifiedListingDto[];

  @ApiProperty({ type: [String], description: 'Pipeline level warnings (e.g. unresolved place names)' })
  warnings!: string[];

  @ApiPropertyOptional({ description: 'Set when no result is returned' })
  message?: string;
}
