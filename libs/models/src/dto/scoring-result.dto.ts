import { ApiProperty } from '@nestjs/swagger';
import { SignalKind } from '@libs/common';

import { DataQualityReport, ScoringResult, ScoringSignal } from '../types';

export class ScoringSignalDto implements ScoringSignal {
  @ApiProperty({ enum: SignalKind })
  kind!: SignalKind;

  @ApiProperty({ description: 'Machine label of the signal', example: 'must_have:school' })
  code!: string;

  @ApiProperty({ description: 'Human readable reason' })
  message!: string;

  @ApiProperty({ description: 'Score contribution (0 for warnings)' })
  contribution!: number;
}

export class DataQualityReportDto implements DataQualityReport {
  @ApiProperty()
  assetId!: string;

  @ApiProperty({ type: [String] })
  availablePoiKeys!: string[];

  @ApiProperty({ type: [String] })
  missingPoiKeys!: string[];

  @ApiProperty({ type: [String], description: 'Missing keys whose value was malformed' })
  unusablePoiKeys!: string[];

  @ApiProperty()
  hasValidPrice!: boolean;

  @ApiProperty()
  hasValidAssetType!: boolean;

  @ApiProperty()
  hasValidLocation!: boolean;

  @ApiProperty({ description: 'Share of verified data (0-1)' })
  qualityScore!: number;

  @ApiProperty({ type: [String] })
  warnings!: string[];
}

export class ScoringResultDto implements ScoringResult {
  @ApiProperty({ description: 'Signed relevance score, 0 when disqualified' })
  score!: number;

  @ApiProperty()
  isDisqualified!: boolean;

  @ApiProperty({ type: String, nullable: true })
  disqualificationReason!: string | null;

  @ApiProperty({ type: [ScoringSignalDto] })
  positiveSignals!: ScoringSignalDto[];

  @ApiProperty({ type: [ScoringSignalDto], description: 'Penalties and warnings' })
  negativeSignals!: ScoringSignalDto[];

  @ApiProperty({
    type: 'object',
    additionalProperties: { type: 'number' },
    description: 'Contribution per signal code',
  })
  scoreBreakdown!: Record<string, number>;

  @ApiProperty({ type: DataQualityReportDto })
  dataQuality!: DataQualityReportDto;
}
