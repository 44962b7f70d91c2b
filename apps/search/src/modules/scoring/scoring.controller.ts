import { Body, Controller, HttpCode, HttpStatus, Post } from '@nestjs/common';
import { ApiOperation, ApiResponse, ApiTags } from '@nestjs/swagger';
import { ScoreRequestDto, ScoringResultDto } from '@libs/models';

import { DataQualityService } from '../data-quality';

import { CandidateAttributesMapper, IntentMapper } from './mappers';
import { StructuredScorerService } from './structured-scorer.service';

@ApiTags('Search')
@Controller('api/v1/search')
export class ScoringController {
  public constructor(
    private readonly scorer: StructuredScorerService,
    private readonly dataQuality: DataQualityService,
    private readonly candidateMapper: CandidateAttributesMapper,
    private readonly intentMapper: IntentMapper,
  ) {}

  @Post('score')
  @HttpCode(HttpStatus.OK)
  @ApiOperation({ summary: 'Score one listing against a parsed search intent' })
  @ApiResponse({ status: 200, description: 'Structured score with signals', type: ScoringResultDto })
  @ApiResponse({ status: 400, description: 'Invalid request body' })
  public score(@Body() body: ScoreRequestDto): ScoringResultDto {
    const intent = this.intentMapper.toIntent(body.intent);
    const attributes = this.candidateMapper.fromRecord(body.candidate);
    const quality = this.dataQuality.assessForIntent(attributes, intent);

    return this.scorer.score(attributes, intent, quality, body.target, body.avoid);
  }
}
