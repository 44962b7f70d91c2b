import { BadRequestException, Injectable, Logger } from '@nestjs/common';
import { Coordinates, InjectSearchConfig, SearchConfig } from '@libs/common';
import {
  DisqualifiedListingDto,
  LocationTargetDto,
  RankedListingDto,
  RankRequestDto,
  RankingResponseDto,
} from '@libs/models';

import { DataQualityService } from '../data-quality';
import { GeocodingService } from '../geocoding';
import { CandidateAttributesMapper, IntentMapper, StructuredScorerService } from '../scoring';

export const LOW_MATCHING_SCORE_MESSAGE = 'Low matching score';

interface ResolvedLocation {
  coords?: Coordinates;
  warning?: string;
}

interface ScoredCandidate {
  listing: RankedListingDto;
  rawFinalScore: number;
}

/**
 * Re-ranks a pool of semantically retrieved candidates: hard constraints
 * drop listings, the structured score is blended with the retrieval scores
 * and a minimum-score gate keeps weak matches out.
 */
@Injectable()
export class RankingService {
  private readonly logger = new Logger(RankingService.name);

  public constructor(
    @InjectSearchConfig() private readonly config: SearchConfig,
    private readonly scorer: StructuredScorerService,
    private readonly dataQuality: DataQualityService,
    private readonly candidateMapper: CandidateAttributesMapper,
    private readonly intentMapper: IntentMapper,
    private readonly geocodingService: GeocodingService,
  ) {}

  public async rank(request: RankRequestDto): Promise<RankingResponseDto> {
    const { ranking } = this.config;

    if (request.candidates.length > ranking.candidatePoolSize) {
      throw new BadRequestException(
        `Candidate pool of ${request.candidates.length} exceeds the limit of ${ranking.candidatePoolSize}`,
      );
    }

    const intent = this.intentMapper.toIntent(request.intent);
    const [target, avoid] = await Promise.all([
      this.resolveLocation(request.target, 'target'),
      this.resolveLocation(request.avoid, 'avoid'),
    ]);
    const warnings = [target.warning, avoid.warning].filter((w): w is string => w !== undefined);

    const scored: ScoredCandidate[] = [];
    const disqualified: DisqualifiedListingDto[] = [];

    for (const candidate of request.candidates) {
      const attributes = this.candidateMapper.fromRecord(candidate.attributes, candidate.id);
      const quality = this.dataQuality.assessForIntent(attributes, intent);
      const result = this.scorer.score(attributes, intent, quality, target.coords, avoid.coords);

      if (result.isDisqualified) {
        disqualified.push({ id: candidate.id, reason: result.disqualificationReason ?? 'Disqualified' });
        continue;
      }

      const lifestyleScore = candidate.lifestyleScore ?? 0;
      const rawFinalScore =
        ranking.weights.structured * result.score +
        ranking.weights.semantic * candidate.semanticScore +
        ranking.weights.lifestyle * lifestyleScore;

      scored.push({
        rawFinalScore,
        listing: {
          id: candidate.id,
          finalScore: this.round(rawFinalScore),
          structuredScore: this.round(result.score),
          semanticScore: candidate.semanticScore,
          lifestyleScore,
          qualityScore: quality.qualityScore,
          positiveSignals: result.positiveSignals,
          negativeSignals: result.negativeSignals,
          scoreBreakdown: result.scoreBreakdown,
        },
      });
    }

    scored.sort((a, b) => b.rawFinalScore - a.rawFinalScore || a.listing.id.localeCompare(b.listing.id));

    this.logger.log(
      `Ranked ${request.candidates.length} candidates: ${scored.length} kept, ${disqualified.length} disqualified`,
    );

    const response: RankingResponseDto = {
      results: [],
      totalCandidates: request.candidates.length,
      disqualifiedCount: disqualified.length,
      disqualified,
      warnings,
    };

    if (scored.length === 0 || scored[0].rawFinalScore < ranking.minFinalScore) {
      return { ...response, message: LOW_MATCHING_SCORE_MESSAGE };
    }

    const topN = request.topN ?? ranking.topN;

    return {
      ...response,
      results: scored.slice(0, topN).map(({ listing }) => listing),
    };
  }

  private async resolveLocation(
    location: LocationTargetDto | undefined,
    label: 'target' | 'avoid',
  ): Promise<ResolvedLocation> {
    if (location?.coordinates) {
      return { coords: { latitude: location.coordinates.latitude, longitude: location.coordinates.longitude } };
    }

    if (!location?.name) {
      return {};
    }

    const coords = await this.geocodingService.geocode(location.name);

    return coords
      ? { coords }
      : { warning: `Could not resolve ${label} location "${location.name}", distance scoring skipped` };
  }

  private round(value: number): number {
    return Math.round(value * 100) / 100;
  }
}
