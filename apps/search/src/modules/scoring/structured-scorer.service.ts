import { Injectable, Logger } from '@nestjs/common';
import { Coordinates, SignalKind } from '@libs/common';
import { CandidateAttributes, DataQualityReport, Intent, ScoringResult, ScoringSignal } from '@libs/models';

import {
  AssetTypeGate,
  AvoidLocationGate,
  AvoidPoiGate,
  BaseGate,
  GateContext,
  MustHavePoiGate,
  NiceToHaveGate,
  PetPolicyGate,
  PriceRangeGate,
  RapidTransitGate,
  TargetLocationGate,
  TransportModeGate,
} from './gates';

/**
 * Constraint-gated scorer. Gates run in a fixed order; the first
 * disqualification ends the evaluation with a zero score.
 */
@Injectable()
export class StructuredScorerService {
  private readonly logger = new Logger(StructuredScorerService.name);

  private readonly gates: readonly BaseGate[];

  public constructor(
    assetTypeGate: AssetTypeGate,
    transportModeGate: TransportModeGate,
    rapidTransitGate: RapidTransitGate,
    mustHavePoiGate: MustHavePoiGate,
    petPolicyGate: PetPolicyGate,
    niceToHaveGate: NiceToHaveGate,
    avoidPoiGate: AvoidPoiGate,
    priceRangeGate: PriceRangeGate,
    targetLocationGate: TargetLocationGate,
    avoidLocationGate: AvoidLocationGate,
  ) {
    this.gates = [
      assetTypeGate,
      transportModeGate,
      rapidTransitGate,
      mustHavePoiGate,
      petPolicyGate,
      niceToHaveGate,
      avoidPoiGate,
      priceRangeGate,
      targetLocationGate,
      avoidLocationGate,
    ];
  }

  public score(
    attributes: CandidateAttributes,
    intent: Intent,
    quality: DataQualityReport,
    targetCoords?: Coordinates,
    avoidCoords?: Coordinates,
  ): ScoringResult {
    const context: GateContext = { attributes, intent, quality, targetCoords, avoidCoords };
    const signals: ScoringSignal[] = [];

    for (const gate of this.gates) {
      const result = gate.evaluate(context);
      signals.push(...result.signals);

      if (result.disqualificationReason !== undefined) {
        this.logger.debug(`Listing ${attributes.id} disqualified by ${gate.name}: ${result.disqualificationReason}`);

        return this.buildResult(signals, quality, result.disqualificationReason);
      }
    }

    return this.buildResult(signals, quality, null);
  }

  private buildResult(
    signals: ScoringSignal[],
    quality: DataQualityReport,
    disqualificationReason: string | null,
  ): ScoringResult {
    const isDisqualified = disqualificationReason !== null;
    const scoreBreakdown: Record<string, number> = {};
    let score = 0;

    if (!isDisqualified) {
      for (const signal of signals) {
        if (signal.contribution === 0) {
          continue;
        }

        score += signal.contribution;
        scoreBreakdown[signal.code] = (scoreBreakdown[signal.code] ?? 0) + signal.contribution;
      }
    }

    return {
      score,
      isDisqualified,
      disqualificationReason,
      positiveSignals: signals.filter((s) => s.kind === SignalKind.Positive),
      negativeSignals: signals.filter((s) => s.kind !== SignalKind.Positive),
      scoreBreakdown,
      dataQuality: quality,
    };
  }
}
