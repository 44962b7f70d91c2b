import { Injectable } from '@nestjs/common';
import { InjectSearchConfig, SearchConfig, getPoiDefinition } from '@libs/common';
import { ScoringSignal } from '@libs/models';

import { DataQualityService } from '../../data-quality/data-quality.service';

import { BaseGate, GateContext, GateResult } from './base.gate';

/**
 * Avoided POIs use a tighter threshold than their catalog radius
 * (`poiRules.avoidRadiusRatio`). Missing data is skipped: absence of an
 * avoided place is not evidence of distance, but neither is it a violation.
 */
@Injectable()
export class AvoidPoiGate extends BaseGate {
  public readonly name = 'avoidPoi';

  public constructor(
    @InjectSearchConfig() config: SearchConfig,
    private readonly dataQuality: DataQualityService,
  ) {
    super(config);
  }

  public evaluate({ attributes, intent }: GateContext): GateResult {
    const { weights, poiRules, hardConstraints } = this.config;
    const signals: ScoringSignal[] = [];

    for (const key of new Set(intent.avoidPoi)) {
      const definition = getPoiDefinition(this.config.poiCatalog, key);
      const distance = this.dataQuality.verifiedDistance(attributes, key);
      if (!definition || distance === null) {
        continue;
      }

      const threshold = definition.radius * poiRules.avoidRadiusRatio;

      if (distance > threshold) {
        signals.push(
          this.positive(
            `avoid_poi:${key}`,
            `Away from ${definition.displayName} (${this.formatMeters(distance)})`,
            weights.avoidPoiSuccess,
          ),
        );
        continue;
      }

      const reason =
        `Too close to ${definition.displayName} (${this.formatMeters(distance)}, ` +
        `must be more than ${this.formatMeters(threshold)})`;

      if (hardConstraints.avoidPoiTooClose) {
        return this.disqualify(reason, signals);
      }

      signals.push(this.negative(`avoid_poi:${key}`, reason, weights.avoidPoiFailure));
    }

    return this.pass(signals);
  }
}
