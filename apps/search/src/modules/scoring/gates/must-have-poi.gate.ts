import { Injectable } from '@nestjs/common';
import {
  InjectSearchConfig,
  SearchConfig,
  getPoiDefinition,
  proximityContribution,
  proximityFactor,
} from '@libs/common';
import { ScoringSignal } from '@libs/models';

import { DataQualityService } from '../../data-quality/data-quality.service';

import { BaseGate, GateContext, GateResult } from './base.gate';

/**
 * Hard gate per must-have POI (rapid transit excluded, see RapidTransitGate).
 * Missing data only warns: absence cannot be asserted. A verified distance
 * beyond the catalog radius disqualifies.
 */
@Injectable()
export class MustHavePoiGate extends BaseGate {
  public readonly name = 'mustHavePoi';

  public constructor(
    @InjectSearchConfig() config: SearchConfig,
    private readonly dataQuality: DataQualityService,
  ) {
    super(config);
  }

  public evaluate({ attributes, intent }: GateContext): GateResult {
    const { weights, poiRules, hardConstraints } = this.config;
    const signals: ScoringSignal[] = [];

    for (const key of new Set(intent.mustHave)) {
      const definition = getPoiDefinition(this.config.poiCatalog, key);
      if (!definition || definition.isRapidTransit) {
        continue;
      }

      const distance = this.dataQuality.verifiedDistance(attributes, key);

      if (distance === null) {
        signals.push(this.warning(`missing:${key}`, `No data for ${definition.displayName} (cannot verify)`));
        continue;
      }

      if (distance <= definition.radius) {
        const factor = proximityFactor(distance, definition.radius, definition.curve);
        signals.push(
          this.positive(
            `must_have:${key}`,
            `Near ${this.describePoi(attributes, key, definition)} (${this.formatMeters(distance)})`,
            proximityContribution(weights.mustHavePoiBase, factor, poiRules.minProximityFactor),
          ),
        );
        continue;
      }

      const reason =
        `Wanted ${definition.displayName} within ${this.formatMeters(definition.radius)} ` +
        `but nearest is ${this.formatMeters(distance)}`;

      if (hardConstraints.mustHavePoiTooFar) {
        return this.disqualify(reason, signals);
      }

      signals.push(this.negative(`must_have_too_far:${key}`, reason, weights.mustHavePoiTooFar));
    }

    return this.pass(signals);
  }
}
