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
 * Soft scoring of rapid-transit must-haves. Mode mismatches were already
 * settled by TransportModeGate, so a missing or distant station only warns.
 */
@Injectable()
export class RapidTransitGate extends BaseGate {
  public readonly name = 'rapidTransit';

  public constructor(
    @InjectSearchConfig() config: SearchConfig,
    private readonly dataQuality: DataQualityService,
  ) {
    super(config);
  }

  public evaluate({ attributes, intent }: GateContext): GateResult {
    const { weights, poiRules } = this.config;
    const signals: ScoringSignal[] = [];

    for (const key of new Set(intent.mustHave)) {
      const definition = getPoiDefinition(this.config.poiCatalog, key);
      if (!definition?.isRapidTransit) {
        continue;
      }

      const distance = this.dataQuality.verifiedDistance(attributes, key);

      if (distance === null) {
        signals.push(this.warning(`missing:${key}`, `No data for ${definition.displayName}`));
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
      }
    }

    return this.pass(signals);
  }
}
