import { Injectable } from '@nestjs/common';
import { InjectSearchConfig, SearchConfig, getPoiDefinition } from '@libs/common';
import { ScoringSignal } from '@libs/models';

import { DataQualityService } from '../../data-quality/data-quality.service';

import { BaseGate, GateContext, GateResult } from './base.gate';

/** Bonus only: a nice-to-have that is missing or far away costs nothing. */
@Injectable()
export class NiceToHaveGate extends BaseGate {
  public readonly name = 'niceToHave';

  public constructor(
    @InjectSearchConfig() config: SearchConfig,
    private readonly dataQuality: DataQualityService,
  ) {
    super(config);
  }

  public evaluate({ attributes, intent }: GateContext): GateResult {
    const signals: ScoringSignal[] = [];

    for (const key of new Set(intent.niceToHave)) {
      const definition = getPoiDefinition(this.config.poiCatalog, key);
      const distance = this.dataQuality.verifiedDistance(attributes, key);

      if (definition && distance !== null && distance <= definition.radius) {
        signals.push(
          this.positive(
            `nice_to_have:${key}`,
            `Bonus: ${this.describePoi(attributes, key, definition)} nearby (${this.formatMeters(distance)})`,
            this.config.weights.niceToHavePoi,
          ),
        );
      }
    }

    return this.pass(signals);
  }
}
