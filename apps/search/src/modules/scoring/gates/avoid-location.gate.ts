import { Injectable } from '@nestjs/common';
import { InjectSearchConfig, SearchConfig, haversineDistance } from '@libs/common';

import { DataQualityService } from '../../data-quality/data-quality.service';

import { BaseGate, GateContext, GateResult } from './base.gate';

/** Soft only: closeness to an avoided place is penalised, never disqualifying. */
@Injectable()
export class AvoidLocationGate extends BaseGate {
  public readonly name = 'avoidLocation';

  public constructor(
    @InjectSearchConfig() config: SearchConfig,
    private readonly dataQuality: DataQualityService,
  ) {
    super(config);
  }

  public evaluate({ attributes, avoidCoords }: GateContext): GateResult {
    if (!avoidCoords) {
      return this.pass();
    }

    const coords = this.dataQuality.verifiedCoordinates(attributes);
    if (!coords) {
      return this.pass([
        this.warning('avoid_location', 'No listing coordinates (cannot check distance to avoided location)'),
      ]);
    }

    const { weights, avoidLocation } = this.config;
    const distance = haversineDistance(coords, avoidCoords);
    const km = this.formatKm(distance);

    if (distance <= avoidLocation.radiusHitHard) {
      return this.pass([
        this.negative('avoid_location', `Very close to avoided location (${km})`, weights.avoidLocationHitHard),
      ]);
    }

    if (distance <= avoidLocation.radiusHitSoft) {
      return this.pass([
        this.negative('avoid_location', `Within range of avoided location (${km})`, weights.avoidLocationHitSoft),
      ]);
    }

    return this.pass([
      this.positive('avoid_location', `Away from avoided location (${km})`, weights.avoidLocationSuccess),
    ]);
  }
}
