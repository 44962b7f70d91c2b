import { Injectable } from '@nestjs/common';
import { InjectSearchConfig, SearchConfig, haversineDistance } from '@libs/common';

import { DataQualityService } from '../../data-quality/data-quality.service';

import { BaseGate, GateContext, GateResult } from './base.gate';

@Injectable()
export class TargetLocationGate extends BaseGate {
  public readonly name = 'targetLocation';

  public constructor(
    @InjectSearchConfig() config: SearchConfig,
    private readonly dataQuality: DataQualityService,
  ) {
    super(config);
  }

  public evaluate({ attributes, targetCoords }: GateContext): GateResult {
    if (!targetCoords) {
      return this.pass();
    }

    const coords = this.dataQuality.verifiedCoordinates(attributes);
    if (!coords) {
      return this.pass([
        this.warning('target_location', 'No listing coordinates (cannot measure distance to target)'),
      ]);
    }

    const { weights, targetLocation, hardConstraints } = this.config;
    const distance = haversineDistance(coords, targetCoords);
    const km = this.formatKm(distance);

    if (distance <= targetLocation.radiusVeryClose) {
      return this.pass([
        this.positive('target_location', `Very close to target location (${km})`, weights.locationVeryClose),
      ]);
    }

    if (distance <= targetLocation.radiusClose) {
      return this.pass([
        this.positive('target_location', `Convenient distance to target location (${km})`, weights.locationClose),
      ]);
    }

    if (distance > targetLocation.radiusFarLimit) {
      if (hardConstraints.targetLocationTooFar) {
        return this.disqualify(
          `Too far from target location: ${km} (limit ${this.formatKm(targetLocation.radiusFarLimit)})`,
        );
      }

      return this.pass([this.negative('target_location', `Far from target location (${km})`, weights.locationFar)]);
    }

    return this.pass([this.warning('target_location', `Moderate distance from target location (${km})`)]);
  }
}
