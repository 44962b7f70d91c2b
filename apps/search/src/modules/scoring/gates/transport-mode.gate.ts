import { Injectable } from '@nestjs/common';
import { InjectSearchConfig, SearchConfig, getPoiDisplayName, getRapidTransitKeys } from '@libs/common';

import { DataQualityService } from '../../data-quality/data-quality.service';

import { BaseGate, GateContext, GateResult } from './base.gate';

/**
 * Hard gate against the skytrain/railway trap: a listing next to a State
 * Railway station must not satisfy a request for BTS/MRT.
 *
 * Runs only when a rapid-transit key is a must-have. Rapid transit counts as
 * present when any rapid-transit key is verified inside its catalog radius;
 * legacy rail when its verified distance is under the looser legacyRailRadius.
 */
@Injectable()
export class TransportModeGate extends BaseGate {
  public readonly name = 'transportMode';

  public constructor(
    @InjectSearchConfig() config: SearchConfig,
    private readonly dataQuality: DataQualityService,
  ) {
    super(config);
  }

  public evaluate({ attributes, intent }: GateContext): GateResult {
    const { poiCatalog, poiRules } = this.config;
    const rapidKeys = getRapidTransitKeys(poiCatalog);

    if (!rapidKeys.some((key) => intent.mustHave.includes(key))) {
      return this.pass();
    }

    const rapidDistances = rapidKeys.map((key) => ({
      key,
      distance: this.dataQuality.verifiedDistance(attributes, key),
    }));
    const hasRapidTransit = rapidDistances.some(
      ({ key, distance }) => distance !== null && distance < poiCatalog[key].radius,
    );

    const railDistance = this.dataQuality.verifiedDistance(attributes, poiRules.legacyRailKey);

    if (hasRapidTransit || railDistance === null || railDistance >= poiRules.legacyRailRadius) {
      return this.pass();
    }

    const rapidDetail = rapidDistances
      .map(({ key, distance }) => `${getPoiDisplayName(poiCatalog, key)}: ${distance === null ? 'no data' : this.formatMeters(distance)}`)
      .join(', ');
    const railDetail = `${getPoiDisplayName(poiCatalog, poiRules.legacyRailKey)}: ${this.formatMeters(railDistance)}`;
    const reason = `Wanted rapid transit but only legacy rail is nearby (${rapidDetail}, ${railDetail})`;

    if (this.config.hardConstraints.wrongTransportType) {
      return this.disqualify(reason);
    }

    return this.pass([this.negative('transport_mismatch', reason, this.config.weights.transportMismatch)]);
  }
}
