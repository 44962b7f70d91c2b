import { Injectable } from '@nestjs/common';
import { InjectSearchConfig, SearchConfig, getPoiDefinition } from '@libs/common';
import { CandidateAttributes, ScoringSignal } from '@libs/models';

import { DataQualityService } from '../../data-quality/data-quality.service';

import { BaseGate, GateContext, GateResult } from './base.gate';

@Injectable()
export class PetPolicyGate extends BaseGate {
  public readonly name = 'petPolicy';

  public constructor(
    @InjectSearchConfig() config: SearchConfig,
    private readonly dataQuality: DataQualityService,
  ) {
    super(config);
  }

  public evaluate({ attributes, intent }: GateContext): GateResult {
    const { weights } = this.config;

    if (intent.petFriendly === false) {
      return attributes.petFriendly === true
        ? this.pass([
            this.negative('pet_friendly_unwanted', 'Pet-friendly building (possible noise)', weights.petFriendlyUnwanted),
          ])
        : this.pass();
    }

    if (intent.petFriendly !== true) {
      return this.pass();
    }

    const signals = [this.policySignal(attributes)];
    const vetSignal = this.nearVetSignal(attributes);
    if (vetSignal) {
      signals.push(vetSignal);
    }

    return this.pass(signals);
  }

  private policySignal(attributes: CandidateAttributes): ScoringSignal {
    const { weights, assetTypes } = this.config;

    if (attributes.petFriendly === true) {
      return this.positive('pet_friendly', 'Pets allowed (stated)', weights.petFriendlyExplicit);
    }

    if (attributes.petFriendly === false) {
      return this.negative('pet_friendly', 'Pets not allowed (stated)', weights.petNotAllowed);
    }

    const assetTypeId = attributes.assetTypeId;

    if (assetTypeId !== null && assetTypes.condoAssetTypeIds.includes(assetTypeId)) {
      return this.negative('pet_friendly', 'Pets likely not allowed (most condos forbid them)', weights.petNotAllowed);
    }

    if (assetTypeId !== null && assetTypes.petFriendlyAssetTypeIds.includes(assetTypeId)) {
      return this.positive('pet_friendly', 'Pets likely allowed (low-rise house)', weights.petFriendlyInferred);
    }

    return this.negative('pet_friendly', 'Pet policy not stated (needs confirmation)', weights.petStatusUnknown);
  }

  private nearVetSignal(attributes: CandidateAttributes): ScoringSignal | null {
    const { veterinaryKey } = this.config.poiRules;
    const definition = getPoiDefinition(this.config.poiCatalog, veterinaryKey);
    if (!definition) {
      return null;
    }

    const distance = this.dataQuality.verifiedDistance(attributes, veterinaryKey);
    if (distance === null || distance > definition.radius) {
      return null;
    }

    return this.positive(
      'near_vet',
      `Near ${this.describePoi(attributes, veterinaryKey, definition)} (${this.formatMeters(distance)})`,
      this.config.weights.nearVetBonus,
    );
  }
}
