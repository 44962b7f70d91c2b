import { Injectable } from '@nestjs/common';
import { InjectSearchConfig, SearchConfig, resolveAssetTypeIds } from '@libs/common';
import { CandidateAttributes } from '@libs/models';

import { BaseGate, GateContext, GateResult } from './base.gate';

/**
 * Hard gate: the listing's asset type ID must be among the IDs mapped from the
 * requested labels. Unknown labels map to nothing, so a request made only of
 * unknown labels matches no listing.
 */
@Injectable()
export class AssetTypeGate extends BaseGate {
  public readonly name = 'assetType';

  public constructor(@InjectSearchConfig() config: SearchConfig) {
    super(config);
  }

  public evaluate({ attributes, intent }: GateContext): GateResult {
    if (intent.assetTypes.length === 0) {
      return this.pass();
    }

    const accepted = resolveAssetTypeIds(this.config.assetTypes, intent.assetTypes);
    const actual = this.describeAssetType(attributes);

    if (attributes.assetTypeId !== null && accepted.has(attributes.assetTypeId)) {
      return this.pass([
        this.positive('asset_type_match', `Matches requested asset type (${actual})`, this.config.weights.assetTypeMatch),
      ]);
    }

    const reason = `Asset type mismatch: wanted ${intent.assetTypes.join(', ')}, found ${actual}`;

    if (this.config.hardConstraints.wrongAssetType) {
      return this.disqualify(reason);
    }

    return this.pass([this.negative('asset_type_mismatch', reason, this.config.weights.assetTypeMismatch)]);
  }

  private describeAssetType(attributes: CandidateAttributes): string {
    if (attributes.assetTypeName) {
      return attributes.assetTypeName;
    }

    return attributes.assetTypeId !== null ? `type #${attributes.assetTypeId}` : 'unknown type';
  }
}
