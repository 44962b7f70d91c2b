import { Injectable } from '@nestjs/common';
import { Intent, IntentDto } from '@libs/models';

@Injectable()
export class IntentMapper {
  public toIntent(dto: IntentDto): Intent {
    return {
      assetTypes: this.normalizeKeys(dto.asset_types),
      mustHave: this.normalizeKeys(dto.must_have),
      niceToHave: this.normalizeKeys(dto.nice_to_have),
      avoidPoi: this.normalizeKeys(dto.avoid_poi),
      petFriendly: dto.pet_friendly ?? null,
      priceRange: {
        min: dto.price_range?.min ?? null,
        max: dto.price_range?.max ?? null,
      },
    };
  }

  // Trimmed, non-empty, first occurrence wins
  private normalizeKeys(keys: string[] | undefined): string[] {
    const seen = new Set<string>();

    for (const key of keys ?? []) {
      const trimmed = key.trim();
      if (trimmed) {
        seen.add(trimmed);
      }
    }

    return [...seen];
  }
}
