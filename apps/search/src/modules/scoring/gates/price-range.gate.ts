import { Injectable } from '@nestjs/common';
import { InjectSearchConfig, SearchConfig } from '@libs/common';

import { BaseGate, GateContext, GateResult } from './base.gate';

/** Bounds are inclusive; a reversed range is taken as given. */
@Injectable()
export class PriceRangeGate extends BaseGate {
  public readonly name = 'priceRange';

  public constructor(@InjectSearchConfig() config: SearchConfig) {
    super(config);
  }

  public evaluate({ attributes, intent }: GateContext): GateResult {
    const { min, max } = intent.priceRange;
    const { weights } = this.config;

    if (min === null && max === null) {
      return this.pass();
    }

    const price = attributes.sellingPrice;

    if (price === null || price <= 0) {
      return this.pass([this.warning('price_missing', 'No price data')]);
    }

    if (min !== null && price < min) {
      return this.pass([
        this.negative(
          'price_range',
          `Price below requested range (${this.formatAmount(price)} < ${this.formatAmount(min)})`,
          weights.priceOutOfRange,
        ),
      ]);
    }

    if (max !== null && price > max) {
      return this.pass([
        this.negative(
          'price_range',
          `Price above requested range (${this.formatAmount(price)} > ${this.formatAmount(max)})`,
          weights.priceOutOfRange,
        ),
      ]);
    }

    return this.pass([
      this.positive('price_range', `Price within requested range (${this.formatAmount(price)})`, weights.priceInRange),
    ]);
  }
}
