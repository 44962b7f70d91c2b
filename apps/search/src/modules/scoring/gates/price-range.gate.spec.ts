import { SignalKind } from '@libs/common';
import { PriceRange } from '@libs/models';

import { buildConfig, makeAttributes, makeContext, makeIntent } from '../../../testing/scoring.fixtures';
import { DataQualityService } from '../../data-quality/data-quality.service';

import { PriceRangeGate } from './price-range.gate';

describe('PriceRangeGate', () => {
  const config = buildConfig();
  const dataQuality = new DataQualityService(config);
  const gate = new PriceRangeGate(config);
  const range = { min: 3000000, max: 5000000 };

  const evaluate = (sellingPrice: number | null, priceRange: PriceRange = range) =>
    gate.evaluate(makeContext(dataQuality, makeAttributes({ sellingPrice }), makeIntent({ priceRange })));

  it('does nothing without bounds', () => {
    expect(evaluate(4000000, { min: null, max: null })).toEqual({ signals: [] });
  });

  it('warns when the price is unset', () => {
    expect(evaluate(null).signals).toEqual([
      { kind: SignalKind.Warning, code: 'price_missing', message: 'No price data', contribution: 0 },
    ]);
  });

  it('treats both bounds as inclusive', () => {
    expect(evaluate(5000000).signals).toEqual([
      {
        kind: SignalKind.Positive,
        code: 'price_range',
        message: 'Price within requested range (5,000,000)',
        contribution: 0.5,
      },
    ]);
    expect(evaluate(3000000).signals[0].contribution).toBe(0.5);
  });

  it('penalises prices outside the range', () => {
    expect(evaluate(2500000).signals).toEqual([
      {
        kind: SignalKind.Negative,
        code: 'price_range',
        message: 'Price below requested range (2,500,000 < 3,000,000)',
        contribution: -3,
      },
    ]);
    expect(evaluate(6000000).signals[0].message).toBe('Price above requested range (6,000,000 > 5,000,000)');
  });

  it('accepts a single bound', () => {
    expect(evaluate(4000000, { min: null, max: 5000000 }).signals[0].contribution).toBe(0.5);
    expect(evaluate(900000, { min: 1000000, max: null }).signals[0].contribution).toBe(-3);
  });
});
