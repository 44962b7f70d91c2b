import { SignalKind } from '@libs/common';

import { buildConfig, makeAttributes, makeContext, makeIntent } from '../../../testing/scoring.fixtures';
import { DataQualityService } from '../../data-quality/data-quality.service';

import { MustHavePoiGate } from './must-have-poi.gate';

describe('MustHavePoiGate', () => {
  const config = buildConfig();
  const dataQuality = new DataQualityService(config);
  const gate = new MustHavePoiGate(config, dataQuality);
  const intent = makeIntent({ mustHave: ['school', 'hospital', 'bts_station', 'rooftop_bar'] });

  const evaluate = (poiDistances: Record<string, unknown>, target = gate) =>
    target.evaluate(makeContext(dataQuality, makeAttributes({ poiDistances }), intent));

  it('rewards POIs inside their radius', () => {
    const result = evaluate({ school: 500, hospital: 1500 });

    expect(result.disqualificationReason).toBeUndefined();
    expect(result.signals.map((s) => s.code)).toEqual(['must_have:school', 'must_have:hospital']);
    expect(result.signals[0].message).toBe('Near School (500 m)');
    expect(result.signals[0].contribution).toBeCloseTo(1.25, 10);
    expect(result.signals[1].contribution).toBeCloseTo(0.75, 10);
  });

  it('warns for missing data without penalty', () => {
    const result = evaluate({ hospital: 99999 });

    expect(result.disqualificationReason).toBeUndefined();
    expect(result.signals).toEqual([
      { kind: SignalKind.Warning, code: 'missing:school', message: 'No data for School (cannot verify)', contribution: 0 },
      {
        kind: SignalKind.Warning,
        code: 'missing:hospital',
        message: 'No data for Hospital (cannot verify)',
        contribution: 0,
      },
    ]);
  });

  it('disqualifies a verified POI beyond its radius and keeps earlier signals', () => {
    const result = evaluate({ school: 500, hospital: 4000 });

    expect(result.disqualificationReason).toBe('Wanted Hospital within 3000 m but nearest is 4000 m');
    expect(result.signals.map((s) => s.code)).toEqual(['must_have:school']);
  });

  it('leaves rapid transit and unknown keys to other gates', () => {
    expect(evaluate({ school: 100, hospital: 100, bts_station: 9000 }).signals).toHaveLength(2);
  });

  it('penalises instead when the constraint is soft', () => {
    const softGate = new MustHavePoiGate(buildConfig({ softConstraints: 'mustHavePoiTooFar' }), dataQuality);

    const result = evaluate({ school: 5000, hospital: 1500 }, softGate);

    expect(result.disqualificationReason).toBeUndefined();
    expect(result.signals[0]).toEqual({
      kind: SignalKind.Negative,
      code: 'must_have_too_far:school',
      message: 'Wanted School within 3000 m but nearest is 5000 m',
      contribution: -15,
    });
    expect(result.signals[1].code).toBe('must_have:hospital');
  });
});
