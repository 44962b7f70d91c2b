import { SignalKind } from '@libs/common';

import { buildConfig, makeAttributes, makeContext, makeIntent } from '../../../testing/scoring.fixtures';
import { DataQualityService } from '../../data-quality/data-quality.service';

import { NiceToHaveGate } from './nice-to-have.gate';

describe('NiceToHaveGate', () => {
  const config = buildConfig();
  const dataQuality = new DataQualityService(config);
  const gate = new NiceToHaveGate(config, dataQuality);
  const intent = makeIntent({ niceToHave: ['park', 'gym', 'cafe', 'rooftop_bar'] });

  it('adds a fixed bonus per POI inside its radius', () => {
    const attributes = makeAttributes({
      poiDistances: { park: 800, cafe: 1500 },
      poiNames: { park: 'Lumphini Park' },
    });

    expect(gate.evaluate(makeContext(dataQuality, attributes, intent)).signals).toEqual([
      {
        kind: SignalKind.Positive,
        code: 'nice_to_have:park',
        message: "Bonus: Public park 'Lumphini Park' nearby (800 m)",
        contribution: 0.25,
      },
    ]);
  });

  it('never penalises', () => {
    const attributes = makeAttributes({ poiDistances: { park: 99999, gym: 'closed', cafe: 5000 } });

    expect(gate.evaluate(makeContext(dataQuality, attributes, intent))).toEqual({ signals: [] });
  });
});
