import { SignalKind } from '@libs/common';

import {
  TARGET,
  buildConfig,
  makeAttributes,
  makeContext,
  makeIntent,
  northOfTarget,
} from '../../../testing/scoring.fixtures';
import { DataQualityService } from '../../data-quality/data-quality.service';

import { AvoidLocationGate } from './avoid-location.gate';
import { TargetLocationGate } from './target-location.gate';

describe('location gates', () => {
  const config = buildConfig();
  const dataQuality = new DataQualityService(config);
  const intent = makeIntent();

  const at = (deltaLat: number) => makeAttributes(northOfTarget(deltaLat));

  describe('TargetLocationGate', () => {
    const gate = new TargetLocationGate(config, dataQuality);
    const evaluate = (attributes = at(0), target = gate) =>
      target.evaluate(makeContext(dataQuality, attributes, intent, { targetCoords: TARGET }));

    it('is skipped without target coordinates', () => {
      expect(gate.evaluate(makeContext(dataQuality, at(0.5), intent))).toEqual({ signals: [] });
    });

    it('rewards the very close tier', () => {
      expect(evaluate(at(0.01)).signals).toEqual([
        {
          kind: SignalKind.Positive,
          code: 'target_location',
          message: 'Very close to target location (1.1 km)',
          contribution: 3,
        },
      ]);
    });

    it('rewards the close tier', () => {
      expect(evaluate(at(0.03)).signals[0]).toMatchObject({
        message: 'Convenient distance to target location (3.3 km)',
        contribution: 1.5,
      });
    });

    it('is neutral between close and the far limit', () => {
      expect(evaluate(at(0.06)).signals).toEqual([
        {
          kind: SignalKind.Warning,
          code: 'target_location',
          message: 'Moderate distance from target location (6.7 km)',
          contribution: 0,
        },
      ]);
    });

    it('disqualifies beyond the far limit', () => {
      expect(evaluate(at(0.1)).disqualificationReason).toBe('Too far from target location: 11.1 km (limit 10.0 km)');
    });

    it('penalises instead when the constraint is soft', () => {
      const softGate = new TargetLocationGate(buildConfig({ softConstraints: 'targetLocationTooFar' }), dataQuality);

      const result = evaluate(at(0.1), softGate);

      expect(result.disqualificationReason).toBeUndefined();
      expect(result.signals[0]).toMatchObject({ kind: SignalKind.Negative, contribution: -2 });
    });

    it('warns when the listing has no coordinates', () => {
      expect(evaluate(makeAttributes()).signals).toEqual([
        {
          kind: SignalKind.Warning,
          code: 'target_location',
          message: 'No listing coordinates (cannot measure distance to target)',
          contribution: 0,
        },
      ]);
    });
  });

  describe('AvoidLocationGate', () => {
    const gate = new AvoidLocationGate(config, dataQuality);
    const evaluate = (attributes = at(0)) =>
      gate.evaluate(makeContext(dataQuality, attributes, intent, { avoidCoords: TARGET }));

    it.each([
      [0.01, -5, 'Very close to avoided location (1.1 km)'],
      [0.03, -2, 'Within range of avoided location (3.3 km)'],
      [0.06, 0.5, 'Away from avoided location (6.7 km)'],
      [0.5, 0.5, 'Away from avoided location (55.6 km)'],
    ])('scores a listing %p degrees away', (deltaLat, contribution, message) => {
      const result = evaluate(at(deltaLat));

      expect(result.disqualificationReason).toBeUndefined();
      expect(result.signals).toHaveLength(1);
      expect(result.signals[0]).toMatchObject({ code: 'avoid_location', contribution, message });
    });

    it('warns when the listing has no coordinates', () => {
      expect(evaluate(makeAttributes()).signals[0]).toMatchObject({
        kind: SignalKind.Warning,
        message: 'No listing coordinates (cannot check distance to avoided location)',
      });
    });
  });
});
