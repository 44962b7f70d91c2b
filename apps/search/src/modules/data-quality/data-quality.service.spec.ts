import { buildConfig, makeAttributes, makeIntent } from '../../testing/scoring.fixtures';

import { DataQualityService } from './data-quality.service';

describe('DataQualityService', () => {
  const service = new DataQualityService(buildConfig());

  describe('classify', () => {
    it.each([
      [null, 'missing'],
      [undefined, 'missing'],
      [99999, 'missing'],
      [99999.0, 'missing'],
      [90000, 'missing'],
      [123456, 'missing'],
      ['abc', 'unusable'],
      [Number.NaN, 'unusable'],
      [-5, 'unusable'],
      [{ meters: 300 }, 'unusable'],
      [0, 'present'],
      [450, 'present'],
      ['450', 'present'],
      [89999.5, 'present'],
    ])('classifies %p as %s', (value, expected) => {
      expect(service.classify(value)).toBe(expected);
    });
  });

  describe('verifiedDistance', () => {
    const attributes = makeAttributes({
      poiDistances: { school: 850, market: 99999, park: 'near', hospital: ' 1200 ' },
    });

    it('returns present distances', () => {
      expect(service.verifiedDistance(attributes, 'school')).toBe(850);
      expect(service.verifiedDistance(attributes, 'hospital')).toBe(1200);
    });

    it('never turns a sentinel into a distance', () => {
      expect(service.verifiedDistance(attributes, 'market')).toBeNull();
    });

    it('returns null for malformed and absent values', () => {
      expect(service.verifiedDistance(attributes, 'park')).toBeNull();
      expect(service.verifiedDistance(attributes, 'gym')).toBeNull();
    });
  });

  describe('assess', () => {
    it('partitions the checked keys and warns for missing required ones', () => {
      const attributes = makeAttributes({
        id: 'A-1',
        assetTypeId: 3,
        sellingPrice: 3000000,
        poiDistances: { school: 500, market: 99999, bts_station: 'n/a' },
      });

      const report = service.assess(attributes, ['school', 'market'], ['bts_station', 'unknown_key']);

      expect(report).toEqual({
        assetId: 'A-1',
        availablePoiKeys: ['school'],
        missingPoiKeys: ['market', 'bts_station'],
        unusablePoiKeys: ['bts_station'],
        hasValidPrice: true,
        hasValidAssetType: true,
        hasValidLocation: false,
        qualityScore: expect.closeTo(0.4 / 3 + 0.5, 12),
        warnings: ['No data for Fresh market (cannot verify)'],
      });
    });

    it('does not warn for missing optional keys', () => {
      const report = service.assess(makeAttributes(), [], ['gym']);

      expect(report.missingPoiKeys).toEqual(['gym']);
      expect(report.warnings).toEqual([]);
    });

    it('scores a listing with complete data as 1', () => {
      const attributes = makeAttributes({
        assetTypeId: 4,
        sellingPrice: 5500000,
        locality: 'Baan Suan',
        poiDistances: { school: 300 },
      });

      expect(service.assess(attributes, ['school']).qualityScore).toBeCloseTo(1, 12);
    });

    it('gives no POI completeness when nothing was checked', () => {
      const attributes = makeAttributes({ assetTypeId: 4, sellingPrice: 5500000, road: 'Rama 9' });

      expect(service.assess(attributes, []).qualityScore).toBeCloseTo(0.6, 12);
    });

    it('keeps the unrounded POI completeness share', () => {
      const attributes = makeAttributes({ poiDistances: { school: 100 } });

      const report = service.assess(attributes, ['school', 'hospital', 'park']);

      expect(report.availablePoiKeys).toEqual(['school']);
      expect(report.qualityScore).toBeCloseTo(0.4 / 3, 12);
      expect(report.qualityScore).not.toBe(0.13);
    });

    it('accepts valid coordinates as a location', () => {
      const attributes = makeAttributes({ latitude: 13.7, longitude: 100.5, locality: '   ' });

      const report = service.assess(attributes, []);

      expect(report.hasValidLocation).toBe(true);
      expect(report.qualityScore).toBe(0.1);
    });

    it('rejects a zero price', () => {
      expect(service.assess(makeAttributes({ sellingPrice: 0 }), []).hasValidPrice).toBe(false);
    });
  });

  describe('assessForIntent', () => {
    it('requires must-haves and checks the other POI lists', () => {
      const intent = makeIntent({ mustHave: ['school'], niceToHave: ['park'], avoidPoi: ['market'] });
      const attributes = makeAttributes({ poiDistances: { park: 400 } });

      const report = service.assessForIntent(attributes, intent);

      expect(report.availablePoiKeys).toEqual(['park']);
      expect(report.missingPoiKeys).toEqual(['school', 'market']);
      expect(report.warnings).toEqual(['No data for School (cannot verify)']);
    });
  });
});
