import { mkdtempSync, rmSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';

import { ProximityCurve } from '../enums';

import { DEFAULT_SCORING_WEIGHTS } from './search-config.defaults';
import { SearchConfigError, loadSearchConfig, parseSoftConstraints } from './search-config.loader';
import { getRapidTransitKeys, resolveAssetTypeIds } from './poi-catalog';

describe('loadSearchConfig', () => {
  let dir: string;

  const writeOverrides = (content: unknown): string => {
    const file = join(dir, `overrides-${Math.random().toString(36).slice(2)}.json`);
    writeFileSync(file, JSON.stringify(content));
    return file;
  };

  beforeAll(() => {
    dir = mkdtempSync(join(tmpdir(), 'search-config-'));
  });

  afterAll(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  describe('defaults', () => {
    const config = loadSearchConfig();

    it('loads the full POI catalog', () => {
      expect(Object.keys(config.poiCatalog)).toHaveLength(26);
      expect(config.poiCatalog.bts_station).toEqual({
        radius: 3000,
        weight: 1.2,
        curve: ProximityCurve.Exponential,
        displayName: 'BTS Skytrain station',
        category: 'transportation',
        isRapidTransit: true,
      });
    });

    it('flags only BTS and MRT as rapid transit', () => {
      expect(getRapidTransitKeys(config.poiCatalog)).toEqual(['bts_station', 'mrt']);
      expect(config.poiCatalog.train_station.isRapidTransit).toBe(false);
    });

    it('maps asset type labels to several IDs', () => {
      expect([...resolveAssetTypeIds(config.assetTypes, [' Condo '])]).toEqual([3, 12]);
      expect([...resolveAssetTypeIds(config.assetTypes, ['บ้าน', 'townhome'])]).toEqual([4, 15, 1]);
      expect(resolveAssetTypeIds(config.assetTypes, ['castle']).size).toBe(0);
    });

    it('enables every hard constraint', () => {
      expect(Object.values(config.hardConstraints).every(Boolean)).toBe(true);
    });

    it('is deeply frozen', () => {
      expect(Object.isFrozen(config)).toBe(true);
      expect(Object.isFrozen(config.weights)).toBe(true);
      expect(Object.isFrozen(config.poiCatalog.school)).toBe(true);
      expect(Object.isFrozen(config.assetTypes.labels.condo)).toBe(true);
    });
  });

  it('softens the listed hard constraints', () => {
    const config = loadSearchConfig({ softConstraints: 'mustHavePoiTooFar, avoidPoiTooClose' });

    expect(config.hardConstraints.mustHavePoiTooFar).toBe(false);
    expect(config.hardConstraints.avoidPoiTooClose).toBe(false);
    expect(config.hardConstraints.wrongAssetType).toBe(true);
  });

  it('rejects unknown constraint names', () => {
    expect(() => loadSearchConfig({ softConstraints: 'noSuchGate' })).toThrow(
      new SearchConfigError('Unknown hard constraint in SEARCH_SOFT_CONSTRAINTS: noSuchGate'),
    );
  });

  it('merges an override file over the defaults', () => {
    const config = loadSearchConfig({
      overridesFile: writeOverrides({
        weights: { assetTypeMatch: 4 },
        ranking: { topN: 10, weights: { semantic: 0.3 } },
        poiCatalog: {
          coworking: {
            radius: 1000,
            weight: 0.3,
            curve: 'linear',
            category: 'work',
            displayName: 'Coworking space',
            isRapidTransit: false,
          },
        },
      }),
    });

    expect(config.weights.assetTypeMatch).toBe(4);
    expect(config.weights.assetTypeMismatch).toBe(DEFAULT_SCORING_WEIGHTS.assetTypeMismatch);
    expect(config.ranking.topN).toBe(10);
    expect(config.ranking.weights).toEqual({ structured: 0.7, semantic: 0.3, lifestyle: 0.05 });
    expect(config.poiCatalog.coworking.displayName).toBe('Coworking space');
    expect(config.poiCatalog.school.radius).toBe(3000);
  });

  it('lets the soft-constraint list win over the override file', () => {
    const config = loadSearchConfig({
      overridesFile: writeOverrides({ hardConstraints: { wrongAssetType: true } }),
      softConstraints: 'wrongAssetType',
    });

    expect(config.hardConstraints.wrongAssetType).toBe(false);
  });

  it('rejects invalid values', () => {
    const file = writeOverrides({ weights: { assetTypeMatch: 'big' } });

    expect(() => loadSearchConfig({ overridesFile: file })).toThrow(SearchConfigError);
  });

  it('rejects unknown sections', () => {
    const file = writeOverrides({ scoring: { enabled: true } });

    expect(() => loadSearchConfig({ overridesFile: file })).toThrow(/property scoring should not exist/);
  });

  it('rejects an invalid POI definition', () => {
    const file = writeOverrides({ poiCatalog: { school: { radius: -5 } } });

    expect(() => loadSearchConfig({ overridesFile: file })).toThrow(/poiCatalog\.school/);
  });

  it('rejects unordered location radii', () => {
    const file = writeOverrides({ targetLocation: { radiusVeryClose: 8000 } });

    expect(() => loadSearchConfig({ overridesFile: file })).toThrow(
      'targetLocation radii must satisfy radiusVeryClose <= radiusClose <= radiusFarLimit',
    );
  });

  it('reports an unreadable file', () => {
    expect(() => loadSearchConfig({ overridesFile: join(dir, 'missing.json') })).toThrow(
      /^Cannot read search config file/,
    );
  });
});

describe('parseSoftConstraints', () => {
  it('returns nothing for an empty value', () => {
    expect(parseSoftConstraints(undefined)).toEqual([]);
    expect(parseSoftConstraints(' , ')).toEqual([]);
  });

  it('trims names', () => {
    expect(parseSoftConstraints(' wrongTransportType ,targetLocationTooFar')).toEqual([
      'wrongTransportType',
      'targetLocationTooFar',
    ]);
  });
});
