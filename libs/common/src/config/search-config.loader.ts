import { readFileSync } from 'fs';
import { ClassConstructor, plainToInstance } from 'class-transformer';
import { ValidationError, validateSync } from 'class-validator';

import { deepFreeze } from '../utils/object.utils';

import poiCatalogData from './data/poi-catalog.json';
import assetTypesData from './data/asset-types.json';
import {
  DEFAULT_AVOID_LOCATION,
  DEFAULT_DATA_QUALITY,
  DEFAULT_HARD_CONSTRAINTS,
  DEFAULT_POI_RULES,
  DEFAULT_RANKING,
  DEFAULT_SCORING_WEIGHTS,
  DEFAULT_TARGET_LOCATION,
} from './search-config.defaults';
import { AssetTypeConfigDto, PoiDefinitionDto, SearchConfigOverridesDto } from './search-config.dto';
import {
  AssetTypeConfig,
  HardConstraint,
  PoiDefinition,
  SearchConfig,
  isHardConstraint,
} from './search-config.types';

export interface SearchConfigSource {
  /** Path to a JSON file shaped like SearchConfigOverridesDto */
  overridesFile?: string;
  /** Comma separated hard constraints to downgrade to penalties */
  softConstraints?: string;
}

export class SearchConfigError extends Error {
  public constructor(message: string) {
    super(message);
    this.name = SearchConfigError.name;
  }
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function formatErrors(errors: ValidationError[], parent = ''): string[] {
  return errors.flatMap((error) => {
    const path = parent ? `${parent}.${error.property}` : error.property;
    const own = Object.values(error.constraints ?? {}).map((message) => `${path}: ${message}`);

    return [...own, ...formatErrors(error.children ?? [], path)];
  });
}

function validateOrThrow<T extends object>(cls: ClassConstructor<T>, plain: unknown, context: string): T {
  if (!isPlainObject(plain)) {
    throw new SearchConfigError(`${context}: expected an object`);
  }

  const instance = plainToInstance(cls, plain, { exposeUnsetFields: false });
  const errors = validateSync(instance, { whitelist: true, forbidNonWhitelisted: true });

  if (errors.length > 0) {
    throw new SearchConfigError(`${context}: ${formatErrors(errors).join('; ')}`);
  }

  return instance;
}

export function parsePoiCatalog(raw: unknown, context: string): Record<string, PoiDefinition> {
  if (!isPlainObject(raw)) {
    throw new SearchConfigError(`${context}: expected an object of POI definitions`);
  }

  const catalog: Record<string, PoiDefinition> = {};

  for (const [key, value] of Object.entries(raw)) {
    const dto = validateOrThrow(PoiDefinitionDto, value, `${context}.${key}`);

    catalog[key] = {
      radius: dto.radius,
      weight: dto.weight,
      curve: dto.curve,
      category: dto.category,
      displayName: dto.displayName,
      isRapidTransit: dto.isRapidTransit,
    };
  }

  return catalog;
}

export function parseAssetTypes(raw: unknown, context: string): AssetTypeConfig {
  const dto = validateOrThrow(AssetTypeConfigDto, raw, context);
  const labels: Record<string, number[]> = {};

  for (const [label, ids] of Object.entries(dto.labels)) {
    if (!Array.isArray(ids) || !ids.every((id): id is number => Number.isInteger(id))) {
      throw new SearchConfigError(`${context}.labels.${label}: expected an array of integer asset type IDs`);
    }

    labels[label.trim().toLowerCase()] = [...ids];
  }

  return {
    labels,
    condoAssetTypeIds: [...dto.condoAssetTypeIds],
    petFriendlyAssetTypeIds: [...dto.petFriendlyAssetTypeIds],
  };
}

export function parseSoftConstraints(value: string | undefined): HardConstraint[] {
  if (!value) {
    return [];
  }

  const names = value
    .split(',')
    .map((name) => name.trim())
    .filter((name) => name.length > 0);

  return names.map((name) => {
    if (!isHardConstraint(name)) {
      throw new SearchConfigError(`Unknown hard constraint in SEARCH_SOFT_CONSTRAINTS: ${name}`);
    }

    return name;
  });
}

function readOverrides(file: string): SearchConfigOverridesDto {
  let parsed: unknown;

  try {
    parsed = JSON.parse(readFileSync(file, 'utf8'));
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new SearchConfigError(`Cannot read search config file ${file}: ${reason}`);
  }

  return validateOrThrow(SearchConfigOverridesDto, parsed, file);
}

function assertOrderedRadii(config: SearchConfig): void {
  const { radiusVeryClose, radiusClose, radiusFarLimit } = config.targetLocation;
  if (!(radiusVeryClose <= radiusClose && radiusClose <= radiusFarLimit)) {
    throw new SearchConfigError('targetLocation radii must satisfy radiusVeryClose <= radiusClose <= radiusFarLimit');
  }

  if (config.avoidLocation.radiusHitHard > config.avoidLocation.radiusHitSoft) {
    throw new SearchConfigError('avoidLocation radii must satisfy radiusHitHard <= radiusHitSoft');
  }
}

/**
 * Builds the immutable search configuration: built-in defaults and data files,
 * then the optional override file, then the soft-constraint list.
 * Throws SearchConfigError on anything invalid; the result is deep-frozen.
 */
export function loadSearchConfig(source: SearchConfigSource = {}): SearchConfig {
  const overrides = source.overridesFile ? readOverrides(source.overridesFile) : undefined;

  const poiCatalog = {
    ...parsePoiCatalog(poiCatalogData, 'poi-catalog.json'),
    ...(overrides?.poiCatalog ? parsePoiCatalog(overrides.poiCatalog, 'poiCatalog') : {}),
  };

  const assetTypes = overrides?.assetTypes
    ? parseAssetTypes(overrides.assetTypes, 'assetTypes')
    : parseAssetTypes(assetTypesData, 'asset-types.json');

  const hardConstraints: Record<HardConstraint, boolean> = {
    ...DEFAULT_HARD_CONSTRAINTS,
    ...overrides?.hardConstraints,
  };
  for (const name of parseSoftConstraints(source.softConstraints)) {
    hardConstraints[name] = false;
  }

  const config: SearchConfig = {
    poiCatalog,
    assetTypes,
    weights: { ...DEFAULT_SCORING_WEIGHTS, ...overrides?.weights },
    hardConstraints,
    targetLocation: { ...DEFAULT_TARGET_LOCATION, ...overrides?.targetLocation },
    avoidLocation: { ...DEFAULT_AVOID_LOCATION, ...overrides?.avoidLocation },
    poiRules: { ...DEFAULT_POI_RULES, ...overrides?.poiRules },
    dataQuality: { ...DEFAULT_DATA_QUALITY, ...overrides?.dataQuality },
    ranking: {
      ...DEFAULT_RANKING,
      ...overrides?.ranking,
      weights: { ...DEFAULT_RANKING.weights, ...overrides?.ranking?.weights },
    },
  };

  assertOrderedRadii(config);

  return deepFreeze(config);
}
