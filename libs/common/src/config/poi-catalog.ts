import { hasOwnKey } from '../utils/object.utils';

import { AssetTypeConfig, PoiCatalog, PoiDefinition } from './search-config.types';

export function getPoiDefinition(catalog: PoiCatalog, key: string): PoiDefinition | undefined {
  return hasOwnKey(catalog, key) ? catalog[key] : undefined;
}

export function getPoiDisplayName(catalog: PoiCatalog, key: string): string {
  return getPoiDefinition(catalog, key)?.displayName ?? key;
}

export function getRapidTransitKeys(catalog: PoiCatalog): string[] {
  return Object.keys(catalog).filter((key) => catalog[key].isRapidTransit);
}

/** Union of asset type IDs accepted by the given labels; unknown labels add nothing. */
export function resolveAssetTypeIds(assetTypes: AssetTypeConfig, labels: readonly string[]): Set<number> {
  const accepted = new Set<number>();

  for (const label of labels) {
    const normalized = label.trim().toLowerCase();
    if (!hasOwnKey(assetTypes.labels, normalized)) {
      continue;
    }

    for (const id of assetTypes.labels[normalized]) {
      accepted.add(id);
    }
  }

  return accepted;
}
