export * from './base.gate';
export * from './asset-type.gate';
export * from './transport-mode.gate';
export * from './rapid-transit.gate';
export * from './must-have-poi.gate';
export * from './pet-policy.gate';
export * from './nice-to-have.gate';
export * from './avoid-poi.gate';
export * from './price-range.gate';
export * from './target-location.gate';
export * from './avoid-location.gate';
