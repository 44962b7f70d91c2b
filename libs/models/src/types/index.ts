export * from './intent.types';
export * from './candidate.types';
export * from './data-quality.types';
export * from './scoring.types';
