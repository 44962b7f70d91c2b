export * from './candidate-attributes.mapper';
export * from './intent.mapper';
