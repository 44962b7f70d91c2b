export * from './proximity-curve.enum';
export * from './signal-kind.enum';
