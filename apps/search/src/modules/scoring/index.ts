export * from './scoring.module';
export * from './structured-scorer.service';
export * from './mappers';
