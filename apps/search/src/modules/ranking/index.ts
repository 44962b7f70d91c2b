export * from './ranking.module';
export * from './ranking.service';
