export * from './data-quality.module';
export * from './data-quality.service';
