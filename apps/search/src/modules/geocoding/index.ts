export * from './geocoding.module';
export * from './geocoding.service';
