export * from './search-config.types';
export * from './search-config.defaults';
export * from './search-config.dto';
export * from './search-config.loader';
export * from './search-config.module';
export * from './poi-catalog';
