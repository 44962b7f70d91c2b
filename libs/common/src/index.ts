export * from './config';
export * from './constants/geo.constants';
export * from './enums';
export * from './types/geo.types';
export * from './utils';
