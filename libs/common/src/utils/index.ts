export * from './geo.utils';
export * from './proximity.utils';
export * from './object.utils';
