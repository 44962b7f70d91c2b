export * from './types';
export * from './dto';
