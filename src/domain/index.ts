export * from './types';
export * from './value-sets';
