export * from './errors';
export * from './utils';
export * from './constants';
export * from './types';
export * from './validation';
