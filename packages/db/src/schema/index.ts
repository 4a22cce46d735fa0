export * from './core';
export * from './expenses';
export * from './currency';
