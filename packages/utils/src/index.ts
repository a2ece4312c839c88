// Core utilities
export * from './id';
export * from './logger';
export * from './errors';
export * from './result';
