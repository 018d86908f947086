export * from './lib/errors';
export * from './lib/retry';
export * from './lib/text';
export * from './lib/cache';
