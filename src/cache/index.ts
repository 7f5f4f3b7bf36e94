export * from './cache.ts';
export * from './connector.ts';
export * from './keys.ts';
export * from './memory-connector.ts';
export * from './redis-connector.ts';
