export * from './tool.ts';
export * from './transaction-context.ts';
export * from './token-transfers.ts';
export * from './token-metadata.ts';
export * from './token-prices.ts';
export * from './monetary-values.ts';
export * from './name-resolver.ts';
export * from './transaction-explainer.ts';
