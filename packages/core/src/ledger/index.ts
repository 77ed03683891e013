export * from './usage-ledger.js';
export * from './cost-estimator.js';
export * from './usage-metadata.js';
