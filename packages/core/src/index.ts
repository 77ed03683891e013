export * from './types/index.js';
export * from './stores/index.js';
export * from './errors/index.js';
export * from './tokens/index.js';
export * from './share/index.js';
export * from './rate-limit/index.js';
export * from './ledger/index.js';
export * from './gateway/index.js';
export * from './config/index.js';
export * from './utils/index.js';
export * from './create-governance.js';
