export * from './rate-limit-config.js';
export type * from './share-link-store.js';
export type * from './rate-limit-store.js';
export type * from './usage-ledger-store.js';
