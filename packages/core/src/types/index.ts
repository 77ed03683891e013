export * from './share-link.js';
export * from './principal.js';
export * from './usage-record.js';
export * from './rate-limit.js';
