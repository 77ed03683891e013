export * from './gateway.js';
export * from './operation.js';
