export * from './logger.js';
export * from './retry.js';
