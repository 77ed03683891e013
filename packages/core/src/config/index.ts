export * from './governance-config.js';
export * from './parse-rate.js';
export * from './env.js';
