export * from './gateway-error.js';
export * from './to-http-error.js';
