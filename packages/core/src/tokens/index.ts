export * from './token-generator.js';
