export * from './share-registry.js';
export type * from './resource-collaborator.js';
