export type * from './metrics.js';
export * from './inventory.js';
