/**
 * Main type exports for the serving core
 */

export type * from './models.js';
export * from './schemas/index.js';
