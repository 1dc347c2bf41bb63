/**
 * Zod schema exports for runtime validation
 *
 * These schemas validate every boundary of the serving core: the YAML
 * config, persisted registry state, model artifacts and reference
 * distributions.
 *
 * @example
 * ```typescript
 * import { RuntimeConfigSchema } from 'model-serving-core';
 *
 * const result = RuntimeConfigSchema.safeParse(yaml.load(raw));
 * if (!result.success) {
 *   console.error(result.error.issues);
 * }
 * ```
 */

// Common primitives
export * from './common.js';

// Runtime config and model catalog
export * from './config.js';

// Persisted registry state
export * from './registry.js';

// Model artifacts
export * from './artifacts.js';

// Drift reference distributions
export * from './drift.js';
