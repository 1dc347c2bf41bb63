/**
 * Persisted registry state schemas
 *
 * Shape of `<models_dir>/active_versions.json`.
 *
 * @module schemas/registry
 */

import { z } from 'zod';
import { ModelNameSchema, ModelVersionSchema } from './common.js';

export const REGISTRY_STATE_FORMAT_VERSION = 1;

/**
 * One model's persisted activation state
 */
export const PersistedModelStateSchema = z.object({
  current: ModelVersionSchema,
  history: z.array(ModelVersionSchema),
});

/**
 * Envelope of the state file. Model entries are validated one by one so a
 * single bad entry does not take the other models down with it.
 */
export const PersistedRegistryStateSchema = z.object({
  version: z.literal(REGISTRY_STATE_FORMAT_VERSION),
  models: z.record(ModelNameSchema, z.unknown()),
});

export type PersistedModelState = z.infer<typeof PersistedModelStateSchema>;
export type PersistedRegistryState = z.infer<typeof PersistedRegistryStateSchema>;
