/**
 * Common Zod schema primitives shared by config, persisted state and
 * request validation.
 */

import { z } from 'zod';

/**
 * Non-empty string validator
 */
export const NonEmptyString = z.string().min(1, 'Cannot be empty');

/**
 * Model name: lowercase identifiers only, so names are safe as file name parts
 */
export const ModelNameSchema = z
  .string()
  .regex(/^[a-z0-9][a-z0-9_-]*$/, 'Model name must match [a-z0-9][a-z0-9_-]*');

/**
 * Version label (e.g. 'v1', '2024.10.1')
 */
export const ModelVersionSchema = z
  .string()
  .regex(/^[A-Za-z0-9][A-Za-z0-9._-]*$/, 'Version must match [A-Za-z0-9][A-Za-z0-9._-]*')
  .max(64, 'Version cannot exceed 64 characters');

/**
 * Probability / confidence value
 */
export const Probability = z
  .number()
  .min(0, 'Must be at least 0')
  .max(1, 'Cannot exceed 1');

/**
 * Feature vector: non-empty list of finite numbers
 */
export const FeatureVectorSchema = z
  .array(z.number().finite('Feature values must be finite'))
  .min(1, 'Feature vector cannot be empty');

/**
 * Free-form metadata object
 */
export const MetadataSchema = z.record(z.string(), z.unknown());
