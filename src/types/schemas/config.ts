/**
 * Runtime Configuration Schemas
 *
 * Zod schemas for validating runtime.yaml configuration, including the
 * model catalog and cross-field checks between sections.
 *
 * @module schemas/config
 */

import { z } from 'zod';
import { ModelNameSchema, ModelVersionSchema } from './common.js';

/**
 * Version Registry Configuration
 */
export const RegistryConfigSchema = z.object({
  models_dir: z.string().min(1, 'Models directory cannot be empty'),
  state_file: z.string().min(1, 'State file cannot be empty'),
  history_depth: z.number().int().min(1, 'must be >= 1').max(100, 'must be <= 100'),
});

/**
 * Model Cache Configuration
 */
export const CacheConfigSchema = z.object({
  retry_cooldown_ms: z.number().int().min(0, 'must be >= 0'),
  max_cached_models: z.number().int().min(1, 'must be >= 1'),
  warmup_on_start: z.array(ModelNameSchema),
});

/**
 * Prediction Executor Configuration
 */
export const PredictionConfigSchema = z.object({
  default_timeout_ms: z.number().int().positive('Default timeout must be positive'),
  default_confidence_threshold: z.number().min(0).max(1),
  fallback_label: z.string().min(1, 'Fallback label cannot be empty'),
});

/**
 * Metrics Aggregator Configuration
 */
export const MetricsConfigSchema = z.object({
  tdigest_compression: z.number().int().min(10, 'must be >= 10'),
  snapshot_interval_ms: z.number().int().positive('must be positive'),
  max_low_confidence_events: z.number().int().min(0, 'must be >= 0'),
});

/**
 * Drift Detector Configuration
 */
export const DriftConfigSchema = z
  .object({
    enabled: z.boolean(),
    window_size: z.number().int().min(10, 'must be >= 10'),
    threshold: z.number().positive('must be positive'),
    bins: z.number().int().min(2, 'must be >= 2').max(100, 'must be <= 100'),
    reference_dir: z.string().min(1, 'Reference directory cannot be empty'),
    max_events: z.number().int().min(1, 'must be >= 1'),
  })
  .refine((data) => data.bins <= data.window_size, {
    message: 'must be <= window_size',
    path: ['bins'],
  });

/**
 * Telemetry Configuration
 */
export const TelemetryConfigSchema = z.object({
  enabled: z.boolean(),
  service_name: z.string().min(1, 'Service name cannot be empty'),
  prometheus_port: z.number().int().min(1024, 'must be >= 1024').max(65535, 'must be <= 65535'),
});

/**
 * Logging Configuration
 */
export const LoggingConfigSchema = z.object({
  level: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']),
});

/**
 * Catalog entry for one known model
 */
export const ModelCatalogEntrySchema = z
  .object({
    confidence_threshold: z.number().min(0).max(1).optional(),
    feature_count: z.number().int().positive().optional(),
    feature_names: z.array(z.string().min(1)).optional(),
    artifact_file: z
      .string()
      .regex(/^[A-Za-z0-9][A-Za-z0-9._-]*$/, 'must be a plain file name')
      .optional(),
    default_version: ModelVersionSchema.optional(),
  })
  .refine(
    (data) =>
      data.feature_names === undefined ||
      data.feature_count === undefined ||
      data.feature_names.length === data.feature_count,
    {
      message: 'must have feature_count entries',
      path: ['feature_names'],
    }
  );

/**
 * Complete Runtime Configuration Schema
 */
export const RuntimeConfigSchema = z
  .object({
    registry: RegistryConfigSchema,
    cache: CacheConfigSchema,
    prediction: PredictionConfigSchema,
    metrics: MetricsConfigSchema,
    drift: DriftConfigSchema,
    telemetry: TelemetryConfigSchema,
    logging: LoggingConfigSchema,
    models: z.record(ModelNameSchema, ModelCatalogEntrySchema),
  })
  .superRefine((data, ctx) => {
    data.cache.warmup_on_start.forEach((name, index) => {
      if (!(name in data.models)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: `references unknown model '${name}'`,
          path: ['cache', 'warmup_on_start', index],
        });
      }
    });
  });

export type RuntimeConfig = z.infer<typeof RuntimeConfigSchema>;
export type ModelCatalogEntryConfig = z.infer<typeof ModelCatalogEntrySchema>;
