/**
 * Reference distribution schemas
 *
 * Shape of `<reference_dir>/<model>_stats.json`.
 *
 * @module schemas/drift
 */

import { z } from 'zod';
import { Probability } from './common.js';

/**
 * Baseline statistics for a single feature
 */
export const FeatureReferenceSchema = z
  .object({
    name: z.string().min(1),
    mean: z.number().finite(),
    std: z.number().finite().min(0),
    min: z.number().finite(),
    max: z.number().finite(),
    median: z.number().finite(),
    /** Interior bin edges, ascending; bins are open-ended at both extremes */
    binEdges: z.array(z.number().finite()),
    /** Expected proportion per bin (binEdges.length + 1 entries) */
    expected: z.array(Probability).min(1),
  })
  .refine((data) => data.expected.length === data.binEdges.length + 1, {
    message: 'must have binEdges.length + 1 entries',
    path: ['expected'],
  })
  .refine((data) => data.binEdges.every((edge, i) => i === 0 || edge >= data.binEdges[i - 1]), {
    message: 'must be sorted ascending',
    path: ['binEdges'],
  })
  .refine((data) => Math.abs(data.expected.reduce((sum, p) => sum + p, 0) - 1) < 1e-6, {
    message: 'proportions must sum to 1',
    path: ['expected'],
  });

/**
 * Reference distribution for one model
 */
export const ReferenceDistributionSchema = z.object({
  features: z.array(FeatureReferenceSchema).min(1),
  sampleSize: z.number().int().positive(),
  capturedAt: z.string().min(1),
});

/**
 * Summary-only statistics written by earlier releases: one set of moments
 * for the whole input, no bins, so PSI cannot be computed from it.
 */
export const LegacyReferenceStatsSchema = z.object({
  mean: z.number(),
  std: z.number(),
  min: z.number(),
  max: z.number(),
  median: z.number(),
  timestamp: z.string(),
  sample_size: z.number().int(),
});

export type FeatureReference = z.infer<typeof FeatureReferenceSchema>;
export type ReferenceDistribution = z.infer<typeof ReferenceDistributionSchema>;
export type LegacyReferenceStats = z.infer<typeof LegacyReferenceStatsSchema>;
