/**
 * Population Stability Index
 *
 * Bins are defined by a reference sample's interior quantile edges; the
 * first and last bins are open-ended. A value falls into the first bin
 * whose edge is strictly greater than it, or into the last bin.
 */

import { ServingError } from '../api/errors.js';
import type { FeatureReference, ReferenceDistribution } from '../types/schemas/drift.js';
import type { FeatureVector } from '../types/models.js';
import { mean, quantileSorted, stddev } from '../utils/math-helpers.js';

/**
 * Floor applied to bin proportions so empty bins keep the log finite
 */
export const PROPORTION_FLOOR = 1e-4;

export function binIndex(value: number, edges: readonly number[]): number {
  for (let i = 0; i < edges.length; i++) {
    if (value < edges[i]) {
      return i;
    }
  }
  return edges.length;
}

/**
 * Share of `values` in each of the `edges.length + 1` bins
 */
export function binProportions(values: readonly number[], edges: readonly number[]): number[] {
  const counts = new Array<number>(edges.length + 1).fill(0);
  for (const value of values) {
    counts[binIndex(value, edges)] += 1;
  }
  return counts.map((count) => (values.length === 0 ? 0 : count / values.length));
}

/**
 * Σ (aᵢ − eᵢ) · ln(aᵢ / eᵢ), both sides floored at PROPORTION_FLOOR
 */
export function populationStabilityIndex(expected: readonly number[], actual: readonly number[]): number {
  if (expected.length !== actual.length) {
    throw new ServingError('InvalidParams', 'Expected and actual proportions must have the same length', {
      expected: expected.length,
      actual: actual.length,
    });
  }

  let psi = 0;
  for (let i = 0; i < expected.length; i++) {
    const e = Math.max(expected[i], PROPORTION_FLOOR);
    const a = Math.max(actual[i], PROPORTION_FLOOR);
    psi += (a - e) * Math.log(a / e);
  }
  return psi;
}

/**
 * Baseline statistics and bins for one feature's reference values
 */
export function buildFeatureReference(name: string, values: readonly number[], bins: number): FeatureReference {
  if (values.length === 0) {
    throw new ServingError('InvalidParams', `No reference values for feature ${name}`, { feature: name });
  }

  const sorted = [...values].sort((a, b) => a - b);
  const binEdges: number[] = [];
  for (let i = 1; i < bins; i++) {
    binEdges.push(quantileSorted(sorted, i / bins));
  }

  return {
    name,
    mean: mean(sorted),
    std: stddev(sorted),
    min: sorted[0],
    max: sorted[sorted.length - 1],
    median: quantileSorted(sorted, 0.5),
    binEdges,
    expected: binProportions(sorted, binEdges),
  };
}

export interface BuildReferenceOptions {
  /** Number of bins per feature (default: 10) */
  bins?: number;
  /** Feature names; `feature_<i>` when omitted */
  featureNames?: readonly string[];
  now?: () => Date;
}

/**
 * Capture a reference distribution from a baseline dataset
 */
export function buildReference(
  samples: readonly FeatureVector[],
  options: BuildReferenceOptions = {}
): ReferenceDistribution {
  const bins = options.bins ?? 10;
  if (!Number.isInteger(bins) || bins < 2) {
    throw new ServingError('InvalidParams', `bins must be an integer of at least 2, got ${bins}`, { bins });
  }
  if (samples.length === 0) {
    throw new ServingError('InvalidParams', 'Reference dataset is empty');
  }

  const featureCount = samples[0].length;
  if (featureCount === 0 || samples.some((sample) => sample.length !== featureCount)) {
    throw new ServingError('InvalidParams', 'Reference samples must share a non-zero feature count', {
      featureCount,
    });
  }
  if (samples.some((sample) => sample.some((value) => !Number.isFinite(value)))) {
    throw new ServingError('InvalidParams', 'Reference samples must contain finite numbers only');
  }

  const featureNames = options.featureNames;
  if (featureNames && featureNames.length !== featureCount) {
    throw new ServingError(
      'InvalidParams',
      `Expected ${featureCount} feature names, got ${featureNames.length}`,
      { featureCount, featureNames: featureNames.length }
    );
  }

  const features: FeatureReference[] = [];
  for (let j = 0; j < featureCount; j++) {
    const name = featureNames ? featureNames[j] : `feature_${j}`;
    features.push(buildFeatureReference(name, samples.map((sample) => sample[j]), bins));
  }

  return {
    features,
    sampleSize: samples.length,
    capturedAt: (options.now ?? (() => new Date()))().toISOString(),
  };
}
