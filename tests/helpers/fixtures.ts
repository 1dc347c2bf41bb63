/**
 * Shared fixtures for unit and integration tests
 */

import { mkdtemp, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { pino } from 'pino';
import { validateConfig, type Config } from '../../src/config/loader.js';
import { ModelCatalog } from '../../src/registry/model-catalog.js';
import type { FeatureVector, InferenceModel, RawPrediction } from '../../src/types/models.js';

export const silentLogger = pino({ level: 'silent' });

/**
 * Catalog with two small models: heart (2 features, threshold 0.75) and
 * diabetes (3 features, threshold 0.6).
 */
export function createTestCatalog(): ModelCatalog {
  return new ModelCatalog([
    {
      name: 'heart',
      confidenceThreshold: 0.75,
      featureCount: 2,
      featureNames: ['age', 'chol'],
      artifactFile: 'heart.json',
    },
    {
      name: 'diabetes',
      confidenceThreshold: 0.6,
      featureCount: 3,
      artifactFile: 'diabetes.json',
    },
  ]);
}

/**
 * Validated runtime config rooted at `rootDir`
 */
export function createTestConfig(rootDir: string, overrides: Partial<Config> = {}): Config {
  return validateConfig({
    registry: { models_dir: join(rootDir, 'models'), state_file: 'active_versions.json', history_depth: 5 },
    cache: { retry_cooldown_ms: 50, max_cached_models: 4, warmup_on_start: [] },
    prediction: {
      default_timeout_ms: 1000,
      default_confidence_threshold: 0.75,
      fallback_label: 'Uncertain - please consult healthcare professional',
    },
    metrics: { tdigest_compression: 100, snapshot_interval_ms: 60000, max_low_confidence_events: 100 },
    drift: {
      enabled: true,
      window_size: 10,
      threshold: 0.2,
      bins: 5,
      reference_dir: join(rootDir, 'reference_stats'),
      max_events: 50,
    },
    telemetry: { enabled: false, service_name: 'model-serving-test', prometheus_port: 9464 },
    logging: { level: 'silent' },
    models: {
      heart: { feature_count: 2, feature_names: ['age', 'chol'], artifact_file: 'heart.json' },
      diabetes: { feature_count: 3, confidence_threshold: 0.6 },
    },
    ...overrides,
  });
}

/**
 * Logistic artifact body. With zero weights the probability of `labels[1]`
 * is sigmoid(bias).
 */
export function logisticArtifact(
  weights: number[],
  bias: number,
  labels: [string, string] = ['No Disease', 'Disease']
): Record<string, unknown> {
  return { format: 'logistic', weights, bias, labels };
}

/**
 * Model returning a fixed label and confidence
 */
export function stubModel(label: string, confidence: number, featureCount?: number): InferenceModel {
  return {
    format: 'stub',
    featureCount,
    labels: [label],
    predict: (): RawPrediction => ({ label, confidence }),
  };
}

/**
 * Model whose predict() runs the given function
 */
export function functionModel(
  predict: (features: FeatureVector, signal?: AbortSignal) => Promise<RawPrediction> | RawPrediction
): InferenceModel {
  return { format: 'stub', labels: ['a', 'b'], predict };
}

export interface Deferred<T> {
  promise: Promise<T>;
  resolve(value: T): void;
  reject(error: unknown): void;
}

export function deferred<T>(): Deferred<T> {
  let resolve: (value: T) => void = () => undefined;
  let reject: (error: unknown) => void = () => undefined;
  const promise = new Promise<T>((res, rej) => {
    resolve = res;
    reject = rej;
  });
  return { promise, resolve, reject };
}

/**
 * Let queued microtasks and immediates run
 */
export function flush(): Promise<void> {
  return new Promise((resolve) => setImmediate(resolve));
}

export async function createTempDir(prefix = 'serving-test-'): Promise<string> {
  return mkdtemp(join(tmpdir(), prefix));
}

export async function removeTempDir(dir: string): Promise<void> {
  await rm(dir, { recursive: true, force: true });
}
