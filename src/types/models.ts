/**
 * Model Types
 *
 * Shared domain types for versioned model records, loaded model handles
 * and prediction results.
 */

/**
 * Model identifier as configured in the catalog (e.g. 'heart', 'diabetes').
 */
export type ModelName = string;

/**
 * Version label (e.g. 'v1', 'v2').
 */
export type ModelVersion = string;

/**
 * Feature vector accepted by a model.
 */
export type FeatureVector = readonly number[];

/**
 * Immutable record describing one registered model version.
 */
export interface ModelVersionRecord {
  readonly name: ModelName;
  readonly version: ModelVersion;
  /** Path of the artifact relative to the artifact store root */
  readonly artifactPath: string;
  readonly metadata: Readonly<Record<string, unknown>>;
  /** ISO timestamp */
  readonly createdAt: string;
}

/**
 * Per-model activation state. Replaced as a whole on every mutation.
 */
export interface ActiveVersionState {
  readonly currentVersion: ModelVersion;
  /** Previously active versions, most recent last */
  readonly history: readonly ModelVersion[];
}

/**
 * Raw output of a model before the fallback policy is applied.
 */
export interface RawPrediction {
  label: string;
  /** Probability of the returned label, in [0, 1] */
  confidence: number;
  /** Optional per-label probabilities */
  scores?: Record<string, number>;
}

/**
 * Loaded, ready-to-run model handle.
 */
export interface InferenceModel {
  /** Artifact format the handle was decoded from */
  readonly format: string;
  /** Number of features the model expects, when known */
  readonly featureCount?: number;
  readonly labels: readonly string[];
  predict(features: FeatureVector, signal?: AbortSignal): Promise<RawPrediction> | RawPrediction;
}

/**
 * Result returned by the prediction executor.
 */
export interface PredictionResult {
  modelName: ModelName;
  /** Label returned to the caller (fallback label when uncertain) */
  prediction: string;
  /** Label the model actually produced */
  rawPrediction: string;
  confidence: number;
  version: ModelVersion;
  fallbackUsed: boolean;
  latencyMs: number;
}

/**
 * Model info entry consumed by the dashboard.
 */
export interface ModelInfo {
  name: ModelName;
  version: ModelVersion | null;
  loaded: boolean;
  confidence_threshold: number;
}
