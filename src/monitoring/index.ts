/**
 * Monitoring Module
 *
 * Prediction metrics aggregation and input drift detection.
 */

export {
  MetricsAggregator,
  createDefaultAggregatorConfig,
  toDashboardSnapshot,
  type MetricsAggregatorConfig,
  type MetricsAggregatorEvents,
  type MetricsAggregatorOptions,
  type MetricsSnapshot,
  type ModelMetrics,
  type LatencySummary,
  type ConfidenceSummary,
  type LowConfidenceEvent,
  type DashboardSnapshot,
} from './metrics-aggregator.js';

export {
  DriftDetector,
  createDefaultDriftConfig,
  type DriftDetectorConfig,
  type DriftDetectorEvents,
  type DriftDetectorOptions,
  type DriftEvaluation,
  type DriftEvent,
  type FeatureDriftScore,
} from './drift-detector.js';

export {
  FileReferenceStore,
  InMemoryReferenceStore,
  parseReference,
  type ReferenceStore,
} from './reference-store.js';

export {
  PROPORTION_FLOOR,
  binIndex,
  binProportions,
  buildFeatureReference,
  buildReference,
  populationStabilityIndex,
  type BuildReferenceOptions,
} from './psi.js';

export { RollingWindow } from './rolling-window.js';
export { TDigest } from './TDigest.js';
