export {
  ServingRuntime,
  type DiscoveryResult,
  type InitializationReport,
  type InitializationStage,
  type ServingRuntimeOptions,
  type SetActiveOptions,
} from './services/serving-runtime.js';

export {
  ServingError,
  TimeoutError,
  createConflictError,
  createNotFoundError,
  createTimeoutError,
  isServingError,
  toServingError,
  zodErrorToServingError,
  type ServingErrorCode,
  type ServingErrorShape,
} from './api/errors.js';

export {
  loadConfig,
  validateConfig,
  initializeConfig,
  getConfig,
  resetConfig,
  type Config,
  type ConfigEnvironment,
} from './config/loader.js';

export { KeyedMutex } from './core/keyed-mutex.js';
export {
  ModelCache,
  cacheKey,
  type CacheInfo,
  type CachedModelInfo,
  type EvictionReason,
  type GetOrLoadOptions,
  type ModelCacheEvents,
  type ModelCacheOptions,
  type ModelLoader,
} from './core/model-cache.js';
export {
  PredictionExecutor,
  DEFAULT_FALLBACK_LABEL,
  type PredictOptions,
  type PredictionExecutorEvents,
  type PredictionExecutorOptions,
} from './core/prediction-executor.js';

export * from './registry/index.js';
export * from './models/index.js';
export * from './monitoring/index.js';

export {
  FileArtifactStore,
  InMemoryArtifactStore,
  artifactPathFor,
  metadataPathFor,
  readArtifactMetadata,
  type ArtifactStore,
} from './storage/artifact-store.js';

// Telemetry
export { attachTelemetry, createTelemetryBridge, getMetrics, type TelemetrySources } from './telemetry/bridge.js';
export { TelemetryManager, createTelemetry, type TelemetryConfig, type ServingMetrics } from './telemetry/otel.js';

export { createLogger, componentLogger } from './utils/logger-helpers.js';

export * from './types/index.js';
