/**
 * Telemetry bridge
 *
 * Subscribes a TelemetryManager to the serving services' events so
 * predictions, loads, drift and version changes are recorded as
 * OpenTelemetry metrics without the services knowing about telemetry.
 *
 * @module telemetry/bridge
 */

import type { Logger } from 'pino';
import type { ServingError } from '../api/errors.js';
import type { ModelCache } from '../core/model-cache.js';
import type { PredictionExecutor } from '../core/prediction-executor.js';
import type { DriftDetector, DriftEvent } from '../monitoring/drift-detector.js';
import type { VersionRegistry } from '../registry/version-registry.js';
import type { InferenceModel, ModelName, ModelVersion, PredictionResult } from '../types/models.js';
import { TelemetryManager, type TelemetryConfig, type ServingMetrics } from './otel.js';

/**
 * Services whose events are recorded. ServingRuntime satisfies this.
 */
export interface TelemetrySources {
  readonly executor: PredictionExecutor;
  readonly cache: ModelCache<InferenceModel>;
  readonly registry: VersionRegistry;
  readonly drift?: DriftDetector;
}

function splitKey(key: string): { model: string; version: string } {
  const separator = key.indexOf('@');
  return separator < 0
    ? { model: key, version: 'unknown' }
    : { model: key.slice(0, separator), version: key.slice(separator + 1) };
}

/**
 * Record service events through `manager`.
 *
 * @returns Function removing every listener added here
 *
 * @example
 * ```typescript
 * const manager = new TelemetryManager({ enabled: true });
 * await manager.start();
 * const detach = attachTelemetry(runtime, manager);
 * // ...
 * detach();
 * await manager.shutdown();
 * ```
 */
export function attachTelemetry(
  sources: TelemetrySources,
  manager: TelemetryManager,
  logger?: Logger
): () => void {
  const record = (event: string, fn: (metrics: ServingMetrics) => void): void => {
    try {
      fn(manager.metrics);
    } catch (err) {
      // manager.metrics throws once the manager has been shut down
      logger?.debug({ err, event }, 'Failed to record telemetry');
    }
  };

  const onPrediction = (result: PredictionResult): void =>
    record('prediction', (m) => {
      const labels = { model: result.modelName, version: result.version };
      m.predictionsTotal.add(1, { ...labels, outcome: 'success' });
      m.predictionLatency.record(result.latencyMs, labels);
      if (result.fallbackUsed) {
        m.predictionFallbacks.add(1, labels);
      }
    });

  const onPredictionFailed = (name: ModelName, error: ServingError, version: ModelVersion | null): void =>
    record('predictionFailed', (m) => {
      m.predictionsTotal.add(1, { model: name, version: version ?? 'none', outcome: error.code });
    });

  const onLoaded = (key: string, durationMs: number): void =>
    record('loaded', (m) => {
      const labels = splitKey(key);
      m.modelLoadsTotal.add(1, labels);
      m.modelLoadDuration.record(durationMs, labels);
    });

  const onLoadFailed = (key: string): void =>
    record('loadFailed', (m) => {
      m.modelLoadFailures.add(1, splitKey(key));
    });

  const onActivated = (name: ModelName, version: ModelVersion): void =>
    record('activated', (m) => {
      m.versionChanges.add(1, { model: name, version, change: 'activate' });
    });

  const onRolledBack = (name: ModelName, version: ModelVersion): void =>
    record('rolledBack', (m) => {
      m.versionChanges.add(1, { model: name, version, change: 'rollback' });
    });

  const onDrift = (event: DriftEvent): void =>
    record('drift', (m) => {
      m.driftEventsTotal.add(1, { model: event.modelName });
    });

  sources.executor.on('prediction', onPrediction);
  sources.executor.on('predictionFailed', onPredictionFailed);
  sources.cache.on('loaded', onLoaded);
  sources.cache.on('loadFailed', onLoadFailed);
  sources.registry.on('activated', onActivated);
  sources.registry.on('rolledBack', onRolledBack);
  sources.drift?.on('drift', onDrift);

  return () => {
    sources.executor.off('prediction', onPrediction);
    sources.executor.off('predictionFailed', onPredictionFailed);
    sources.cache.off('loaded', onLoaded);
    sources.cache.off('loadFailed', onLoadFailed);
    sources.registry.off('activated', onActivated);
    sources.registry.off('rolledBack', onRolledBack);
    sources.drift?.off('drift', onDrift);
  };
}

/**
 * Create a manager from config, start it when enabled and attach it.
 *
 * @example
 * ```typescript
 * const { manager, detach } = await createTelemetryBridge(
 *   { enabled: true, serviceName: 'model-serving-core', prometheusPort: 9464 },
 *   runtime,
 *   logger
 * );
 * // Prometheus metrics at http://localhost:9464/metrics
 * ```
 */
export async function createTelemetryBridge(
  config: TelemetryConfig,
  sources: TelemetrySources,
  logger?: Logger
): Promise<{ manager: TelemetryManager; detach: () => void }> {
  const manager = new TelemetryManager({ ...config, logger });

  if (!config.enabled) {
    return { manager, detach: () => undefined };
  }

  await manager.start();
  return { manager, detach: attachTelemetry(sources, manager, logger) };
}

/**
 * Get metrics from a telemetry manager (for testing/debugging).
 */
export function getMetrics(manager: TelemetryManager): ServingMetrics | undefined {
  return manager.isStarted() ? manager.metrics : undefined;
}
