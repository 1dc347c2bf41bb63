/**
 * Prediction Executor
 *
 * Runs one prediction end to end: catalog and input validation, active
 * version resolution, model load through the cache, inference under a
 * deadline and the confidence-threshold fallback policy. Every outcome past
 * the catalog check is recorded in the metrics aggregator; successful
 * inputs are handed to the drift detector off the response path.
 *
 * @module core/prediction-executor
 */

import { EventEmitter } from 'eventemitter3';
import type { Logger } from 'pino';
import {
  ServingError,
  createTimeoutError,
  isServingError,
  toServingError,
  zodErrorToServingError,
} from '../api/errors.js';
import type { DriftDetector } from '../monitoring/drift-detector.js';
import type { MetricsAggregator } from '../monitoring/metrics-aggregator.js';
import type { ModelCatalog, ModelCatalogEntry } from '../registry/model-catalog.js';
import type { VersionRegistry } from '../registry/version-registry.js';
import { FeatureVectorSchema } from '../types/schemas/common.js';
import type {
  FeatureVector,
  InferenceModel,
  ModelName,
  ModelVersion,
  PredictionResult,
  RawPrediction,
} from '../types/models.js';
import { lazyLog } from '../utils/logger-helpers.js';
import type { ModelCache } from './model-cache.js';

export const DEFAULT_FALLBACK_LABEL = 'Uncertain - please consult healthcare professional';
const DEFAULT_TIMEOUT_MS = 30_000;

export interface PredictionExecutorOptions {
  catalog: ModelCatalog;
  registry: VersionRegistry;
  cache: ModelCache<InferenceModel>;
  metrics: MetricsAggregator;
  /** Drift checks are skipped when omitted */
  drift?: DriftDetector;
  /** Deadline applied when a call passes none (default: 30000) */
  defaultTimeoutMs?: number;
  /** Label returned in place of low-confidence predictions */
  fallbackLabel?: string;
  logger?: Logger;
}

export interface PredictOptions {
  timeoutMs?: number;
  signal?: AbortSignal;
}

/**
 * Executor events
 */
export interface PredictionExecutorEvents {
  prediction: (result: PredictionResult) => void;
  predictionFailed: (name: ModelName, error: ServingError, version: ModelVersion | null) => void;
}

/**
 * Per-call abort signal combining the timeout and the caller's signal
 */
interface Deadline {
  signal: AbortSignal;
  dispose(): void;
}

export class PredictionExecutor extends EventEmitter<PredictionExecutorEvents> {
  private readonly catalog: ModelCatalog;
  private readonly registry: VersionRegistry;
  private readonly cache: ModelCache<InferenceModel>;
  private readonly metrics: MetricsAggregator;
  private readonly drift?: DriftDetector;
  private readonly defaultTimeoutMs: number;
  private readonly fallbackLabel: string;
  private readonly logger?: Logger;

  constructor(options: PredictionExecutorOptions) {
    super();
    this.catalog = options.catalog;
    this.registry = options.registry;
    this.cache = options.cache;
    this.metrics = options.metrics;
    this.drift = options.drift;
    this.defaultTimeoutMs = options.defaultTimeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.fallbackLabel = options.fallbackLabel ?? DEFAULT_FALLBACK_LABEL;
    this.logger = options.logger;
  }

  /**
   * Run a prediction.
   *
   * Rejects with NotFound (unknown model or version), InvalidParams (bad
   * features), Unavailable (load or inference failure) or Timeout.
   */
  public async predict(
    name: ModelName,
    features: readonly number[],
    options: PredictOptions = {}
  ): Promise<PredictionResult> {
    const entry = this.catalog.require(name);
    const startTime = performance.now();
    let version: ModelVersion | null = null;

    let deadline: Deadline;
    try {
      deadline = this.createDeadline(name, options);
    } catch (error) {
      throw this.recordFailure(name, version, startTime, toServingError(error));
    }

    let result: PredictionResult;
    let vector: FeatureVector;

    try {
      vector = this.validateFeatures(entry, features);
      const activeVersion = this.registry.getActive(name);
      version = activeVersion;

      const model = await this.cache.getOrLoad(name, activeVersion, { signal: deadline.signal });
      if (model.featureCount !== undefined && model.featureCount !== vector.length) {
        throw new ServingError(
          'InvalidParams',
          `Model ${name}@${activeVersion} expects ${model.featureCount} features, got ${vector.length}`,
          { modelName: name, version: activeVersion, expected: model.featureCount, actual: vector.length }
        );
      }

      const raw = await this.runInference(model, vector, deadline.signal, name, activeVersion);
      const fallbackUsed = raw.confidence < entry.confidenceThreshold;

      result = {
        modelName: name,
        prediction: fallbackUsed ? this.fallbackLabel : raw.label,
        rawPrediction: raw.label,
        confidence: raw.confidence,
        version: activeVersion,
        fallbackUsed,
        latencyMs: performance.now() - startTime,
      };
    } catch (error) {
      const servingError = deadline.signal.aborted ? this.abortError(deadline.signal, error) : toServingError(error);
      throw this.recordFailure(name, version, startTime, servingError);
    } finally {
      deadline.dispose();
    }

    this.metrics.record(name, result.latencyMs, result.confidence, true);
    this.scheduleDriftCheck(name, vector);

    lazyLog(
      this.logger,
      'debug',
      () => ({
        modelName: name,
        version: result.version,
        confidence: result.confidence,
        fallbackUsed: result.fallbackUsed,
        latencyMs: result.latencyMs,
      }),
      'Prediction served'
    );
    this.emitSafely(() => this.emit('prediction', result));

    return result;
  }

  private recordFailure(
    name: ModelName,
    version: ModelVersion | null,
    startTime: number,
    error: ServingError
  ): ServingError {
    this.metrics.record(name, performance.now() - startTime, null, false);

    this.logger?.warn({ modelName: name, version, code: error.code, err: error }, 'Prediction failed');
    this.emitSafely(() => this.emit('predictionFailed', name, error, version));
    return error;
  }

  private validateFeatures(entry: ModelCatalogEntry, features: readonly number[]): FeatureVector {
    const parsed = FeatureVectorSchema.safeParse(features);
    if (!parsed.success) {
      throw zodErrorToServingError(parsed.error);
    }

    if (entry.featureCount !== undefined && parsed.data.length !== entry.featureCount) {
      throw new ServingError(
        'InvalidParams',
        `Model ${entry.name} expects ${entry.featureCount} features, got ${parsed.data.length}`,
        { modelName: entry.name, expected: entry.featureCount, actual: parsed.data.length }
      );
    }

    return Object.freeze(parsed.data);
  }

  /**
   * Run the model, settling early when the deadline fires even if the model
   * ignores its signal.
   */
  private runInference(
    model: InferenceModel,
    features: FeatureVector,
    signal: AbortSignal,
    name: ModelName,
    version: ModelVersion
  ): Promise<RawPrediction> {
    return new Promise<RawPrediction>((resolve, reject) => {
      if (signal.aborted) {
        reject(this.abortError(signal));
        return;
      }

      const onAbort = (): void => reject(this.abortError(signal));
      signal.addEventListener('abort', onAbort, { once: true });

      void Promise.resolve()
        .then(() => model.predict(features, signal))
        .then(
          (raw) => {
            signal.removeEventListener('abort', onAbort);
            try {
              resolve(this.validateRawPrediction(raw, name, version));
            } catch (error) {
              reject(error);
            }
          },
          (error: unknown) => {
            signal.removeEventListener('abort', onAbort);
            const message = error instanceof Error ? error.message : String(error);
            reject(
              new ServingError(
                'Unavailable',
                `Inference failed for ${name}@${version}: ${message}`,
                { modelName: name, version },
                { cause: error }
              )
            );
          }
        );
    });
  }

  private validateRawPrediction(raw: RawPrediction, name: ModelName, version: ModelVersion): RawPrediction {
    if (!Number.isFinite(raw.confidence) || raw.confidence < 0 || raw.confidence > 1) {
      throw new ServingError(
        'Unavailable',
        `Model ${name}@${version} returned confidence outside [0, 1]: ${raw.confidence}`,
        { modelName: name, version, confidence: raw.confidence }
      );
    }
    if (typeof raw.label !== 'string' || raw.label.length === 0) {
      throw new ServingError('Unavailable', `Model ${name}@${version} returned an empty label`, {
        modelName: name,
        version,
      });
    }
    return raw;
  }

  private createDeadline(name: ModelName, options: PredictOptions): Deadline {
    const timeoutMs = options.timeoutMs ?? this.defaultTimeoutMs;
    if (!Number.isFinite(timeoutMs) || timeoutMs <= 0) {
      throw new ServingError('InvalidParams', `timeoutMs must be a positive number, got ${timeoutMs}`, {
        modelName: name,
        timeoutMs,
      });
    }

    const controller = new AbortController();
    const timer = setTimeout(() => {
      controller.abort(createTimeoutError('predict', timeoutMs, name));
    }, timeoutMs);

    const callerSignal = options.signal;
    const onCallerAbort = (): void => {
      controller.abort(
        new ServingError('Timeout', `Prediction for ${name} was aborted by the caller`, { modelName: name })
      );
    };

    if (callerSignal?.aborted) {
      onCallerAbort();
    } else {
      callerSignal?.addEventListener('abort', onCallerAbort, { once: true });
    }

    return {
      signal: controller.signal,
      dispose: () => {
        clearTimeout(timer);
        callerSignal?.removeEventListener('abort', onCallerAbort);
      },
    };
  }

  private abortError(signal: AbortSignal, fallback?: unknown): ServingError {
    const reason: unknown = signal.reason;
    if (isServingError(reason, 'Timeout')) {
      return reason;
    }
    return toServingError(fallback ?? reason, 'Timeout');
  }

  private scheduleDriftCheck(name: ModelName, features: FeatureVector): void {
    const drift = this.drift;
    if (!drift) {
      return;
    }

    setImmediate(() => {
      try {
        drift.check(name, features);
      } catch (err) {
        this.logger?.warn({ err, modelName: name }, 'Drift check failed');
      }
    });
  }

  private emitSafely(emit: () => void): void {
    try {
      emit();
    } catch (err) {
      this.logger?.error({ err }, 'Prediction event listener failed');
    }
  }
}
