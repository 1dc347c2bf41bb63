/**
 * Serving Runtime
 *
 * Composes the catalog, registry, cache, executor, metrics and drift
 * services from one validated configuration and exposes the admin
 * operations used by the HTTP layer and the dashboard.
 *
 * Admin mutations for a model are serialized with a per-model lock;
 * clearing the cache takes every model's lock.
 *
 * @module services/serving-runtime
 */

import * as path from 'node:path';
import type { MetricReader } from '@opentelemetry/sdk-metrics';
import type { Logger } from 'pino';
import { ServingError, toServingError, zodErrorToServingError } from '../api/errors.js';
import { loadConfig, type Config, type ConfigEnvironment } from '../config/loader.js';
import { KeyedMutex } from '../core/keyed-mutex.js';
import { ModelCache, type CacheInfo, type ModelLoader } from '../core/model-cache.js';
import { PredictionExecutor, type PredictOptions } from '../core/prediction-executor.js';
import { ModelFormatRegistry } from '../models/format-registry.js';
import { DriftDetector, type DriftEvent } from '../monitoring/drift-detector.js';
import {
  MetricsAggregator,
  toDashboardSnapshot,
  type DashboardSnapshot,
  type MetricsSnapshot,
} from '../monitoring/metrics-aggregator.js';
import { buildReference } from '../monitoring/psi.js';
import { FileReferenceStore, type ReferenceStore } from '../monitoring/reference-store.js';
import { ModelCatalog } from '../registry/model-catalog.js';
import { FileRegistryStore, type RegistryStore } from '../registry/registry-store.js';
import { VersionRegistry } from '../registry/version-registry.js';
import {
  FileArtifactStore,
  artifactPathFor,
  readArtifactMetadata,
  type ArtifactStore,
} from '../storage/artifact-store.js';
import { createTelemetryBridge } from '../telemetry/bridge.js';
import type { TelemetryManager } from '../telemetry/otel.js';
import { ReferenceDistributionSchema, type ReferenceDistribution } from '../types/schemas/drift.js';
import type {
  ActiveVersionState,
  FeatureVector,
  InferenceModel,
  ModelInfo,
  ModelName,
  ModelVersion,
  ModelVersionRecord,
  PredictionResult,
} from '../types/models.js';
import { componentLogger, createLogger } from '../utils/logger-helpers.js';

export interface ServingRuntimeOptions {
  config: Config;
  /** Root logger; created from `logging.level` when omitted */
  logger?: Logger;
  /** Defaults to a file store at `registry.models_dir` */
  artifactStore?: ArtifactStore;
  /** Defaults to `<models_dir>/<state_file>` */
  registryStore?: RegistryStore;
  /** Defaults to a file store at `drift.reference_dir` */
  referenceStore?: ReferenceStore;
  /** Artifact decoders; the built-in formats when omitted */
  formats?: ModelFormatRegistry;
  /** Replaces artifact loading entirely */
  loader?: ModelLoader<InferenceModel>;
  /** Metric reader for telemetry instead of the Prometheus exporter */
  telemetryReader?: MetricReader;
}

export type InitializationStage = 'discover' | 'restore' | 'default_version' | 'reference' | 'warmup';

export interface InitializationReport {
  registered: Array<{ name: ModelName; version: ModelVersion }>;
  restored: ModelName[];
  activated: Array<{ name: ModelName; version: ModelVersion }>;
  references: ModelName[];
  warmed: ModelName[];
  errors: Array<{ modelName: ModelName; stage: InitializationStage; error: ServingError }>;
}

export interface DiscoveryResult {
  registered: Array<{ name: ModelName; version: ModelVersion }>;
  errors: Array<{ modelName: ModelName; version: ModelVersion; error: ServingError }>;
}

export interface SetActiveOptions {
  /** Load the target version before switching; a failed load leaves the state unchanged */
  warmup?: boolean;
}

export class ServingRuntime {
  public readonly config: Config;
  public readonly catalog: ModelCatalog;
  public readonly registry: VersionRegistry;
  public readonly cache: ModelCache<InferenceModel>;
  public readonly metrics: MetricsAggregator;
  public readonly drift: DriftDetector;
  public readonly executor: PredictionExecutor;

  private readonly logger: Logger;
  private readonly artifactStore: ArtifactStore;
  private readonly referenceStore: ReferenceStore;
  private readonly telemetryReader?: MetricReader;
  private readonly adminLocks = new KeyedMutex();

  private telemetry: { manager: TelemetryManager; detach: () => void } | null = null;
  private initializePromise: Promise<InitializationReport> | null = null;
  private shutdownPromise: Promise<void> | null = null;
  private shutDown = false;

  constructor(options: ServingRuntimeOptions) {
    const { config } = options;
    this.config = config;
    this.logger = options.logger ?? createLogger(config.logging.level, { service: config.telemetry.service_name });

    const modelsDir = path.resolve(config.registry.models_dir);
    this.artifactStore =
      options.artifactStore ?? new FileArtifactStore(modelsDir, componentLogger(this.logger, 'ArtifactStore'));
    this.referenceStore =
      options.referenceStore ??
      new FileReferenceStore(config.drift.reference_dir, componentLogger(this.logger, 'ReferenceStore'));
    this.telemetryReader = options.telemetryReader;

    this.catalog = ModelCatalog.fromConfig(config.models, config.prediction.default_confidence_threshold);

    this.registry = new VersionRegistry({
      catalog: this.catalog,
      store:
        options.registryStore ??
        new FileRegistryStore(
          path.join(modelsDir, config.registry.state_file),
          componentLogger(this.logger, 'RegistryStore')
        ),
      historyDepth: config.registry.history_depth,
      logger: componentLogger(this.logger, 'VersionRegistry'),
    });

    const formats = options.formats ?? ModelFormatRegistry.withDefaults();
    this.cache = new ModelCache<InferenceModel>({
      loader: options.loader ?? this.createArtifactLoader(formats),
      retryCooldownMs: config.cache.retry_cooldown_ms,
      maxEntries: config.cache.max_cached_models,
      logger: componentLogger(this.logger, 'ModelCache'),
    });

    this.metrics = new MetricsAggregator(
      {
        tdigestCompression: config.metrics.tdigest_compression,
        snapshotIntervalMs: config.metrics.snapshot_interval_ms,
        maxLowConfidenceEvents: config.metrics.max_low_confidence_events,
        defaultConfidenceThreshold: config.prediction.default_confidence_threshold,
      },
      {
        thresholdFor: (name) => this.catalog.confidenceThreshold(name),
        logger: componentLogger(this.logger, 'MetricsAggregator'),
      }
    );

    this.drift = new DriftDetector(
      {
        enabled: config.drift.enabled,
        windowSize: config.drift.window_size,
        threshold: config.drift.threshold,
        maxEvents: config.drift.max_events,
      },
      { catalog: this.catalog, logger: componentLogger(this.logger, 'DriftDetector') }
    );

    this.executor = new PredictionExecutor({
      catalog: this.catalog,
      registry: this.registry,
      cache: this.cache,
      metrics: this.metrics,
      drift: config.drift.enabled ? this.drift : undefined,
      defaultTimeoutMs: config.prediction.default_timeout_ms,
      fallbackLabel: config.prediction.fallback_label,
      logger: componentLogger(this.logger, 'PredictionExecutor'),
    });
  }

  /**
   * Build a runtime from a YAML config file (config/runtime.yaml by default).
   */
  public static fromConfigFile(
    configPath?: string,
    environment?: ConfigEnvironment,
    options: Omit<ServingRuntimeOptions, 'config'> = {}
  ): ServingRuntime {
    return new ServingRuntime({ ...options, config: loadConfig(configPath, environment) });
  }

  /**
   * Bring the runtime up: discover artifacts, restore active versions,
   * apply default versions, load reference distributions and warm models.
   *
   * Per-model failures are collected in the report; a corrupted state file
   * rejects with StateCorrupted.
   */
  public async initialize(): Promise<InitializationReport> {
    this.assertRunning();

    if (!this.initializePromise) {
      this.initializePromise = this.runInitialize().catch((error: unknown) => {
        this.initializePromise = null;
        throw error;
      });
    }
    return this.initializePromise;
  }

  /**
   * Register every `<version>/<artifact_file>` found in the artifact store.
   */
  public async discover(): Promise<DiscoveryResult> {
    const result: DiscoveryResult = { registered: [], errors: [] };
    const versions = await this.artifactStore.listVersionDirs();

    for (const name of this.catalog.names()) {
      const entry = this.catalog.require(name);

      for (const version of versions) {
        const artifactPath = artifactPathFor(version, entry.artifactFile);
        if (!(await this.artifactStore.exists(artifactPath))) {
          continue;
        }

        try {
          const metadata = await readArtifactMetadata(this.artifactStore, version, name);
          this.registry.register(name, version, artifactPath, metadata);
          result.registered.push({ name, version });
        } catch (error) {
          const servingError = toServingError(error);
          result.errors.push({ modelName: name, version, error: servingError });
          this.logger.error({ modelName: name, version, err: servingError }, 'Failed to register discovered artifact');
        }
      }
    }

    this.logger.info({ registered: result.registered.length, failed: result.errors.length }, 'Artifact discovery complete');
    return result;
  }

  public async predict(
    name: ModelName,
    features: readonly number[],
    options?: PredictOptions
  ): Promise<PredictionResult> {
    this.assertRunning();
    return this.executor.predict(name, features, options);
  }

  public registerVersion(
    name: ModelName,
    version: ModelVersion,
    artifactPath: string,
    metadata?: Record<string, unknown>
  ): ModelVersionRecord {
    this.assertRunning();
    return this.registry.register(name, version, artifactPath, metadata);
  }

  public async setActive(
    name: ModelName,
    version: ModelVersion,
    options: SetActiveOptions = {}
  ): Promise<ActiveVersionState> {
    this.assertRunning();
    this.registry.getRecord(name, version);

    return this.adminLocks.runExclusive(name, async () => {
      if (options.warmup) {
        await this.cache.getOrLoad(name, version);
      }
      return this.registry.setActive(name, version);
    });
  }

  public async rollback(name: ModelName): Promise<ActiveVersionState> {
    this.assertRunning();
    this.catalog.require(name);
    return this.adminLocks.runExclusive(name, () => this.registry.rollback(name));
  }

  /**
   * Evict the active version and load it again.
   *
   * @returns The reloaded version
   */
  public async reload(name: ModelName): Promise<ModelVersion> {
    this.assertRunning();
    this.catalog.require(name);

    return this.adminLocks.runExclusive(name, async () => {
      const version = this.registry.getActive(name);
      this.cache.evict(name, version);
      await this.cache.getOrLoad(name, version);
      this.logger.info({ modelName: name, version }, 'Model reloaded');
      return version;
    });
  }

  /**
   * Evict one version (the active one by default) from the cache.
   */
  public async evict(name: ModelName, version?: ModelVersion): Promise<boolean> {
    this.assertRunning();
    this.catalog.require(name);

    return this.adminLocks.runExclusive(name, () => {
      return this.cache.evict(name, version ?? this.registry.getActive(name));
    });
  }

  /**
   * @returns Number of entries removed
   */
  public async clearCache(): Promise<number> {
    this.assertRunning();
    return this.adminLocks.runExclusiveMany(this.catalog.names(), () => this.cache.clearAll());
  }

  public cacheInfo(): CacheInfo {
    return this.cache.cacheInfo();
  }

  /**
   * One entry per catalog model, in catalog order
   */
  public listModelInfo(): ModelInfo[] {
    return this.catalog.names().map((name) => {
      const version = this.registry.getState(name)?.currentVersion ?? null;
      return {
        name,
        version,
        loaded: version !== null && this.cache.isLoaded(name, version),
        confidence_threshold: this.catalog.confidenceThreshold(name),
      };
    });
  }

  public metricsSnapshot(): MetricsSnapshot {
    return this.metrics.snapshot();
  }

  public dashboardSnapshot(): DashboardSnapshot {
    return toDashboardSnapshot(this.metrics.snapshot(), this.metrics.getLowConfidenceEvents());
  }

  public driftEvents(name?: ModelName): readonly DriftEvent[] {
    if (name !== undefined) {
      this.catalog.require(name);
    }
    return this.drift.getEvents(name);
  }

  /**
   * Models flagged for retraining review after a drift event
   */
  public flaggedModels(): ModelName[] {
    return this.drift.getFlaggedModels();
  }

  public clearReviewFlag(name: ModelName): boolean {
    this.catalog.require(name);
    return this.drift.clearReviewFlag(name);
  }

  /**
   * Persist and apply a reference distribution for `name`.
   */
  public async setReference(name: ModelName, reference: ReferenceDistribution): Promise<void> {
    this.assertRunning();
    const entry = this.catalog.require(name);

    const parsed = ReferenceDistributionSchema.safeParse(reference);
    if (!parsed.success) {
      throw zodErrorToServingError(parsed.error);
    }
    if (entry.featureCount !== undefined && parsed.data.features.length !== entry.featureCount) {
      throw new ServingError(
        'InvalidParams',
        `Reference for ${name} has ${parsed.data.features.length} features, model expects ${entry.featureCount}`,
        { modelName: name, expected: entry.featureCount, actual: parsed.data.features.length }
      );
    }

    await this.adminLocks.runExclusive(name, async () => {
      try {
        await this.referenceStore.save(name, parsed.data);
      } catch (error) {
        throw new ServingError(
          'Unavailable',
          `Failed to persist reference statistics for ${name}`,
          { modelName: name },
          { cause: error }
        );
      }
      this.drift.setReference(name, parsed.data);
    });
  }

  /**
   * Capture a reference distribution from baseline samples and apply it.
   */
  public async captureReference(name: ModelName, samples: readonly FeatureVector[]): Promise<ReferenceDistribution> {
    const entry = this.catalog.require(name);
    const reference = buildReference(samples, {
      bins: this.config.drift.bins,
      featureNames: entry.featureNames,
    });
    await this.setReference(name, reference);
    return reference;
  }

  /**
   * Stop timers, drop loaded models and detach listeners. Idempotent.
   */
  public async shutdown(): Promise<void> {
    if (this.shutdownPromise) {
      return this.shutdownPromise;
    }

    this.shutdownPromise = (async () => {
      this.shutDown = true;
      this.metrics.stop();

      if (this.telemetry) {
        this.telemetry.detach();
        await this.telemetry.manager.shutdown();
        this.telemetry = null;
      }

      await this.adminLocks.runExclusiveMany(this.catalog.names(), () => this.cache.clearAll());

      this.executor.removeAllListeners();
      this.cache.removeAllListeners();
      this.registry.removeAllListeners();
      this.metrics.removeAllListeners();
      this.drift.removeAllListeners();

      this.logger.info('Serving runtime shut down');
    })();

    return this.shutdownPromise;
  }

  public isShutDown(): boolean {
    return this.shutDown;
  }

  private async runInitialize(): Promise<InitializationReport> {
    const report: InitializationReport = {
      registered: [],
      restored: [],
      activated: [],
      references: [],
      warmed: [],
      errors: [],
    };

    const discovery = await this.discover();
    report.registered = discovery.registered;
    for (const failure of discovery.errors) {
      report.errors.push({ modelName: failure.modelName, stage: 'discover', error: failure.error });
    }

    const restore = await this.registry.initialize();
    report.restored = restore.restored;
    // A corrupted state entry is never papered over with the default version
    const unrestored = new Set<string>();
    for (const failure of restore.errors) {
      unrestored.add(failure.modelName);
      report.errors.push({ modelName: failure.modelName, stage: 'restore', error: failure.error });
    }

    for (const name of this.catalog.names()) {
      const defaultVersion = this.catalog.require(name).defaultVersion;
      if (defaultVersion === undefined || this.registry.getState(name)) {
        continue;
      }
      if (unrestored.has(name)) {
        this.logger.warn({ modelName: name, defaultVersion }, 'Active version state is corrupted; default version not applied');
        continue;
      }
      try {
        await this.setActive(name, defaultVersion);
        report.activated.push({ name, version: defaultVersion });
      } catch (error) {
        report.errors.push({ modelName: name, stage: 'default_version', error: toServingError(error) });
      }
    }

    if (this.config.drift.enabled) {
      for (const name of this.catalog.names()) {
        try {
          const reference = await this.referenceStore.load(name);
          if (reference) {
            this.drift.setReference(name, reference);
            report.references.push(name);
          }
        } catch (error) {
          const servingError = toServingError(error, 'ReferenceCorrupted');
          report.errors.push({ modelName: name, stage: 'reference', error: servingError });
          this.logger.error({ modelName: name, err: servingError }, 'Failed to load reference statistics');
        }
      }
    }

    for (const name of this.config.cache.warmup_on_start) {
      if (unrestored.has(name)) {
        this.logger.warn({ modelName: name }, 'Active version state is corrupted; warmup skipped');
        continue;
      }
      try {
        await this.cache.getOrLoad(name, this.registry.getActive(name));
        report.warmed.push(name);
      } catch (error) {
        report.errors.push({ modelName: name, stage: 'warmup', error: toServingError(error) });
      }
    }

    if (this.config.telemetry.enabled) {
      this.telemetry = await createTelemetryBridge(
        {
          enabled: true,
          serviceName: this.config.telemetry.service_name,
          prometheusPort: this.config.telemetry.prometheus_port,
          reader: this.telemetryReader,
          registerGlobal: this.telemetryReader === undefined,
        },
        this,
        componentLogger(this.logger, 'Telemetry')
      );
    }

    this.metrics.start();

    this.logger.info(
      {
        registered: report.registered.length,
        restored: report.restored,
        activated: report.activated.map((a) => `${a.name}@${a.version}`),
        references: report.references,
        warmed: report.warmed,
        failures: report.errors.length,
      },
      'Serving runtime initialized'
    );
    return report;
  }

  private createArtifactLoader(formats: ModelFormatRegistry): ModelLoader<InferenceModel> {
    return async (name, version, signal) => {
      const record = this.registry.getRecord(name, version);
      const raw = await this.artifactStore.read(record.artifactPath);
      if (signal.aborted) {
        throw new ServingError('Timeout', `Load of ${name}@${version} aborted`, { modelName: name, version });
      }
      return formats.decode(raw, { name, version, artifactPath: record.artifactPath });
    };
  }

  private assertRunning(): void {
    if (this.shutDown) {
      throw new ServingError('Unavailable', 'Serving runtime has been shut down');
    }
  }
}
