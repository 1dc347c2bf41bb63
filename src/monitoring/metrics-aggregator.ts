/**
 * Metrics Aggregator
 *
 * Per-model prediction metrics: success and failure counts, latency
 * percentiles and confidence statistics. Samples are folded into running
 * aggregates as they arrive and never retained.
 */

import { EventEmitter } from 'eventemitter3';
import type { Logger } from 'pino';
import { ServingError } from '../api/errors.js';
import type { ModelName } from '../types/models.js';
import { TDigest } from './TDigest.js';

/**
 * Configuration for metrics aggregator
 */
export interface MetricsAggregatorConfig {
  // TDigest compression factor for percentile accuracy
  tdigestCompression: number;

  // How often to emit a snapshot event while started (milliseconds)
  snapshotIntervalMs: number;

  // Low-confidence events kept, oldest dropped first
  maxLowConfidenceEvents: number;

  // Threshold used when no per-model resolver is given
  defaultConfidenceThreshold: number;
}

export interface MetricsAggregatorOptions {
  /** Per-model confidence threshold (the catalog's, in a runtime) */
  thresholdFor?: (name: ModelName) => number;
  logger?: Logger;
  now?: () => Date;
}

export interface LowConfidenceEvent {
  readonly modelName: ModelName;
  readonly confidence: number;
  readonly threshold: number;
  /** ISO timestamp */
  readonly timestamp: string;
}

export interface LatencySummary {
  count: number;
  mean: number;
  min: number;
  max: number;
  p50: number;
  p95: number;
  p99: number;
}

export interface ConfidenceSummary {
  count: number;
  mean: number;
  min: number;
  max: number;
}

export interface ModelMetrics {
  successCount: number;
  failureCount: number;
  totalCount: number;
  lowConfidenceCount: number;
  latency: LatencySummary;
  confidence: ConfidenceSummary;
}

export interface MetricsSnapshot {
  /** ISO timestamp */
  generatedAt: string;
  models: Readonly<Record<ModelName, Readonly<ModelMetrics>>>;
}

/**
 * Aggregator events
 */
export interface MetricsAggregatorEvents {
  snapshot: (snapshot: MetricsSnapshot) => void;
  lowConfidence: (event: LowConfidenceEvent) => void;
}

/**
 * Internal per-model tracker
 */
interface ModelTracker {
  successCount: number;
  failureCount: number;
  lowConfidenceCount: number;
  latency: TDigest;
  confidenceCount: number;
  confidenceSum: number;
  confidenceMin: number;
  confidenceMax: number;
}

export class MetricsAggregator extends EventEmitter<MetricsAggregatorEvents> {
  private readonly config: MetricsAggregatorConfig;
  private readonly thresholdFor: (name: ModelName) => number;
  private readonly logger?: Logger;
  private readonly now: () => Date;
  private readonly trackers = new Map<ModelName, ModelTracker>();
  private lowConfidenceEvents: LowConfidenceEvent[] = [];
  private snapshotTimer?: NodeJS.Timeout;
  private started = false;

  constructor(config: MetricsAggregatorConfig, options: MetricsAggregatorOptions = {}) {
    super();
    this.config = config;
    this.thresholdFor = options.thresholdFor ?? (() => config.defaultConfidenceThreshold);
    this.logger = options.logger;
    this.now = options.now ?? (() => new Date());
  }

  /**
   * Start periodic snapshot events
   */
  public start(): void {
    if (this.started) {
      this.logger?.warn('MetricsAggregator already started');
      return;
    }

    this.logger?.info({ snapshotIntervalMs: this.config.snapshotIntervalMs }, 'Starting metrics aggregator');

    this.snapshotTimer = setInterval(() => {
      this.emitSnapshot();
    }, this.config.snapshotIntervalMs);
    this.snapshotTimer.unref();

    this.started = true;
  }

  /**
   * Stop periodic snapshots
   */
  public stop(): void {
    if (!this.started) {
      return;
    }

    if (this.snapshotTimer) {
      clearInterval(this.snapshotTimer);
      this.snapshotTimer = undefined;
    }

    this.started = false;
    this.logger?.info('Stopped metrics aggregator');
  }

  public isStarted(): boolean {
    return this.started;
  }

  /**
   * Record the outcome of one prediction.
   *
   * @param confidence - Confidence of the produced label, or null when
   *   inference produced none (failed predictions)
   */
  public record(name: ModelName, latencyMs: number, confidence: number | null, success: boolean): void {
    if (!Number.isFinite(latencyMs) || latencyMs < 0) {
      throw new ServingError('InvalidParams', `Latency must be a finite non-negative number, got ${latencyMs}`, {
        modelName: name,
        latencyMs,
      });
    }
    if (confidence !== null && !(confidence >= 0 && confidence <= 1)) {
      throw new ServingError('InvalidParams', `Confidence must be within [0, 1], got ${confidence}`, {
        modelName: name,
        confidence,
      });
    }

    const threshold = confidence !== null ? this.thresholdFor(name) : undefined;
    const tracker = this.getTracker(name);

    if (success) {
      tracker.successCount += 1;
    } else {
      tracker.failureCount += 1;
    }
    tracker.latency.add(latencyMs);

    if (confidence === null || threshold === undefined) {
      return;
    }

    tracker.confidenceCount += 1;
    tracker.confidenceSum += confidence;
    tracker.confidenceMin = Math.min(tracker.confidenceMin, confidence);
    tracker.confidenceMax = Math.max(tracker.confidenceMax, confidence);

    if (confidence < threshold) {
      tracker.lowConfidenceCount += 1;

      const event: LowConfidenceEvent = Object.freeze({
        modelName: name,
        confidence,
        threshold,
        timestamp: this.now().toISOString(),
      });
      this.lowConfidenceEvents.push(event);
      if (this.lowConfidenceEvents.length > this.config.maxLowConfidenceEvents) {
        this.lowConfidenceEvents = this.lowConfidenceEvents.slice(-this.config.maxLowConfidenceEvents);
      }

      try {
        this.emit('lowConfidence', event);
      } catch (err) {
        this.logger?.error({ err, modelName: name }, 'Error emitting lowConfidence event');
      }
    }
  }

  /**
   * Frozen point-in-time view of every tracked model
   */
  public snapshot(): MetricsSnapshot {
    const models: Record<ModelName, Readonly<ModelMetrics>> = {};

    for (const [name, tracker] of this.trackers) {
      models[name] = Object.freeze(summarize(tracker));
    }

    return Object.freeze({
      generatedAt: this.now().toISOString(),
      models: Object.freeze(models),
    });
  }

  /**
   * Metrics for one model, or undefined when nothing was recorded for it
   */
  public getModelMetrics(name: ModelName): Readonly<ModelMetrics> | undefined {
    const tracker = this.trackers.get(name);
    return tracker ? Object.freeze(summarize(tracker)) : undefined;
  }

  /**
   * Recent low-confidence events, oldest first
   */
  public getLowConfidenceEvents(): readonly LowConfidenceEvent[] {
    return Object.freeze([...this.lowConfidenceEvents]);
  }

  private getTracker(name: ModelName): ModelTracker {
    let tracker = this.trackers.get(name);

    if (!tracker) {
      this.logger?.debug({ modelName: name }, 'Initialized metric tracker');
      tracker = {
        successCount: 0,
        failureCount: 0,
        lowConfidenceCount: 0,
        latency: new TDigest(this.config.tdigestCompression),
        confidenceCount: 0,
        confidenceSum: 0,
        confidenceMin: Number.POSITIVE_INFINITY,
        confidenceMax: Number.NEGATIVE_INFINITY,
      };
      this.trackers.set(name, tracker);
    }

    return tracker;
  }

  private emitSnapshot(): void {
    const snapshot = this.snapshot();
    try {
      this.emit('snapshot', snapshot);
    } catch (err) {
      this.logger?.error({ err }, 'Error emitting snapshot event');
    }
  }
}

function summarize(tracker: ModelTracker): ModelMetrics {
  const { latency } = tracker;
  const hasLatency = latency.getCount() > 0;
  const hasConfidence = tracker.confidenceCount > 0;

  return {
    successCount: tracker.successCount,
    failureCount: tracker.failureCount,
    totalCount: tracker.successCount + tracker.failureCount,
    lowConfidenceCount: tracker.lowConfidenceCount,
    latency: {
      count: latency.getCount(),
      mean: hasLatency ? latency.getMean() : 0,
      min: hasLatency ? latency.getMin() : 0,
      max: hasLatency ? latency.getMax() : 0,
      p50: hasLatency ? latency.percentile(0.5) : 0,
      p95: hasLatency ? latency.percentile(0.95) : 0,
      p99: hasLatency ? latency.percentile(0.99) : 0,
    },
    confidence: {
      count: tracker.confidenceCount,
      mean: hasConfidence ? tracker.confidenceSum / tracker.confidenceCount : 0,
      min: hasConfidence ? tracker.confidenceMin : 0,
      max: hasConfidence ? tracker.confidenceMax : 0,
    },
  };
}

/**
 * Dashboard payload, as served by the metrics endpoint
 */
export interface DashboardSnapshot {
  predictions: Record<ModelName, { success: number; failure: number }>;
  latencies: Record<ModelName, LatencySummary | { count: 0 }>;
  confidence: Record<ModelName, ConfidenceSummary | { count: 0 }>;
  low_confidence_events: Array<{ model: ModelName; confidence: number; threshold: number; timestamp: string }>;
}

/**
 * Convert a snapshot into the dashboard's payload shape. Models with no
 * samples for a section report `{ count: 0 }` there.
 */
export function toDashboardSnapshot(
  snapshot: MetricsSnapshot,
  events: readonly LowConfidenceEvent[]
): DashboardSnapshot {
  const dashboard: DashboardSnapshot = {
    predictions: {},
    latencies: {},
    confidence: {},
    low_confidence_events: events.map((event) => ({
      model: event.modelName,
      confidence: event.confidence,
      threshold: event.threshold,
      timestamp: event.timestamp,
    })),
  };

  for (const [name, metrics] of Object.entries(snapshot.models)) {
    dashboard.predictions[name] = { success: metrics.successCount, failure: metrics.failureCount };
    dashboard.latencies[name] = metrics.latency.count > 0 ? { ...metrics.latency } : { count: 0 };
    dashboard.confidence[name] = metrics.confidence.count > 0 ? { ...metrics.confidence } : { count: 0 };
  }

  return dashboard;
}

/**
 * Create default metrics aggregator configuration
 */
export function createDefaultAggregatorConfig(): MetricsAggregatorConfig {
  return {
    tdigestCompression: 100,
    snapshotIntervalMs: 10000, // 10 seconds
    maxLowConfidenceEvents: 100,
    defaultConfidenceThreshold: 0.75,
  };
}
