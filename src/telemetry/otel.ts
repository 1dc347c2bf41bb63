/**
 * OpenTelemetry infrastructure for the serving runtime.
 *
 * Provides the metrics provider, Prometheus exporter, and standardized
 * instruments for predictions, model loading, drift and version changes.
 *
 * @module telemetry/otel
 */

import { metrics, type Meter, type Counter, type Histogram } from '@opentelemetry/api';
import { MeterProvider, type MetricReader } from '@opentelemetry/sdk-metrics';
import { PrometheusExporter } from '@opentelemetry/exporter-prometheus';
import type { Logger } from 'pino';

/**
 * Configuration options for OpenTelemetry metrics.
 */
export interface TelemetryConfig {
  /**
   * Enable metrics collection (default: false).
   */
  enabled: boolean;
  /**
   * Service name for metrics (default: 'model-serving-core').
   */
  serviceName?: string;
  /**
   * Prometheus exporter port (default: 9464). Ignored when `reader` is set.
   */
  prometheusPort?: number;
  /**
   * Reader to collect metrics with instead of the Prometheus exporter.
   */
  reader?: MetricReader;
  /**
   * Register the provider as the process-wide global meter provider.
   */
  registerGlobal?: boolean;
  /**
   * Optional logger for telemetry events.
   */
  logger?: Logger;
}

/**
 * Internal normalized config with all optional fields resolved.
 * @internal
 */
interface NormalizedTelemetryConfig {
  enabled: boolean;
  serviceName: string;
  prometheusPort: number;
  reader: MetricReader | undefined;
  registerGlobal: boolean;
  logger: Logger | undefined;
}

/**
 * Standard metrics exported by the serving runtime.
 */
export interface ServingMetrics {
  // Predictions
  predictionsTotal: Counter;
  predictionLatency: Histogram;
  predictionFallbacks: Counter;

  // Model lifecycle
  modelLoadsTotal: Counter;
  modelLoadFailures: Counter;
  modelLoadDuration: Histogram;
  versionChanges: Counter;

  // Monitoring
  driftEventsTotal: Counter;
}

/**
 * OpenTelemetry telemetry manager.
 *
 * @example
 * ```typescript
 * const telemetry = new TelemetryManager({
 *   enabled: true,
 *   serviceName: 'model-serving-core',
 *   prometheusPort: 9464
 * });
 *
 * await telemetry.start();
 * telemetry.metrics.predictionsTotal.add(1, { model: 'heart', version: 'v1', outcome: 'success' });
 * await telemetry.shutdown();
 * ```
 */
export class TelemetryManager {
  private readonly config: NormalizedTelemetryConfig;
  private meterProvider: MeterProvider | null = null;
  private meter: Meter | null = null;
  private _metrics: ServingMetrics | null = null;
  private started = false;

  constructor(config: TelemetryConfig) {
    this.config = {
      enabled: config.enabled,
      serviceName: config.serviceName || 'model-serving-core',
      prometheusPort: config.prometheusPort ?? 9464,
      reader: config.reader,
      registerGlobal: config.registerGlobal ?? false,
      logger: config.logger,
    };
  }

  /**
   * Get the initialized metrics. Throws if not started.
   */
  public get metrics(): ServingMetrics {
    if (!this._metrics) {
      throw new Error('TelemetryManager not started. Call start() first.');
    }
    return this._metrics;
  }

  /**
   * Initialize the metrics provider and create metrics.
   *
   * @throws {Error} if telemetry is disabled.
   */
  public async start(): Promise<void> {
    if (!this.config.enabled) {
      throw new Error('Telemetry is disabled. Set enabled:true in config.');
    }

    if (this.started) {
      this.config.logger?.warn('TelemetryManager already started');
      return;
    }

    try {
      // The Prometheus exporter is a pull-based reader serving /metrics itself
      const reader = this.config.reader ?? new PrometheusExporter({ port: this.config.prometheusPort });

      this.meterProvider = new MeterProvider({ readers: [reader] });

      if (this.config.registerGlobal) {
        metrics.setGlobalMeterProvider(this.meterProvider);
      }

      this.meter = this.meterProvider.getMeter(this.config.serviceName, '0.1.0');
      this._metrics = this.createMetrics(this.meter);

      this.started = true;

      this.config.logger?.info(
        {
          serviceName: this.config.serviceName,
          exporter: this.config.reader ? 'custom' : 'prometheus',
        },
        'OpenTelemetry metrics started'
      );

      if (!this.config.reader) {
        this.config.logger?.info(
          { endpoint: `http://localhost:${this.config.prometheusPort}/metrics` },
          'Prometheus metrics available'
        );
      }
    } catch (error) {
      this.config.logger?.error({ error }, 'Failed to start telemetry');
      throw error;
    }
  }

  /**
   * Shutdown the telemetry manager and flush all metrics.
   */
  public async shutdown(): Promise<void> {
    if (!this.started) {
      return;
    }

    try {
      await this.meterProvider?.shutdown();

      this.started = false;
      this._metrics = null;
      this.meter = null;
      this.meterProvider = null;

      this.config.logger?.info('OpenTelemetry metrics shut down');
    } catch (error) {
      this.config.logger?.error({ error }, 'Failed to shutdown telemetry');
      throw error;
    }
  }

  /**
   * Check if telemetry is started and active.
   */
  public isStarted(): boolean {
    return this.started;
  }

  private createMetrics(meter: Meter): ServingMetrics {
    return {
      predictionsTotal: meter.createCounter('predictions_total', {
        description: 'Total number of predictions by outcome',
        unit: '1',
      }),
      predictionLatency: meter.createHistogram('prediction_latency_ms', {
        description: 'End-to-end prediction latency',
        unit: 'ms',
      }),
      predictionFallbacks: meter.createCounter('prediction_fallbacks_total', {
        description: 'Predictions answered with the fallback label',
        unit: '1',
      }),

      modelLoadsTotal: meter.createCounter('model_loads_total', {
        description: 'Total number of models loaded',
        unit: '1',
      }),
      modelLoadFailures: meter.createCounter('model_load_failures_total', {
        description: 'Total number of failed model loads',
        unit: '1',
      }),
      modelLoadDuration: meter.createHistogram('model_load_duration_ms', {
        description: 'Time taken to load a model',
        unit: 'ms',
      }),
      versionChanges: meter.createCounter('version_changes_total', {
        description: 'Active version switches and rollbacks',
        unit: '1',
      }),

      driftEventsTotal: meter.createCounter('drift_events_total', {
        description: 'Input drift events detected',
        unit: '1',
      }),
    };
  }
}

/**
 * Create a telemetry manager with the given configuration.
 */
export function createTelemetry(config: TelemetryConfig): TelemetryManager {
  return new TelemetryManager(config);
}
