import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { pino } from 'pino';
import { attachTelemetry, createTelemetryBridge, getMetrics } from '../../../src/telemetry/bridge.js';
import type { TelemetrySources } from '../../../src/telemetry/bridge.js';
import { TelemetryManager } from '../../../src/telemetry/otel.js';
import { ModelCache } from '../../../src/core/model-cache.js';
import { PredictionExecutor } from '../../../src/core/prediction-executor.js';
import { DriftDetector } from '../../../src/monitoring/drift-detector.js';
import { MetricsAggregator, createDefaultAggregatorConfig } from '../../../src/monitoring/metrics-aggregator.js';
import { buildReference } from '../../../src/monitoring/psi.js';
import { VersionRegistry } from '../../../src/registry/version-registry.js';
import type { InferenceModel } from '../../../src/types/models.js';
import { createTestCatalog, flush, stubModel } from '../../helpers/fixtures.js';
import { TestReader, counterValue, histogramCount } from '../../helpers/telemetry.js';

function createSources(): TelemetrySources & { drift: DriftDetector } {
  const catalog = createTestCatalog();
  const registry = new VersionRegistry({ catalog });
  const cache = new ModelCache<InferenceModel>({
    loader: async (name) => {
      if (name === 'diabetes') {
        throw new Error('artifact missing');
      }
      return stubModel('Disease', 0.6);
    },
  });
  const drift = new DriftDetector({ enabled: true, windowSize: 2, threshold: 0.2, maxEvents: 10 }, { catalog });
  const executor = new PredictionExecutor({
    catalog,
    registry,
    cache,
    metrics: new MetricsAggregator(createDefaultAggregatorConfig()),
    drift,
  });
  return { executor, cache, registry, drift };
}

describe('Telemetry Bridge', () => {
  const logger = pino({ level: 'silent' });

  describe('createTelemetryBridge', () => {
    it('should start and attach a manager when enabled', async () => {
      const reader = new TestReader();
      const sources = createSources();

      const { manager, detach } = await createTelemetryBridge(
        { enabled: true, serviceName: 'test-bridge', reader },
        sources,
        logger
      );

      expect(manager.isStarted()).toBe(true);
      expect(getMetrics(manager)).toBeDefined();
      expect(sources.executor.listenerCount('prediction')).toBe(1);

      detach();
      await manager.shutdown();
    });

    it('should leave the manager stopped when disabled', async () => {
      const sources = createSources();

      const { manager, detach } = await createTelemetryBridge(
        { enabled: false, serviceName: 'test-bridge' },
        sources,
        logger
      );

      expect(manager.isStarted()).toBe(false);
      expect(getMetrics(manager)).toBeUndefined();
      expect(sources.executor.listenerCount('prediction')).toBe(0);
      detach();
    });
  });

  describe('attachTelemetry', () => {
    let reader: TestReader;
    let manager: TelemetryManager;
    let sources: ReturnType<typeof createSources>;
    let detach: () => void;

    beforeEach(async () => {
      reader = new TestReader();
      manager = new TelemetryManager({ enabled: true, serviceName: 'test-hooks', reader, logger });
      await manager.start();

      sources = createSources();
      sources.registry.register('heart', 'v1', 'v1/heart.json');
      sources.registry.register('diabetes', 'v1', 'v1/diabetes.json');
      detach = attachTelemetry(sources, manager, logger);
    });

    afterEach(async () => {
      detach();
      await manager.shutdown();
    });

    it('should record version changes', async () => {
      sources.registry.register('heart', 'v2', 'v2/heart.json');
      await sources.registry.setActive('heart', 'v1');
      await sources.registry.setActive('heart', 'v2');
      await sources.registry.rollback('heart');

      expect(await counterValue(reader, 'version_changes_total', { change: 'activate' })).toBe(2);
      expect(await counterValue(reader, 'version_changes_total', { change: 'rollback', version: 'v1' })).toBe(1);
    });

    it('should record predictions, fallbacks and loads', async () => {
      await sources.registry.setActive('heart', 'v1');

      await sources.executor.predict('heart', [63, 233]);
      await sources.executor.predict('heart', [63, 233]);

      const labels = { model: 'heart', version: 'v1' };
      expect(await counterValue(reader, 'predictions_total', { ...labels, outcome: 'success' })).toBe(2);
      expect(await counterValue(reader, 'prediction_fallbacks_total', labels)).toBe(2);
      expect(await histogramCount(reader, 'prediction_latency_ms', labels)).toBe(2);
      expect(await counterValue(reader, 'model_loads_total', labels)).toBe(1);
      expect(await histogramCount(reader, 'model_load_duration_ms', labels)).toBe(1);
    });

    it('should record failed predictions and loads', async () => {
      await sources.registry.setActive('diabetes', 'v1');

      await expect(sources.executor.predict('diabetes', [1, 2, 3])).rejects.toMatchObject({ code: 'Unavailable' });
      await expect(sources.executor.predict('heart', [63, 233])).rejects.toMatchObject({ code: 'NotFound' });

      expect(
        await counterValue(reader, 'predictions_total', { model: 'diabetes', version: 'v1', outcome: 'Unavailable' })
      ).toBe(1);
      expect(
        await counterValue(reader, 'predictions_total', { model: 'heart', version: 'none', outcome: 'NotFound' })
      ).toBe(1);
      expect(await counterValue(reader, 'model_load_failures_total', { model: 'diabetes', version: 'v1' })).toBe(1);
    });

    it('should record drift events', async () => {
      await sources.registry.setActive('heart', 'v1');
      sources.drift.setReference(
        'heart',
        buildReference(
          Array.from({ length: 100 }, (_, i) => [i, 200 + i]),
          { featureNames: ['age', 'chol'] }
        )
      );

      await sources.executor.predict('heart', [500, 900]);
      await sources.executor.predict('heart', [500, 900]);
      await flush();

      expect(await counterValue(reader, 'drift_events_total', { model: 'heart' })).toBe(1);
    });

    it('should stop recording once detached', async () => {
      await sources.registry.setActive('heart', 'v1');
      detach();

      await sources.executor.predict('heart', [63, 233]);

      expect(await counterValue(reader, 'predictions_total')).toBe(0);
      expect(sources.executor.listenerCount('prediction')).toBe(0);
    });
  });
});
