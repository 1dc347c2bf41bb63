import { describe, it, expect, beforeEach, vi, type Mock } from 'vitest';
import { ModelCache } from '../../../src/core/model-cache.js';
import { PredictionExecutor } from '../../../src/core/prediction-executor.js';
import { DriftDetector, createDefaultDriftConfig } from '../../../src/monitoring/drift-detector.js';
import { MetricsAggregator, createDefaultAggregatorConfig } from '../../../src/monitoring/metrics-aggregator.js';
import type { ModelCatalog } from '../../../src/registry/model-catalog.js';
import { VersionRegistry } from '../../../src/registry/version-registry.js';
import type { InferenceModel, RawPrediction } from '../../../src/types/models.js';
import { createTestCatalog, flush, functionModel, silentLogger, stubModel } from '../../helpers/fixtures.js';

const FALLBACK = 'Uncertain - please consult healthcare professional';

describe('PredictionExecutor', () => {
  let catalog: ModelCatalog;
  let registry: VersionRegistry;
  let metrics: MetricsAggregator;
  let drift: DriftDetector;
  let model: InferenceModel;
  let loader: Mock<(name: string, version: string) => Promise<InferenceModel>>;
  let executor: PredictionExecutor;

  beforeEach(async () => {
    catalog = createTestCatalog();
    registry = new VersionRegistry({ catalog });
    registry.register('heart', 'v1', 'v1/heart.json');
    registry.register('diabetes', 'v1', 'v1/diabetes.json');
    await registry.setActive('heart', 'v1');

    metrics = new MetricsAggregator(createDefaultAggregatorConfig(), {
      thresholdFor: (name) => catalog.confidenceThreshold(name),
    });
    drift = new DriftDetector(createDefaultDriftConfig(), { catalog });

    model = stubModel('Disease', 0.9);
    loader = vi.fn(async (_name: string, _version: string) => model);
    const cache = new ModelCache<InferenceModel>({ loader, logger: silentLogger });

    executor = new PredictionExecutor({
      catalog,
      registry,
      cache,
      metrics,
      drift,
      defaultTimeoutMs: 1000,
      logger: silentLogger,
    });
  });

  describe('successful predictions', () => {
    it('returns the model label above the threshold', async () => {
      const result = await executor.predict('heart', [63, 233]);

      expect(result).toMatchObject({
        modelName: 'heart',
        prediction: 'Disease',
        rawPrediction: 'Disease',
        confidence: 0.9,
        version: 'v1',
        fallbackUsed: false,
      });
      expect(result.latencyMs).toBeGreaterThanOrEqual(0);
      expect(loader).toHaveBeenCalledWith('heart', 'v1', expect.any(AbortSignal));
    });

    it('substitutes the fallback label below the threshold', async () => {
      model = stubModel('Disease', 0.6);

      const result = await executor.predict('heart', [63, 233]);

      expect(result.prediction).toBe(FALLBACK);
      expect(result.rawPrediction).toBe('Disease');
      expect(result.confidence).toBe(0.6);
      expect(result.fallbackUsed).toBe(true);

      const events = metrics.getLowConfidenceEvents();
      expect(events).toHaveLength(1);
      expect(events[0]).toMatchObject({ modelName: 'heart', confidence: 0.6, threshold: 0.75 });
    });

    it('keeps the model label at exactly the threshold', async () => {
      model = stubModel('Disease', 0.75);

      const result = await executor.predict('heart', [63, 233]);

      expect(result.fallbackUsed).toBe(false);
      expect(result.prediction).toBe('Disease');
    });

    it('records successes in the metrics aggregator', async () => {
      await executor.predict('heart', [63, 233]);
      await executor.predict('heart', [41, 204]);

      const heart = metrics.getModelMetrics('heart');
      expect(heart?.successCount).toBe(2);
      expect(heart?.failureCount).toBe(0);
      expect(heart?.confidence.mean).toBe(0.9);
      expect(heart?.latency.count).toBe(2);
    });

    it('emits a prediction event', async () => {
      const listener = vi.fn();
      executor.on('prediction', listener);

      const result = await executor.predict('heart', [63, 233]);

      expect(listener).toHaveBeenCalledWith(result);
    });
  });

  describe('validation failures', () => {
    it('rejects unknown models without recording metrics', async () => {
      await expect(executor.predict('lungs', [1, 2])).rejects.toMatchObject({
        code: 'NotFound',
        message: 'Unknown model: lungs',
      });
      expect(metrics.snapshot().models).toEqual({});
    });

    it('rejects feature vectors of the wrong length', async () => {
      await expect(executor.predict('heart', [63])).rejects.toMatchObject({
        code: 'InvalidParams',
        message: 'Model heart expects 2 features, got 1',
      });

      const heart = metrics.getModelMetrics('heart');
      expect(heart?.failureCount).toBe(1);
      expect(heart?.confidence.count).toBe(0);
      expect(loader).not.toHaveBeenCalled();
    });

    it('rejects non-finite features', async () => {
      await expect(executor.predict('heart', [63, Number.NaN])).rejects.toMatchObject({ code: 'InvalidParams' });
    });

    it('rejects models without an active version', async () => {
      await expect(executor.predict('diabetes', [1, 2, 3])).rejects.toMatchObject({
        code: 'NotFound',
        message: 'No active version for diabetes',
      });
      expect(metrics.getModelMetrics('diabetes')?.failureCount).toBe(1);
    });

    it('rejects a non-positive timeout', async () => {
      await expect(executor.predict('heart', [63, 233], { timeoutMs: 0 })).rejects.toMatchObject({
        code: 'InvalidParams',
        message: 'timeoutMs must be a positive number, got 0',
      });
      expect(metrics.getModelMetrics('heart')?.failureCount).toBe(1);
    });

    it('emits predictionFailed with the resolved version', async () => {
      const listener = vi.fn();
      executor.on('predictionFailed', listener);
      model = functionModel(() => {
        throw new Error('boom');
      });

      await expect(executor.predict('heart', [63, 233])).rejects.toThrow();

      expect(listener).toHaveBeenCalledTimes(1);
      expect(listener.mock.calls[0][0]).toBe('heart');
      expect(listener.mock.calls[0][1]).toMatchObject({ code: 'Unavailable' });
      expect(listener.mock.calls[0][2]).toBe('v1');
    });
  });

  describe('inference failures', () => {
    it('maps thrown inference errors to Unavailable', async () => {
      model = functionModel(() => {
        throw new Error('boom');
      });

      await expect(executor.predict('heart', [63, 233])).rejects.toMatchObject({
        code: 'Unavailable',
        message: 'Inference failed for heart@v1: boom',
      });
      expect(metrics.getModelMetrics('heart')?.failureCount).toBe(1);
    });

    it('rejects confidences outside [0, 1]', async () => {
      model = stubModel('Disease', 1.5);

      await expect(executor.predict('heart', [63, 233])).rejects.toMatchObject({
        code: 'Unavailable',
        message: 'Model heart@v1 returned confidence outside [0, 1]: 1.5',
      });
    });

    it('maps load failures to Unavailable', async () => {
      loader.mockRejectedValueOnce(new Error('missing weights'));

      await expect(executor.predict('heart', [63, 233])).rejects.toMatchObject({
        code: 'Unavailable',
        message: 'Failed to load model heart@v1: missing weights',
      });
    });

    it('rejects when the model reports a different feature count', async () => {
      model = stubModel('Disease', 0.9, 3);

      await expect(executor.predict('heart', [63, 233])).rejects.toMatchObject({
        code: 'InvalidParams',
        message: 'Model heart@v1 expects 3 features, got 2',
      });
    });
  });

  describe('deadlines', () => {
    it('times out inference that never settles', async () => {
      model = functionModel(() => new Promise<RawPrediction>(() => undefined));

      await expect(executor.predict('heart', [63, 233], { timeoutMs: 20 })).rejects.toMatchObject({
        code: 'Timeout',
        message: 'Request timed out after 20ms: predict (model: heart)',
      });

      const heart = metrics.getModelMetrics('heart');
      expect(heart?.failureCount).toBe(1);
    });

    it('passes the deadline signal to the model', async () => {
      let received: AbortSignal | undefined;
      model = functionModel((_features, signal) => {
        received = signal;
        return new Promise<RawPrediction>(() => undefined);
      });

      await expect(executor.predict('heart', [63, 233], { timeoutMs: 20 })).rejects.toMatchObject({
        code: 'Timeout',
      });
      expect(received?.aborted).toBe(true);
    });

    it('honors the caller abort signal', async () => {
      model = functionModel(() => new Promise<RawPrediction>(() => undefined));
      const controller = new AbortController();

      const pending = executor.predict('heart', [63, 233], { signal: controller.signal });
      await flush();
      controller.abort();

      await expect(pending).rejects.toMatchObject({
        code: 'Timeout',
        message: 'Prediction for heart was aborted by the caller',
      });
    });
  });

  describe('drift hand-off', () => {
    it('checks drift after responding', async () => {
      const check = vi.spyOn(drift, 'check');

      await executor.predict('heart', [63, 233]);
      expect(check).not.toHaveBeenCalled();

      await flush();
      expect(check).toHaveBeenCalledWith('heart', [63, 233]);
    });

    it('skips drift checks for failed predictions', async () => {
      const check = vi.spyOn(drift, 'check');
      model = stubModel('Disease', 2);

      await expect(executor.predict('heart', [63, 233])).rejects.toThrow();
      await flush();

      expect(check).not.toHaveBeenCalled();
    });

    it('does not surface drift errors to the caller', async () => {
      vi.spyOn(drift, 'check').mockImplementation(() => {
        throw new Error('reference mismatch');
      });

      await expect(executor.predict('heart', [63, 233])).resolves.toMatchObject({ prediction: 'Disease' });
      await flush();
    });
  });
});
