/**
 * Drift Detector
 *
 * Compares the distribution of recent prediction inputs against a stored
 * reference distribution and reports input drift.
 *
 * Architecture:
 * - One bounded RollingWindow of feature vectors per model
 * - Evaluation once per cycle: when the window first fills and every
 *   `windowSize` appends after that
 * - Per-feature Population Stability Index over the reference's bins;
 *   the cycle's magnitude is the maximum across features
 * - At most one DriftEvent per cycle, appended to a capped log; the model
 *   is flagged for retraining review until the flag is cleared
 */

import { EventEmitter } from 'eventemitter3';
import type { Logger } from 'pino';
import { ServingError, zodErrorToServingError } from '../api/errors.js';
import type { ModelCatalog } from '../registry/model-catalog.js';
import { ReferenceDistributionSchema, type ReferenceDistribution } from '../types/schemas/drift.js';
import type { FeatureVector, ModelName } from '../types/models.js';
import { lazyLog } from '../utils/logger-helpers.js';
import { binProportions, populationStabilityIndex } from './psi.js';
import { RollingWindow } from './rolling-window.js';

/**
 * Configuration for drift detector
 */
export interface DriftDetectorConfig {
  enabled: boolean;

  // Feature vectors per rolling window (and appends per evaluation cycle)
  windowSize: number;

  // PSI above which a cycle is reported as drift
  threshold: number;

  // Drift events kept in the log, oldest dropped first
  maxEvents: number;
}

export interface DriftDetectorOptions {
  /** Rejects names outside the catalog when given */
  catalog?: ModelCatalog;
  logger?: Logger;
  now?: () => Date;
}

export interface FeatureDriftScore {
  name: string;
  psi: number;
}

/**
 * Outcome of one evaluation cycle
 */
export interface DriftEvaluation {
  modelName: ModelName;
  magnitude: number;
  threshold: number;
  driftDetected: boolean;
  features: FeatureDriftScore[];
  windowSize: number;
  timestamp: string;
}

export interface DriftEvent {
  readonly modelName: ModelName;
  readonly magnitude: number;
  readonly threshold: number;
  /** ISO timestamp */
  readonly timestamp: string;
  /** Features whose PSI exceeded the threshold */
  readonly features: readonly string[];
}

/**
 * Detector events
 */
export interface DriftDetectorEvents {
  drift: (event: DriftEvent) => void;
  evaluated: (evaluation: DriftEvaluation) => void;
}

interface ModelDriftState {
  reference: ReferenceDistribution;
  window: RollingWindow<FeatureVector>;
  appendsSinceEvaluation: number;
}

export class DriftDetector extends EventEmitter<DriftDetectorEvents> {
  private readonly config: DriftDetectorConfig;
  private readonly catalog?: ModelCatalog;
  private readonly logger?: Logger;
  private readonly now: () => Date;
  private readonly states = new Map<ModelName, ModelDriftState>();
  private readonly flagged = new Set<ModelName>();
  private events: DriftEvent[] = [];

  constructor(config: DriftDetectorConfig, options: DriftDetectorOptions = {}) {
    super();
    this.config = config;
    this.catalog = options.catalog;
    this.logger = options.logger;
    this.now = options.now ?? (() => new Date());

    if (!Number.isInteger(config.windowSize) || config.windowSize < 1) {
      throw new RangeError(`windowSize must be a positive integer, got ${config.windowSize}`);
    }
  }

  /**
   * Store or replace the reference for a model. Clears its window, so the
   * next evaluation runs over vectors received after the replacement.
   */
  public setReference(name: ModelName, reference: ReferenceDistribution): void {
    this.catalog?.require(name);

    const parsed = ReferenceDistributionSchema.safeParse(reference);
    if (!parsed.success) {
      throw zodErrorToServingError(parsed.error);
    }

    const featureCount = this.catalog?.get(name)?.featureCount;
    if (featureCount !== undefined && parsed.data.features.length !== featureCount) {
      throw new ServingError(
        'InvalidParams',
        `Reference for ${name} has ${parsed.data.features.length} features, model expects ${featureCount}`,
        { modelName: name, expected: featureCount, actual: parsed.data.features.length }
      );
    }

    this.states.set(name, {
      reference: deepFreeze(parsed.data),
      window: new RollingWindow<FeatureVector>(this.config.windowSize),
      appendsSinceEvaluation: 0,
    });

    this.logger?.info(
      { modelName: name, features: parsed.data.features.length, sampleSize: parsed.data.sampleSize },
      'Reference distribution set'
    );
  }

  public getReference(name: ModelName): ReferenceDistribution | undefined {
    return this.states.get(name)?.reference;
  }

  public hasReference(name: ModelName): boolean {
    return this.states.has(name);
  }

  /**
   * Append a feature vector to the model's window and evaluate when a cycle
   * completes.
   *
   * @returns The evaluation, or null when none ran (disabled, no reference,
   *   or the cycle is not complete)
   */
  public check(name: ModelName, features: FeatureVector): DriftEvaluation | null {
    this.catalog?.require(name);

    if (!this.config.enabled) {
      return null;
    }

    const state = this.states.get(name);
    if (!state) {
      lazyLog(this.logger, 'debug', () => ({ modelName: name }), 'No reference distribution; drift check skipped');
      return null;
    }

    const expected = state.reference.features.length;
    if (features.length !== expected) {
      throw new ServingError(
        'InvalidParams',
        `Expected ${expected} features for drift check on ${name}, got ${features.length}`,
        { modelName: name, expected, actual: features.length }
      );
    }

    state.window.push(Object.freeze([...features]));
    state.appendsSinceEvaluation += 1;

    if (!state.window.isFull() || state.appendsSinceEvaluation < this.config.windowSize) {
      return null;
    }

    state.appendsSinceEvaluation = 0;
    return this.evaluate(name, state);
  }

  /**
   * Drift events, oldest first, optionally for one model
   */
  public getEvents(name?: ModelName): readonly DriftEvent[] {
    const events = name === undefined ? this.events : this.events.filter((e) => e.modelName === name);
    return Object.freeze([...events]);
  }

  /**
   * Models flagged for retraining review
   */
  public getFlaggedModels(): ModelName[] {
    return Array.from(this.flagged).sort();
  }

  public isFlagged(name: ModelName): boolean {
    return this.flagged.has(name);
  }

  /**
   * @returns whether the model was flagged
   */
  public clearReviewFlag(name: ModelName): boolean {
    const wasFlagged = this.flagged.delete(name);
    if (wasFlagged) {
      this.logger?.info({ modelName: name }, 'Cleared retraining review flag');
    }
    return wasFlagged;
  }

  /**
   * Vectors currently held in the model's window
   */
  public windowSize(name: ModelName): number {
    return this.states.get(name)?.window.size ?? 0;
  }

  private evaluate(name: ModelName, state: ModelDriftState): DriftEvaluation {
    const vectors = state.window.toArray();
    const threshold = this.config.threshold;

    const scores: FeatureDriftScore[] = state.reference.features.map((feature, j) => {
      const actual = binProportions(
        vectors.map((vector) => vector[j]),
        feature.binEdges
      );
      return { name: feature.name, psi: populationStabilityIndex(feature.expected, actual) };
    });

    const magnitude = scores.reduce((max, score) => Math.max(max, score.psi), 0);
    const timestamp = this.now().toISOString();
    const evaluation: DriftEvaluation = {
      modelName: name,
      magnitude,
      threshold,
      driftDetected: magnitude > threshold,
      features: scores,
      windowSize: vectors.length,
      timestamp,
    };

    try {
      this.emit('evaluated', evaluation);
    } catch (err) {
      this.logger?.error({ err, modelName: name }, 'Error emitting evaluated event');
    }

    if (!evaluation.driftDetected) {
      lazyLog(this.logger, 'debug', () => ({ modelName: name, magnitude, threshold }), 'No drift detected');
      return evaluation;
    }

    const event: DriftEvent = Object.freeze({
      modelName: name,
      magnitude,
      threshold,
      timestamp,
      features: Object.freeze(scores.filter((score) => score.psi > threshold).map((score) => score.name)),
    });

    this.events.push(event);
    if (this.events.length > this.config.maxEvents) {
      this.events = this.events.slice(-this.config.maxEvents);
    }
    this.flagged.add(name);

    this.logger?.warn(
      { modelName: name, magnitude, threshold, features: event.features },
      'Input drift detected; model flagged for retraining review'
    );
    try {
      this.emit('drift', event);
    } catch (err) {
      this.logger?.error({ err, modelName: name }, 'Error emitting drift event');
    }

    return evaluation;
  }
}

function deepFreeze(reference: ReferenceDistribution): ReferenceDistribution {
  for (const feature of reference.features) {
    Object.freeze(feature.binEdges);
    Object.freeze(feature.expected);
    Object.freeze(feature);
  }
  Object.freeze(reference.features);
  return Object.freeze(reference);
}

/**
 * Create default drift detector configuration
 */
export function createDefaultDriftConfig(): DriftDetectorConfig {
  return {
    enabled: true,
    windowSize: 100,
    threshold: 0.2,
    maxEvents: 1000,
  };
}
