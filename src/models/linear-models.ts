/**
 * Linear classifiers decoded from JSON artifacts.
 *
 * @module models/linear-models
 */

import { ServingError } from '../api/errors.js';
import type { LogisticArtifact, SoftmaxArtifact } from '../types/schemas/artifacts.js';
import type { FeatureVector, InferenceModel, RawPrediction } from '../types/models.js';

function dot(weights: readonly number[], features: FeatureVector): number {
  let sum = 0;
  for (let i = 0; i < weights.length; i++) {
    sum += weights[i] * features[i];
  }
  return sum;
}

function assertFeatureCount(expected: number, features: FeatureVector): void {
  if (features.length !== expected) {
    throw new ServingError('InvalidParams', `Expected ${expected} features, got ${features.length}`, {
      expected,
      actual: features.length,
    });
  }
}

/**
 * Logistic function, split by sign so large |z| never overflows exp()
 */
export function sigmoid(z: number): number {
  if (z >= 0) {
    return 1 / (1 + Math.exp(-z));
  }
  const e = Math.exp(z);
  return e / (1 + e);
}

/**
 * Softmax over logits, shifted by the max logit
 */
export function softmax(logits: readonly number[]): number[] {
  const max = Math.max(...logits);
  const exps = logits.map((logit) => Math.exp(logit - max));
  const total = exps.reduce((acc, value) => acc + value, 0);
  return exps.map((value) => value / total);
}

/**
 * Binary logistic regression. `labels[1]` is the positive class.
 */
export class LogisticModel implements InferenceModel {
  public readonly format = 'logistic';
  public readonly featureCount: number;
  public readonly labels: readonly string[];
  private readonly weights: readonly number[];
  private readonly bias: number;
  private readonly decisionThreshold: number;

  constructor(artifact: LogisticArtifact) {
    this.weights = Object.freeze([...artifact.weights]);
    this.bias = artifact.bias;
    this.labels = Object.freeze([...artifact.labels]);
    this.decisionThreshold = artifact.decision_threshold;
    this.featureCount = artifact.weights.length;
  }

  public predict(features: FeatureVector): RawPrediction {
    assertFeatureCount(this.featureCount, features);

    const p = sigmoid(dot(this.weights, features) + this.bias);
    const [negative, positive] = this.labels;
    return {
      label: p >= this.decisionThreshold ? positive : negative,
      confidence: Math.max(p, 1 - p),
      scores: { [negative]: 1 - p, [positive]: p },
    };
  }
}

/**
 * Multinomial linear classifier: one weight row and bias per label
 */
export class SoftmaxModel implements InferenceModel {
  public readonly format = 'softmax';
  public readonly featureCount: number;
  public readonly labels: readonly string[];
  private readonly weights: ReadonlyArray<readonly number[]>;
  private readonly biases: readonly number[];

  constructor(artifact: SoftmaxArtifact) {
    this.weights = Object.freeze(artifact.weights.map((row) => Object.freeze([...row])));
    this.biases = Object.freeze([...artifact.biases]);
    this.labels = Object.freeze([...artifact.labels]);
    this.featureCount = artifact.weights[0].length;
  }

  public predict(features: FeatureVector): RawPrediction {
    assertFeatureCount(this.featureCount, features);

    const probabilities = softmax(this.weights.map((row, k) => dot(row, features) + this.biases[k]));

    let best = 0;
    const scores: Record<string, number> = {};
    probabilities.forEach((p, k) => {
      scores[this.labels[k]] = p;
      if (p > probabilities[best]) {
        best = k;
      }
    });

    return {
      label: this.labels[best],
      confidence: probabilities[best],
      scores,
    };
  }
}
