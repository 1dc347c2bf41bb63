/**
 * Model artifact schemas
 *
 * JSON artifact formats the built-in decoders understand, plus the
 * optional per-version metadata file.
 *
 * @module schemas/artifacts
 */

import { z } from 'zod';
import { MetadataSchema, Probability } from './common.js';

const Finite = z.number().finite();

/**
 * Binary logistic regression: p = sigmoid(w·x + b) is the probability of labels[1]
 */
export const LogisticArtifactSchema = z.object({
  format: z.literal('logistic'),
  weights: z.array(Finite).min(1),
  bias: Finite,
  labels: z.tuple([z.string().min(1), z.string().min(1)]),
  decision_threshold: Probability.default(0.5),
});

/**
 * Multinomial (softmax) linear classifier
 */
export const SoftmaxArtifactSchema = z
  .object({
    format: z.literal('softmax'),
    weights: z.array(z.array(Finite).min(1)).min(2),
    biases: z.array(Finite).min(2),
    labels: z.array(z.string().min(1)).min(2),
  })
  .refine((data) => data.weights.length === data.labels.length, {
    message: 'must have one weight row per label',
    path: ['weights'],
  })
  .refine((data) => data.biases.length === data.labels.length, {
    message: 'must have one bias per label',
    path: ['biases'],
  })
  .refine((data) => data.weights.every((row) => row.length === data.weights[0].length), {
    message: 'weight rows must have equal length',
    path: ['weights'],
  });

/**
 * Envelope read before dispatching to a format decoder
 */
export const ArtifactEnvelopeSchema = z
  .object({
    format: z.string().min(1),
  })
  .passthrough();

/**
 * `<name>_metadata.json` stored next to an artifact
 */
export const ArtifactMetadataSchema = MetadataSchema;

export type LogisticArtifact = z.infer<typeof LogisticArtifactSchema>;
export type SoftmaxArtifact = z.infer<typeof SoftmaxArtifactSchema>;
