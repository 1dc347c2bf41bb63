/**
 * Model Format Registry
 *
 * Maps the `format` field of a JSON artifact to a decoder that builds an
 * InferenceModel. `logistic` and `softmax` are registered by default;
 * embedders can add their own formats.
 *
 * @module models/format-registry
 */

import type { ZodType, ZodTypeDef } from 'zod';
import { ServingError, zodErrorToServingError } from '../api/errors.js';
import {
  ArtifactEnvelopeSchema,
  LogisticArtifactSchema,
  SoftmaxArtifactSchema,
} from '../types/schemas/artifacts.js';
import type { InferenceModel, ModelName, ModelVersion } from '../types/models.js';
import { LogisticModel, SoftmaxModel } from './linear-models.js';

/**
 * Identity of the artifact being decoded, for error details
 */
export interface DecodeContext {
  name: ModelName;
  version: ModelVersion;
  artifactPath: string;
}

export interface ModelDecoder {
  decode(artifact: unknown, context: DecodeContext): InferenceModel;
}

/**
 * Decoder that validates the artifact against a zod schema first
 */
export function schemaDecoder<T>(
  schema: ZodType<T, ZodTypeDef, unknown>,
  build: (artifact: T) => InferenceModel
): ModelDecoder {
  return {
    decode(artifact, context) {
      const result = schema.safeParse(artifact);
      if (!result.success) {
        const error = zodErrorToServingError(result.error, 'Unavailable');
        throw new ServingError(
          'Unavailable',
          `Invalid artifact for ${context.name}@${context.version}: ${error.message}`,
          { ...context, ...error.details }
        );
      }
      return build(result.data);
    },
  };
}

export class ModelFormatRegistry {
  private readonly decoders = new Map<string, ModelDecoder>();

  /**
   * Registry with the built-in formats
   */
  public static withDefaults(): ModelFormatRegistry {
    const registry = new ModelFormatRegistry();
    registry.register('logistic', schemaDecoder(LogisticArtifactSchema, (a) => new LogisticModel(a)));
    registry.register('softmax', schemaDecoder(SoftmaxArtifactSchema, (a) => new SoftmaxModel(a)));
    return registry;
  }

  public register(format: string, decoder: ModelDecoder): this {
    this.decoders.set(format, decoder);
    return this;
  }

  public has(format: string): boolean {
    return this.decoders.has(format);
  }

  public formats(): string[] {
    return Array.from(this.decoders.keys()).sort();
  }

  /**
   * Parse raw artifact bytes and dispatch on their `format` field.
   */
  public decode(raw: Buffer | string, context: DecodeContext): InferenceModel {
    let json: unknown;
    try {
      json = JSON.parse(typeof raw === 'string' ? raw : raw.toString('utf8'));
    } catch (error) {
      throw new ServingError(
        'Unavailable',
        `Artifact is not valid JSON: ${context.artifactPath}`,
        { ...context },
        { cause: error }
      );
    }

    const envelope = ArtifactEnvelopeSchema.safeParse(json);
    if (!envelope.success) {
      throw new ServingError('Unavailable', `Artifact has no format field: ${context.artifactPath}`, {
        ...context,
      });
    }

    const decoder = this.decoders.get(envelope.data.format);
    if (!decoder) {
      throw new ServingError('Unavailable', `Unsupported artifact format: ${envelope.data.format}`, {
        ...context,
        format: envelope.data.format,
        supportedFormats: this.formats(),
      });
    }

    return decoder.decode(json, context);
  }
}
