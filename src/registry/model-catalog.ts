/**
 * Model Catalog
 *
 * Closed set of model identifiers the service knows about, with their
 * per-model serving settings. Unknown names are rejected here instead of
 * being resolved dynamically further down the call chain.
 */

import { createNotFoundError } from '../api/errors.js';
import type { ModelCatalogEntryConfig } from '../types/schemas/config.js';
import type { ModelName, ModelVersion } from '../types/models.js';

/**
 * Resolved settings for one catalog entry
 */
export interface ModelCatalogEntry {
  readonly name: ModelName;
  readonly confidenceThreshold: number;
  readonly featureCount?: number;
  readonly featureNames?: readonly string[];
  /** Artifact file name inside each version directory */
  readonly artifactFile: string;
  readonly defaultVersion?: ModelVersion;
}

export class ModelCatalog {
  private readonly entries: ReadonlyMap<ModelName, ModelCatalogEntry>;

  constructor(entries: Iterable<ModelCatalogEntry>) {
    const map = new Map<ModelName, ModelCatalogEntry>();
    for (const entry of entries) {
      map.set(entry.name, Object.freeze({ ...entry }));
    }
    this.entries = map;
  }

  /**
   * Build a catalog from the `models` config section.
   */
  public static fromConfig(
    models: Record<string, ModelCatalogEntryConfig>,
    defaultConfidenceThreshold: number
  ): ModelCatalog {
    return new ModelCatalog(
      Object.entries(models).map(([name, entry]) => ({
        name,
        confidenceThreshold: entry.confidence_threshold ?? defaultConfidenceThreshold,
        featureCount: entry.feature_count ?? entry.feature_names?.length,
        featureNames: entry.feature_names,
        artifactFile: entry.artifact_file ?? `${name}.json`,
        defaultVersion: entry.default_version,
      }))
    );
  }

  public has(name: string): boolean {
    return this.entries.has(name);
  }

  public get(name: string): ModelCatalogEntry | undefined {
    return this.entries.get(name);
  }

  /**
   * Entry for `name`, or NotFound for names outside the catalog.
   */
  public require(name: string): ModelCatalogEntry {
    const entry = this.entries.get(name);
    if (!entry) {
      throw createNotFoundError(`Unknown model: ${name}`, {
        modelName: name,
        knownModels: this.names(),
      });
    }
    return entry;
  }

  public names(): ModelName[] {
    return Array.from(this.entries.keys());
  }

  public confidenceThreshold(name: string): number {
    return this.require(name).confidenceThreshold;
  }
}
