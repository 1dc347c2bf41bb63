/**
 * Reference Store
 *
 * Persistence for per-model reference distributions at
 * `<reference_dir>/<model>_stats.json`.
 *
 * Files in the older summary format (`mean`, `std`, `min`, `max`, `median`,
 * `timestamp`, `sample_size`) carry no bins. They load as "no reference":
 * drift checks are skipped for that model until a new reference is saved.
 */

import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import type { Logger } from 'pino';
import { ServingError } from '../api/errors.js';
import {
  LegacyReferenceStatsSchema,
  ReferenceDistributionSchema,
  type ReferenceDistribution,
} from '../types/schemas/drift.js';
import type { ModelName } from '../types/models.js';

export interface ReferenceStore {
  /** Stored reference, or null when the model has none */
  load(name: ModelName): Promise<ReferenceDistribution | null>;
  save(name: ModelName, reference: ReferenceDistribution): Promise<void>;
}

/**
 * Validate raw reference file contents. Throws ReferenceCorrupted.
 *
 * @returns null for a summary-format file, which has no bins to compare against
 */
export function parseReference(name: ModelName, raw: string, source: string): ReferenceDistribution | null {
  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch (error) {
    throw new ServingError(
      'ReferenceCorrupted',
      `Reference statistics for ${name} are not valid JSON: ${source}`,
      { modelName: name, source },
      { cause: error }
    );
  }

  const result = ReferenceDistributionSchema.safeParse(json);
  if (!result.success) {
    if (LegacyReferenceStatsSchema.safeParse(json).success) {
      return null;
    }
    throw new ServingError('ReferenceCorrupted', `Reference statistics for ${name} are malformed: ${source}`, {
      modelName: name,
      source,
      issues: result.error.issues.map((issue) => ({ path: issue.path, message: issue.message })),
    });
  }
  return result.data;
}

export class FileReferenceStore implements ReferenceStore {
  private readonly directory: string;
  private readonly logger?: Logger;

  constructor(directory: string, logger?: Logger) {
    this.directory = path.resolve(directory);
    this.logger = logger;
  }

  public pathFor(name: ModelName): string {
    return path.join(this.directory, `${name}_stats.json`);
  }

  public async load(name: ModelName): Promise<ReferenceDistribution | null> {
    const filePath = this.pathFor(name);
    let raw: string;
    try {
      raw = await fs.readFile(filePath, 'utf8');
    } catch (error) {
      if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
        this.logger?.warn({ modelName: name, filePath }, 'No reference statistics found; drift checks skipped');
        return null;
      }
      throw error;
    }

    const reference = parseReference(name, raw, filePath);
    if (!reference) {
      this.logger?.warn(
        { modelName: name, filePath },
        'Reference statistics are in the summary format without bins; drift checks skipped'
      );
    }
    return reference;
  }

  public async save(name: ModelName, reference: ReferenceDistribution): Promise<void> {
    const filePath = this.pathFor(name);
    const tmpPath = `${filePath}.${process.pid}.tmp`;

    await fs.mkdir(this.directory, { recursive: true });
    await fs.writeFile(tmpPath, `${JSON.stringify(reference, null, 2)}\n`, 'utf8');
    await fs.rename(tmpPath, filePath);

    this.logger?.info({ modelName: name, filePath }, 'Saved reference statistics');
  }
}

export class InMemoryReferenceStore implements ReferenceStore {
  private readonly references = new Map<ModelName, ReferenceDistribution>();

  constructor(initial: Record<ModelName, ReferenceDistribution> = {}) {
    for (const [name, reference] of Object.entries(initial)) {
      this.references.set(name, reference);
    }
  }

  public async load(name: ModelName): Promise<ReferenceDistribution | null> {
    const reference = this.references.get(name);
    return reference ? structuredClone(reference) : null;
  }

  public async save(name: ModelName, reference: ReferenceDistribution): Promise<void> {
    this.references.set(name, structuredClone(reference));
  }
}
