/**
 * Artifact Store
 *
 * Read access to versioned model artifacts.
 *
 * Storage layout:
 * ```
 * models_dir/
 * ├── v1/
 * │   ├── heart.json
 * │   └── heart_metadata.json
 * ├── v2/
 * │   └── heart.json
 * └── active_versions.json
 * ```
 *
 * @module storage/artifact-store
 */

import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import type { Logger } from 'pino';
import { ServingError, zodErrorToServingError } from '../api/errors.js';
import { ArtifactMetadataSchema } from '../types/schemas/artifacts.js';
import { ModelVersionSchema } from '../types/schemas/common.js';
import type { ModelName, ModelVersion } from '../types/models.js';

export interface ArtifactStore {
  /** Raw bytes of the artifact at a store-relative path */
  read(relativePath: string): Promise<Buffer>;
  exists(relativePath: string): Promise<boolean>;
  /** Version directory names directly under the store root, sorted */
  listVersionDirs(): Promise<ModelVersion[]>;
}

/**
 * Store-relative path of a model artifact
 */
export function artifactPathFor(version: ModelVersion, artifactFile: string): string {
  return path.posix.join(version, artifactFile);
}

/**
 * Store-relative path of the optional metadata file for a model version
 */
export function metadataPathFor(version: ModelVersion, name: ModelName): string {
  return path.posix.join(version, `${name}_metadata.json`);
}

function compareVersions(a: string, b: string): number {
  return a.localeCompare(b, undefined, { numeric: true });
}

/**
 * Read `<version>/<name>_metadata.json`, or `{}` when absent.
 * Malformed JSON or a non-object body is InvalidParams.
 */
export async function readArtifactMetadata(
  store: ArtifactStore,
  version: ModelVersion,
  name: ModelName
): Promise<Record<string, unknown>> {
  const metadataPath = metadataPathFor(version, name);
  if (!(await store.exists(metadataPath))) {
    return {};
  }

  const raw = (await store.read(metadataPath)).toString('utf8');
  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch (error) {
    throw new ServingError(
      'InvalidParams',
      `Metadata file is not valid JSON: ${metadataPath}`,
      { path: metadataPath },
      { cause: error }
    );
  }

  const result = ArtifactMetadataSchema.safeParse(json);
  if (!result.success) {
    throw zodErrorToServingError(result.error);
  }
  return result.data;
}

/**
 * Artifact store rooted at a directory on the local file system
 */
export class FileArtifactStore implements ArtifactStore {
  private readonly rootDir: string;
  private readonly logger?: Logger;

  constructor(rootDir: string, logger?: Logger) {
    this.rootDir = path.resolve(rootDir);
    this.logger = logger;
  }

  public get root(): string {
    return this.rootDir;
  }

  public async read(relativePath: string): Promise<Buffer> {
    const absolutePath = this.resolve(relativePath);
    try {
      return await fs.readFile(absolutePath);
    } catch (error) {
      if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
        throw new ServingError('NotFound', `Artifact not found: ${relativePath}`, { path: relativePath });
      }
      throw error;
    }
  }

  public async exists(relativePath: string): Promise<boolean> {
    try {
      const stats = await fs.stat(this.resolve(relativePath));
      return stats.isFile();
    } catch {
      return false;
    }
  }

  public async listVersionDirs(): Promise<ModelVersion[]> {
    let entries: Array<{ name: string; isDirectory(): boolean }>;
    try {
      entries = await fs.readdir(this.rootDir, { withFileTypes: true });
    } catch (error) {
      if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
        this.logger?.warn({ rootDir: this.rootDir }, 'Models directory does not exist');
        return [];
      }
      throw error;
    }

    return entries
      .filter((entry) => entry.isDirectory() && ModelVersionSchema.safeParse(entry.name).success)
      .map((entry) => entry.name)
      .sort(compareVersions);
  }

  /**
   * Resolve a store-relative path, refusing anything that escapes the root.
   */
  private resolve(relativePath: string): string {
    const absolutePath = path.resolve(this.rootDir, relativePath);
    if (absolutePath !== this.rootDir && !absolutePath.startsWith(this.rootDir + path.sep)) {
      throw new ServingError('InvalidParams', `Artifact path escapes the models directory: ${relativePath}`, {
        path: relativePath,
      });
    }
    return absolutePath;
  }
}

/**
 * Map-backed store for tests and embedding
 */
export class InMemoryArtifactStore implements ArtifactStore {
  private readonly files = new Map<string, Buffer>();

  constructor(files: Record<string, string | Buffer> = {}) {
    for (const [filePath, contents] of Object.entries(files)) {
      this.put(filePath, contents);
    }
  }

  public put(relativePath: string, contents: string | Buffer | object): void {
    const buffer =
      typeof contents === 'string'
        ? Buffer.from(contents, 'utf8')
        : Buffer.isBuffer(contents)
          ? contents
          : Buffer.from(JSON.stringify(contents), 'utf8');
    this.files.set(path.posix.normalize(relativePath), buffer);
  }

  public async read(relativePath: string): Promise<Buffer> {
    const contents = this.files.get(path.posix.normalize(relativePath));
    if (!contents) {
      throw new ServingError('NotFound', `Artifact not found: ${relativePath}`, { path: relativePath });
    }
    return contents;
  }

  public async exists(relativePath: string): Promise<boolean> {
    return this.files.has(path.posix.normalize(relativePath));
  }

  public async listVersionDirs(): Promise<ModelVersion[]> {
    const versions = new Set<string>();
    for (const filePath of this.files.keys()) {
      const separator = filePath.indexOf('/');
      if (separator > 0) {
        versions.add(filePath.slice(0, separator));
      }
    }
    return Array.from(versions).sort(compareVersions);
  }
}
