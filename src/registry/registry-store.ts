/**
 * Registry Store
 *
 * Persistence for the active-version mapping so activations survive
 * restarts. The file store writes through a temp file and rename, so a
 * crash mid-write leaves the previous state file intact.
 */

import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import type { Logger } from 'pino';
import { ServingError } from '../api/errors.js';
import {
  PersistedRegistryStateSchema,
  REGISTRY_STATE_FORMAT_VERSION,
  type PersistedModelState,
  type PersistedRegistryState,
} from '../types/schemas/registry.js';

/**
 * Storage backend for registry activation state
 */
export interface RegistryStore {
  /** Persisted state, or null when nothing has been saved yet */
  load(): Promise<PersistedRegistryState | null>;
  save(models: Record<string, PersistedModelState>): Promise<void>;
}

/**
 * Parse raw state file contents. Throws StateCorrupted for unreadable JSON
 * or a malformed envelope.
 */
export function parseRegistryState(raw: string, source: string): PersistedRegistryState {
  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch (error) {
    throw new ServingError(
      'StateCorrupted',
      `Active version state is not valid JSON: ${source}`,
      { source },
      { cause: error }
    );
  }

  const result = PersistedRegistryStateSchema.safeParse(json);
  if (!result.success) {
    throw new ServingError('StateCorrupted', `Active version state is malformed: ${source}`, {
      source,
      issues: result.error.issues.map((issue) => ({ path: issue.path, message: issue.message })),
    });
  }
  return result.data;
}

/**
 * JSON file store at `<models_dir>/<state_file>`
 */
export class FileRegistryStore implements RegistryStore {
  private readonly filePath: string;
  private readonly logger?: Logger;

  constructor(filePath: string, logger?: Logger) {
    this.filePath = path.resolve(filePath);
    this.logger = logger;
  }

  public async load(): Promise<PersistedRegistryState | null> {
    let raw: string;
    try {
      raw = await fs.readFile(this.filePath, 'utf8');
    } catch (error) {
      if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
        this.logger?.info({ filePath: this.filePath }, 'No active version state found, starting empty');
        return null;
      }
      throw error;
    }

    return parseRegistryState(raw, this.filePath);
  }

  public async save(models: Record<string, PersistedModelState>): Promise<void> {
    const state: PersistedRegistryState = {
      version: REGISTRY_STATE_FORMAT_VERSION,
      models,
    };
    const tmpPath = `${this.filePath}.${process.pid}.tmp`;

    await fs.mkdir(path.dirname(this.filePath), { recursive: true });
    await fs.writeFile(tmpPath, `${JSON.stringify(state, null, 2)}\n`, 'utf8');
    await fs.rename(tmpPath, this.filePath);

    this.logger?.debug({ filePath: this.filePath, models: Object.keys(models) }, 'Saved active versions');
  }
}

/**
 * Process-local store, used when persistence is not wanted (tests, embedding)
 */
export class InMemoryRegistryStore implements RegistryStore {
  private state: PersistedRegistryState | null;
  public saveCount = 0;

  constructor(initial?: Record<string, PersistedModelState>) {
    this.state = initial ? { version: REGISTRY_STATE_FORMAT_VERSION, models: { ...initial } } : null;
  }

  public async load(): Promise<PersistedRegistryState | null> {
    return this.state ? { version: this.state.version, models: { ...this.state.models } } : null;
  }

  public async save(models: Record<string, PersistedModelState>): Promise<void> {
    this.state = { version: REGISTRY_STATE_FORMAT_VERSION, models: structuredClone(models) };
    this.saveCount += 1;
  }
}
