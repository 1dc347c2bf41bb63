/**
 * Version Registry
 *
 * Tracks, per model name, the registered versions, the currently active
 * version and a bounded rollback history.
 *
 * Architecture:
 * - Version records are frozen on registration and never change
 * - Activation state is one frozen object per model, replaced in a single
 *   assignment after the new mapping has been persisted
 * - Mutations for one model are serialized; writes to the store are
 *   serialized across models so every save carries all committed state
 *
 * @module registry/version-registry
 */

import { isDeepStrictEqual } from 'node:util';
import { EventEmitter } from 'eventemitter3';
import type { Logger } from 'pino';
import {
  ServingError,
  createConflictError,
  createNotFoundError,
  toServingError,
} from '../api/errors.js';
import { KeyedMutex } from '../core/keyed-mutex.js';
import { PersistedModelStateSchema, type PersistedModelState } from '../types/schemas/registry.js';
import type {
  ActiveVersionState,
  ModelName,
  ModelVersion,
  ModelVersionRecord,
} from '../types/models.js';
import type { ModelCatalog } from './model-catalog.js';
import type { RegistryStore } from './registry-store.js';

const DEFAULT_HISTORY_DEPTH = 5;
const STORE_LOCK = '\u0000store';

export interface VersionRegistryOptions {
  catalog: ModelCatalog;
  /** Persistence backend; state is process-local when omitted */
  store?: RegistryStore;
  /** Rollback history kept per model */
  historyDepth?: number;
  logger?: Logger;
  now?: () => Date;
}

/**
 * Registry events
 */
export interface VersionRegistryEvents {
  registered: (record: ModelVersionRecord) => void;
  activated: (name: ModelName, version: ModelVersion, previous: ModelVersion | null) => void;
  rolledBack: (name: ModelName, version: ModelVersion, from: ModelVersion) => void;
}

/**
 * Outcome of restoring persisted state. Models listed in `errors` start
 * without an active version.
 */
export interface RegistryInitResult {
  restored: ModelName[];
  errors: Array<{ modelName: ModelName; error: ServingError }>;
}

function freezeState(currentVersion: ModelVersion, history: readonly ModelVersion[]): ActiveVersionState {
  return Object.freeze({
    currentVersion,
    history: Object.freeze([...history]),
  });
}

export class VersionRegistry extends EventEmitter<VersionRegistryEvents> {
  private readonly catalog: ModelCatalog;
  private readonly store?: RegistryStore;
  private readonly historyDepth: number;
  private readonly logger?: Logger;
  private readonly now: () => Date;
  private readonly locks = new KeyedMutex();

  private readonly records = new Map<ModelName, Map<ModelVersion, ModelVersionRecord>>();
  private readonly states = new Map<ModelName, ActiveVersionState>();

  constructor(options: VersionRegistryOptions) {
    super();
    this.catalog = options.catalog;
    this.store = options.store;
    this.historyDepth = options.historyDepth ?? DEFAULT_HISTORY_DEPTH;
    this.logger = options.logger;
    this.now = options.now ?? (() => new Date());

    if (!Number.isInteger(this.historyDepth) || this.historyDepth < 1) {
      throw new RangeError(`historyDepth must be a positive integer, got ${this.historyDepth}`);
    }
  }

  /**
   * Restore persisted activation state.
   *
   * Call after the versions referenced by the state file are registered.
   * A malformed state file rejects with StateCorrupted; a bad entry for a
   * single model is reported in the result and that model stays inactive.
   */
  public async initialize(): Promise<RegistryInitResult> {
    const result: RegistryInitResult = { restored: [], errors: [] };
    if (!this.store) {
      return result;
    }

    const persisted = await this.store.load();
    if (!persisted) {
      return result;
    }

    for (const [modelName, raw] of Object.entries(persisted.models)) {
      try {
        const state = this.restoreModelState(modelName, raw);
        this.states.set(modelName, state);
        result.restored.push(modelName);
      } catch (error) {
        const servingError = toServingError(error, 'StateCorrupted');
        result.errors.push({ modelName, error: servingError });
        this.logger?.error(
          { modelName, code: servingError.code, err: servingError },
          'Failed to restore active version; model left inactive'
        );
      }
    }

    this.logger?.info(
      { restored: result.restored, failed: result.errors.map((e) => e.modelName) },
      'Active versions restored'
    );
    return result;
  }

  /**
   * Register an immutable version record.
   *
   * Re-registering with identical path and metadata returns the existing
   * record; any difference is a Conflict.
   */
  public register(
    name: ModelName,
    version: ModelVersion,
    artifactPath: string,
    metadata: Record<string, unknown> = {}
  ): ModelVersionRecord {
    this.catalog.require(name);

    let versions = this.records.get(name);
    const existing = versions?.get(version);
    if (existing) {
      if (existing.artifactPath === artifactPath && isDeepStrictEqual(existing.metadata, metadata)) {
        return existing;
      }
      throw createConflictError(`Version ${version} of ${name} is already registered with different metadata`, {
        modelName: name,
        version,
        reason: 'RegistrationMismatch',
      });
    }

    const record: ModelVersionRecord = Object.freeze({
      name,
      version,
      artifactPath,
      metadata: Object.freeze(structuredClone(metadata)),
      createdAt: this.now().toISOString(),
    });

    if (!versions) {
      versions = new Map();
      this.records.set(name, versions);
    }
    versions.set(version, record);

    this.logger?.info({ modelName: name, version, artifactPath }, 'Registered model version');
    this.emit('registered', record);
    return record;
  }

  /**
   * Make `version` the active version of `name`, pushing the previous one
   * onto the rollback history. Setting the current version again is a no-op.
   */
  public async setActive(name: ModelName, version: ModelVersion): Promise<ActiveVersionState> {
    this.catalog.require(name);
    this.requireRecord(name, version);

    return this.locks.runExclusive(name, async () => {
      const previous = this.states.get(name);
      if (previous?.currentVersion === version) {
        return previous;
      }

      const history = previous
        ? [...previous.history, previous.currentVersion].slice(-this.historyDepth)
        : [];
      const next = freezeState(version, history);

      await this.commit(name, next);

      const from = previous?.currentVersion ?? null;
      this.logger?.info({ modelName: name, from, to: version }, 'Active version switched');
      this.emit('activated', name, version, from);
      return next;
    });
  }

  /**
   * Reactivate the most recent history entry. The displaced version is
   * discarded, not pushed back onto the history.
   */
  public async rollback(name: ModelName): Promise<ActiveVersionState> {
    this.catalog.require(name);

    return this.locks.runExclusive(name, async () => {
      const previous = this.states.get(name);
      if (!previous) {
        throw createNotFoundError(`No active version for ${name}`, { modelName: name });
      }
      if (previous.history.length === 0) {
        throw createConflictError(`Cannot roll back ${name}: no previous version`, {
          modelName: name,
          currentVersion: previous.currentVersion,
          reason: 'NoHistory',
        });
      }

      const target = previous.history[previous.history.length - 1];
      const next = freezeState(target, previous.history.slice(0, -1));

      await this.commit(name, next);

      this.logger?.info(
        { modelName: name, from: previous.currentVersion, to: target },
        'Rolled back active version'
      );
      this.emit('rolledBack', name, target, previous.currentVersion);
      return next;
    });
  }

  /**
   * Currently active version; NotFound for unknown or never-activated models.
   */
  public getActive(name: ModelName): ModelVersion {
    this.catalog.require(name);
    const state = this.states.get(name);
    if (!state) {
      throw createNotFoundError(`No active version for ${name}`, { modelName: name });
    }
    return state.currentVersion;
  }

  /**
   * Frozen activation state, or undefined when the model was never activated.
   */
  public getState(name: ModelName): ActiveVersionState | undefined {
    this.catalog.require(name);
    return this.states.get(name);
  }

  public getRecord(name: ModelName, version: ModelVersion): ModelVersionRecord {
    this.catalog.require(name);
    return this.requireRecord(name, version);
  }

  public hasVersion(name: ModelName, version: ModelVersion): boolean {
    return this.records.get(name)?.has(version) ?? false;
  }

  /**
   * Registered versions of `name`, sorted.
   */
  public listVersions(name: ModelName): ModelVersion[] {
    this.catalog.require(name);
    const versions = this.records.get(name);
    return versions
      ? Array.from(versions.keys()).sort((a, b) => a.localeCompare(b, undefined, { numeric: true }))
      : [];
  }

  /**
   * Every catalog model with its active version (null when inactive).
   */
  public listModels(): Array<{ name: ModelName; activeVersion: ModelVersion | null; versions: ModelVersion[] }> {
    return this.catalog.names().map((name) => ({
      name,
      activeVersion: this.states.get(name)?.currentVersion ?? null,
      versions: this.listVersions(name),
    }));
  }

  private requireRecord(name: ModelName, version: ModelVersion): ModelVersionRecord {
    const record = this.records.get(name)?.get(version);
    if (!record) {
      throw createNotFoundError(`Version ${version} of ${name} is not registered`, {
        modelName: name,
        version,
        availableVersions: this.listVersions(name),
      });
    }
    return record;
  }

  private restoreModelState(modelName: ModelName, raw: unknown): ActiveVersionState {
    if (!this.catalog.has(modelName)) {
      throw new ServingError('StateCorrupted', `Active version state references unknown model ${modelName}`, {
        modelName,
      });
    }

    const parsed = PersistedModelStateSchema.safeParse(raw);
    if (!parsed.success) {
      throw new ServingError('StateCorrupted', `Active version state for ${modelName} is malformed`, {
        modelName,
        issues: parsed.error.issues.map((issue) => ({ path: issue.path, message: issue.message })),
      });
    }

    const { current, history } = parsed.data;
    const unknownVersions = [current, ...history].filter((v) => !this.hasVersion(modelName, v));
    if (unknownVersions.length > 0) {
      throw new ServingError(
        'StateCorrupted',
        `Active version state for ${modelName} references unregistered versions: ${unknownVersions.join(', ')}`,
        { modelName, unknownVersions }
      );
    }

    return freezeState(current, history.slice(-this.historyDepth));
  }

  /**
   * Persist the mapping with `name` replaced by `next`, then publish `next`.
   */
  private async commit(name: ModelName, next: ActiveVersionState): Promise<void> {
    const store = this.store;
    if (!store) {
      this.states.set(name, next);
      return;
    }

    await this.locks.runExclusive(STORE_LOCK, async () => {
      const models: Record<string, PersistedModelState> = {};
      for (const [model, state] of this.states) {
        models[model] = { current: state.currentVersion, history: [...state.history] };
      }
      models[name] = { current: next.currentVersion, history: [...next.history] };

      try {
        await store.save(models);
      } catch (error) {
        throw new ServingError(
          'Unavailable',
          `Failed to persist active version for ${name}`,
          { modelName: name },
          { cause: error }
        );
      }

      this.states.set(name, next);
    });
  }
}
