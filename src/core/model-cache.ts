/**
 * Model Cache
 *
 * Keeps loaded model handles keyed by `name@version` and guarantees that at
 * most one load per key is running at any time.
 *
 * Architecture:
 * - Loaded entries in an insertion-ordered Map (re-inserted on access, so
 *   the first entry is the least recently used)
 * - In-flight loads in a promise map; concurrent callers join the shared load
 * - Failed loads are not cached; the key cools down before the next attempt
 * - Each waiter can abort independently; the shared load is aborted only
 *   once every waiter has gone, and the next load for the key waits until
 *   the abandoned loader has returned
 *
 * @module core/model-cache
 */

import { EventEmitter } from 'eventemitter3';
import type { Logger } from 'pino';
import { ServingError } from '../api/errors.js';
import { lazyLog } from '../utils/logger-helpers.js';
import type { ModelName, ModelVersion } from '../types/models.js';

const DEFAULT_RETRY_COOLDOWN_MS = 5_000;
const DEFAULT_MAX_ENTRIES = 16;

/**
 * Loads a model handle. The signal aborts when every caller waiting on the
 * load has gone away.
 */
export type ModelLoader<THandle> = (
  name: ModelName,
  version: ModelVersion,
  signal: AbortSignal
) => Promise<THandle>;

export type EvictionReason = 'manual' | 'clear' | 'capacity';

export interface ModelCacheOptions<THandle> {
  loader: ModelLoader<THandle>;
  /** Minimum delay before a failed key is retried (default: 5000) */
  retryCooldownMs?: number;
  /** Loaded entries kept before the least recently used is evicted (default: 16) */
  maxEntries?: number;
  logger?: Logger;
  now?: () => number;
}

export interface ModelCacheEvents {
  loaded: (key: string, durationMs: number) => void;
  loadFailed: (key: string, error: ServingError) => void;
  evicted: (key: string, reason: EvictionReason) => void;
}

export interface GetOrLoadOptions {
  signal?: AbortSignal;
}

export interface CachedModelInfo {
  readonly key: string;
  readonly name: ModelName;
  readonly version: ModelVersion;
  /** Epoch milliseconds */
  readonly loadedAt: number;
  readonly lastAccessedAt: number;
}

export interface CacheInfo {
  readonly size: number;
  readonly entries: readonly CachedModelInfo[];
  /** Keys with a load in progress */
  readonly inflight: readonly string[];
}

interface CachedModel<THandle> {
  name: ModelName;
  version: ModelVersion;
  handle: THandle;
  loadedAt: number;
  lastAccessedAt: number;
}

interface InflightLoad<THandle> {
  key: string;
  name: ModelName;
  version: ModelVersion;
  controller: AbortController;
  promise: Promise<THandle>;
  /** Waiters that can still receive the result */
  waiters: number;
  /** Set by evict/clearAll: the result goes to waiters but is not inserted */
  discarded: boolean;
}

interface LoadFailure {
  error: ServingError;
  failedAt: number;
}

/**
 * Cache key for a model version
 */
export function cacheKey(name: ModelName, version: ModelVersion): string {
  return `${name}@${version}`;
}

export class ModelCache<THandle> extends EventEmitter<ModelCacheEvents> {
  private readonly loader: ModelLoader<THandle>;
  private readonly retryCooldownMs: number;
  private readonly maxEntries: number;
  private readonly logger?: Logger;
  private readonly now: () => number;

  private readonly entries = new Map<string, CachedModel<THandle>>();
  private readonly inflightLoads = new Map<string, InflightLoad<THandle>>();
  private readonly failures = new Map<string, LoadFailure>();

  constructor(options: ModelCacheOptions<THandle>) {
    super();
    this.loader = options.loader;
    this.retryCooldownMs = options.retryCooldownMs ?? DEFAULT_RETRY_COOLDOWN_MS;
    this.maxEntries = options.maxEntries ?? DEFAULT_MAX_ENTRIES;
    this.logger = options.logger;
    this.now = options.now ?? Date.now;

    if (!Number.isInteger(this.maxEntries) || this.maxEntries < 1) {
      throw new RangeError(`maxEntries must be a positive integer, got ${this.maxEntries}`);
    }
  }

  /**
   * Return the cached handle, joining or starting a load on a miss.
   *
   * Rejects with Unavailable when the load fails or the key is cooling down
   * after a failure, and with Timeout when `signal` aborts first.
   */
  public async getOrLoad(
    name: ModelName,
    version: ModelVersion,
    options: GetOrLoadOptions = {}
  ): Promise<THandle> {
    const key = cacheKey(name, version);
    const { signal } = options;

    if (signal?.aborted) {
      throw this.abortedError(key, name, version);
    }

    const entry = this.entries.get(key);
    if (entry) {
      entry.lastAccessedAt = this.now();
      this.entries.delete(key);
      this.entries.set(key, entry);
      return entry.handle;
    }

    let load = this.inflightLoads.get(key);
    if (load?.controller.signal.aborted) {
      // The abandoned loader may still be running; the next load starts after it settles
      lazyLog(this.logger, 'debug', () => ({ key }), 'Waiting for abandoned load to settle');
      await this.awaitAbandoned(load, signal);
      return this.getOrLoad(name, version, options);
    }
    if (load) {
      lazyLog(this.logger, 'debug', () => ({ key, waiters: load?.waiters }), 'Joining in-flight load');
    } else {
      this.assertNotCoolingDown(key, name, version);
      load = this.startLoad(key, name, version);
    }

    return this.wait(load, signal);
  }

  /**
   * Remove a loaded entry. An in-flight load for the key still resolves for
   * its waiters but its result is not inserted.
   */
  public evict(name: ModelName, version: ModelVersion): boolean {
    const key = cacheKey(name, version);

    const load = this.inflightLoads.get(key);
    if (load) {
      load.discarded = true;
    }

    const existed = this.entries.delete(key);
    if (existed) {
      this.logger?.info({ key }, 'Evicted model');
      this.emit('evicted', key, 'manual');
    }
    return existed;
  }

  /**
   * Remove every loaded entry and discard every in-flight result.
   *
   * @returns Number of entries removed
   */
  public clearAll(): number {
    for (const load of this.inflightLoads.values()) {
      load.discarded = true;
    }

    const keys = Array.from(this.entries.keys());
    this.entries.clear();
    for (const key of keys) {
      this.emit('evicted', key, 'clear');
    }

    this.logger?.info({ removed: keys.length, inflight: this.inflightLoads.size }, 'Cleared model cache');
    return keys.length;
  }

  /**
   * Whether the key is loaded or loading
   */
  public has(name: ModelName, version: ModelVersion): boolean {
    const key = cacheKey(name, version);
    return this.entries.has(key) || this.activeLoad(key) !== undefined;
  }

  public isLoaded(name: ModelName, version: ModelVersion): boolean {
    return this.entries.has(cacheKey(name, version));
  }

  /**
   * Frozen listing of loaded entries (least recently used first)
   */
  public cacheInfo(): CacheInfo {
    const entries = Array.from(this.entries, ([key, entry]) =>
      Object.freeze({
        key,
        name: entry.name,
        version: entry.version,
        loadedAt: entry.loadedAt,
        lastAccessedAt: entry.lastAccessedAt,
      })
    );

    return Object.freeze({
      size: entries.length,
      entries: Object.freeze(entries),
      inflight: Object.freeze(
        Array.from(this.inflightLoads.values())
          .filter((load) => !load.controller.signal.aborted)
          .map((load) => load.key)
      ),
    });
  }

  /**
   * In-flight load that still has someone waiting on it
   */
  private activeLoad(key: string): InflightLoad<THandle> | undefined {
    const load = this.inflightLoads.get(key);
    return load && !load.controller.signal.aborted ? load : undefined;
  }

  /**
   * Resolve once an abandoned load has settled. Rejects with Timeout when
   * `signal` aborts first.
   */
  private awaitAbandoned(load: InflightLoad<THandle>, signal?: AbortSignal): Promise<void> {
    const settled = load.promise.then(
      () => undefined,
      () => undefined
    );
    if (!signal) {
      return settled;
    }

    return new Promise<void>((resolve, reject) => {
      const onAbort = (): void => {
        reject(this.abortedError(load.key, load.name, load.version));
      };
      signal.addEventListener('abort', onAbort, { once: true });
      void settled.then(() => {
        signal.removeEventListener('abort', onAbort);
        resolve();
      });
    });
  }

  private assertNotCoolingDown(key: string, name: ModelName, version: ModelVersion): void {
    const failure = this.failures.get(key);
    if (!failure) {
      return;
    }

    const elapsed = this.now() - failure.failedAt;
    if (elapsed >= this.retryCooldownMs) {
      this.failures.delete(key);
      return;
    }

    throw new ServingError(
      'Unavailable',
      `Model ${key} failed to load recently; retry in ${this.retryCooldownMs - elapsed}ms`,
      {
        modelName: name,
        version,
        reason: 'CoolingDown',
        retryAfterMs: this.retryCooldownMs - elapsed,
        lastError: failure.error.message,
      },
      { cause: failure.error }
    );
  }

  private startLoad(key: string, name: ModelName, version: ModelVersion): InflightLoad<THandle> {
    const load: InflightLoad<THandle> = {
      key,
      name,
      version,
      controller: new AbortController(),
      promise: Promise.resolve().then(() => this.runLoad(load)),
      waiters: 0,
      discarded: false,
    };

    this.inflightLoads.set(key, load);
    this.logger?.debug({ key }, 'Loading model');
    return load;
  }

  private async runLoad(load: InflightLoad<THandle>): Promise<THandle> {
    const { key, name, version, controller } = load;
    const startedAt = performance.now();

    try {
      const handle = await this.loader(name, version, controller.signal);
      if (controller.signal.aborted) {
        throw this.abortedError(key, name, version);
      }

      const durationMs = performance.now() - startedAt;
      if (load.discarded) {
        this.logger?.info({ key, durationMs }, 'Model loaded after eviction; result not cached');
      } else {
        this.insert(key, name, version, handle);
        this.logger?.info({ key, durationMs }, 'Model loaded');
      }
      this.emit('loaded', key, durationMs);
      return handle;
    } catch (error) {
      if (controller.signal.aborted) {
        this.logger?.debug({ key }, 'Model load abandoned by every waiter');
        throw this.abortedError(key, name, version);
      }

      const message = error instanceof Error ? error.message : String(error);
      const servingError = new ServingError(
        'Unavailable',
        `Failed to load model ${key}: ${message}`,
        { modelName: name, version },
        { cause: error }
      );
      this.failures.set(key, { error: servingError, failedAt: this.now() });
      this.logger?.error({ key, err: error }, 'Model load failed');
      this.emit('loadFailed', key, servingError);
      throw servingError;
    } finally {
      if (this.inflightLoads.get(key) === load) {
        this.inflightLoads.delete(key);
      }
    }
  }

  private insert(key: string, name: ModelName, version: ModelVersion, handle: THandle): void {
    const now = this.now();
    this.entries.delete(key);

    while (this.entries.size >= this.maxEntries) {
      const oldest = this.entries.keys().next();
      if (oldest.done) {
        break;
      }
      this.entries.delete(oldest.value);
      this.logger?.info({ key: oldest.value }, 'Evicted least recently used model');
      this.emit('evicted', oldest.value, 'capacity');
    }

    this.entries.set(key, { name, version, handle, loadedAt: now, lastAccessedAt: now });
  }

  /**
   * Attach one waiter to a shared load.
   */
  private wait(load: InflightLoad<THandle>, signal?: AbortSignal): Promise<THandle> {
    load.waiters += 1;

    if (!signal) {
      return load.promise;
    }

    return new Promise<THandle>((resolve, reject) => {
      let settled = false;

      const onAbort = (): void => {
        if (settled) {
          return;
        }
        settled = true;
        load.waiters -= 1;

        if (load.waiters === 0) {
          // Stays in inflightLoads until runLoad settles so no second loader overlaps it
          load.controller.abort();
          this.logger?.debug({ key: load.key }, 'Aborting model load with no remaining waiters');
        }
        reject(this.abortedError(load.key, load.name, load.version));
      };

      signal.addEventListener('abort', onAbort, { once: true });

      load.promise.then(
        (handle) => {
          if (settled) {
            return;
          }
          settled = true;
          signal.removeEventListener('abort', onAbort);
          resolve(handle);
        },
        (error: unknown) => {
          if (settled) {
            return;
          }
          settled = true;
          signal.removeEventListener('abort', onAbort);
          reject(error);
        }
      );
    });
  }

  private abortedError(key: string, name: ModelName, version: ModelVersion): ServingError {
    return new ServingError('Timeout', `Load of model ${key} was aborted by the caller`, {
      modelName: name,
      version,
    });
  }
}
