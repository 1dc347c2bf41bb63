import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdir, readFile, readdir, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { FileRegistryStore, InMemoryRegistryStore, parseRegistryState } from '../../../src/registry/registry-store.js';
import { createTempDir, removeTempDir, silentLogger } from '../../helpers/fixtures.js';

describe('parseRegistryState', () => {
  it('accepts a versioned envelope', () => {
    const state = parseRegistryState(
      JSON.stringify({ version: 1, models: { heart: { current: 'v2', history: ['v1'] } } }),
      'active_versions.json'
    );

    expect(state.models).toEqual({ heart: { current: 'v2', history: ['v1'] } });
  });

  it('rejects invalid JSON with StateCorrupted', () => {
    expect(() => parseRegistryState('{not json', 'active_versions.json')).toThrow(
      expect.objectContaining({
        code: 'StateCorrupted',
        message: 'Active version state is not valid JSON: active_versions.json',
      })
    );
  });

  it('rejects an unknown format version', () => {
    expect(() => parseRegistryState(JSON.stringify({ version: 2, models: {} }), 'state.json')).toThrow(
      'Active version state is malformed: state.json'
    );
  });
});

describe('FileRegistryStore', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await createTempDir();
  });

  afterEach(async () => {
    await removeTempDir(dir);
  });

  it('returns null when no state file exists', async () => {
    const store = new FileRegistryStore(join(dir, 'active_versions.json'), silentLogger);

    await expect(store.load()).resolves.toBeNull();
  });

  it('round-trips the mapping through disk', async () => {
    const filePath = join(dir, 'models', 'active_versions.json');
    const store = new FileRegistryStore(filePath);

    await store.save({ heart: { current: 'v2', history: ['v1'] } });

    expect(JSON.parse(await readFile(filePath, 'utf8'))).toEqual({
      version: 1,
      models: { heart: { current: 'v2', history: ['v1'] } },
    });
    await expect(new FileRegistryStore(filePath).load()).resolves.toEqual({
      version: 1,
      models: { heart: { current: 'v2', history: ['v1'] } },
    });
  });

  it('leaves no temporary files behind', async () => {
    const store = new FileRegistryStore(join(dir, 'active_versions.json'));

    await store.save({ heart: { current: 'v1', history: [] } });
    await store.save({ heart: { current: 'v2', history: ['v1'] } });

    expect(await readdir(dir)).toEqual(['active_versions.json']);
  });

  it('surfaces a corrupted file', async () => {
    await mkdir(dir, { recursive: true });
    const filePath = join(dir, 'active_versions.json');
    await writeFile(filePath, '{"version": 1, "models": ', 'utf8');

    await expect(new FileRegistryStore(filePath).load()).rejects.toMatchObject({ code: 'StateCorrupted' });
  });
});

describe('InMemoryRegistryStore', () => {
  it('counts saves and isolates stored state', async () => {
    const store = new InMemoryRegistryStore();
    const models = { heart: { current: 'v1', history: [] } };

    await store.save(models);
    models.heart.current = 'v9';

    expect(store.saveCount).toBe(1);
    expect((await store.load())?.models).toEqual({ heart: { current: 'v1', history: [] } });
  });
});
