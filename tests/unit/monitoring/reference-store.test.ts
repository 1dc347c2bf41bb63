import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { readdir, writeFile, mkdir } from 'node:fs/promises';
import { join } from 'node:path';
import { buildReference } from '../../../src/monitoring/psi.js';
import { FileReferenceStore, InMemoryReferenceStore, parseReference } from '../../../src/monitoring/reference-store.js';
import { createTempDir, removeTempDir, silentLogger } from '../../helpers/fixtures.js';

const summaryStats = JSON.stringify({
  mean: 54.2,
  std: 9.1,
  min: 29,
  max: 77,
  median: 55,
  timestamp: '2025-06-01T12:00:00',
  sample_size: 303,
});

const reference = buildReference(
  [
    [1, 10],
    [2, 20],
    [3, 30],
    [4, 40],
  ],
  { bins: 2, featureNames: ['age', 'chol'], now: () => new Date('2026-02-14T00:00:00.000Z') }
);

describe('parseReference', () => {
  it('rejects invalid JSON', () => {
    expect(() => parseReference('heart', '{', 'heart_stats.json')).toThrow(
      expect.objectContaining({
        code: 'ReferenceCorrupted',
        message: 'Reference statistics for heart are not valid JSON: heart_stats.json',
      })
    );
  });

  it('rejects malformed statistics', () => {
    expect(() => parseReference('heart', '{"features": []}', 'heart_stats.json')).toThrow(
      'Reference statistics for heart are malformed: heart_stats.json'
    );
  });

  it('reads summary-format statistics as no reference', () => {
    expect(parseReference('heart', summaryStats, 'heart_stats.json')).toBeNull();
  });

  it('rejects summary-format statistics with missing fields', () => {
    expect(() => parseReference('heart', '{"mean": 54.2, "std": 9.1}', 'heart_stats.json')).toThrow(
      'Reference statistics for heart are malformed: heart_stats.json'
    );
  });
});

describe('FileReferenceStore', () => {
  let dir: string;
  let store: FileReferenceStore;

  beforeEach(async () => {
    dir = await createTempDir();
    store = new FileReferenceStore(join(dir, 'reference_stats'), silentLogger);
  });

  afterEach(async () => {
    await removeTempDir(dir);
  });

  it('names files after the model', () => {
    expect(store.pathFor('heart')).toBe(join(dir, 'reference_stats', 'heart_stats.json'));
  });

  it('returns null for models without statistics', async () => {
    await expect(store.load('heart')).resolves.toBeNull();
  });

  it('round-trips a reference through disk', async () => {
    await store.save('heart', reference);

    await expect(store.load('heart')).resolves.toEqual(reference);
    expect(await readdir(join(dir, 'reference_stats'))).toEqual(['heart_stats.json']);
  });

  it('skips drift for summary-format files and warns', async () => {
    const warn = vi.spyOn(silentLogger, 'warn');
    await mkdir(join(dir, 'reference_stats'));
    await writeFile(store.pathFor('heart'), summaryStats, 'utf8');

    try {
      await expect(store.load('heart')).resolves.toBeNull();
      expect(warn).toHaveBeenCalledWith(
        { modelName: 'heart', filePath: store.pathFor('heart') },
        'Reference statistics are in the summary format without bins; drift checks skipped'
      );
    } finally {
      warn.mockRestore();
    }
  });

  it('reports corrupted files', async () => {
    await mkdir(join(dir, 'reference_stats'));
    await writeFile(store.pathFor('heart'), '{"features": [', 'utf8');

    await expect(store.load('heart')).rejects.toMatchObject({ code: 'ReferenceCorrupted' });
  });
});

describe('InMemoryReferenceStore', () => {
  it('stores copies', async () => {
    const store = new InMemoryReferenceStore();
    await store.save('heart', reference);

    const loaded = await store.load('heart');

    expect(loaded).toEqual(reference);
    expect(loaded).not.toBe(reference);
    await expect(store.load('diabetes')).resolves.toBeNull();
  });
});
