import { describe, it, expect } from 'vitest';
import { ModelCatalog } from '../../../src/registry/model-catalog.js';

describe('ModelCatalog', () => {
  const catalog = ModelCatalog.fromConfig(
    {
      heart: { feature_count: 2, feature_names: ['age', 'chol'], default_version: 'v1' },
      diabetes: { confidence_threshold: 0.6, artifact_file: 'diabetes_model.json' },
      liver: { feature_names: ['alt', 'ast', 'albumin'] },
    },
    0.75
  );

  it('applies defaults from config', () => {
    expect(catalog.require('heart')).toEqual({
      name: 'heart',
      confidenceThreshold: 0.75,
      featureCount: 2,
      featureNames: ['age', 'chol'],
      artifactFile: 'heart.json',
      defaultVersion: 'v1',
    });
    expect(catalog.require('diabetes').artifactFile).toBe('diabetes_model.json');
  });

  it('derives the feature count from feature names', () => {
    expect(catalog.require('liver').featureCount).toBe(3);
  });

  it('resolves per-model confidence thresholds', () => {
    expect(catalog.confidenceThreshold('heart')).toBe(0.75);
    expect(catalog.confidenceThreshold('diabetes')).toBe(0.6);
  });

  it('lists names in config order', () => {
    expect(catalog.names()).toEqual(['heart', 'diabetes', 'liver']);
  });

  it('rejects unknown names with NotFound', () => {
    expect(catalog.has('lungs')).toBe(false);
    expect(catalog.get('lungs')).toBeUndefined();
    expect(() => catalog.require('lungs')).toThrow('Unknown model: lungs');

    try {
      catalog.require('lungs');
    } catch (error) {
      expect(error).toMatchObject({ code: 'NotFound', details: { knownModels: ['heart', 'diabetes', 'liver'] } });
    }
  });

  it('freezes entries', () => {
    expect(Object.isFrozen(catalog.require('heart'))).toBe(true);
  });
});
