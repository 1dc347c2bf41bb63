import { describe, it, expect } from 'vitest';
import { z } from 'zod';
import {
  ServingError,
  TimeoutError,
  createTimeoutError,
  isServingError,
  toServingError,
  zodErrorToServingError,
} from '../../../src/api/errors.js';

describe('ServingError', () => {
  it('serializes to a plain shape', () => {
    const error = new ServingError('NotFound', 'Unknown model: lungs', { modelName: 'lungs' });

    expect(error.toObject()).toEqual({
      code: 'NotFound',
      message: 'Unknown model: lungs',
      details: { modelName: 'lungs' },
    });
    expect(error.name).toBe('ServingError');
  });

  it('narrows on code', () => {
    const error = new ServingError('Conflict', 'duplicate');

    expect(isServingError(error)).toBe(true);
    expect(isServingError(error, 'Conflict')).toBe(true);
    expect(isServingError(error, 'NotFound')).toBe(false);
    expect(isServingError(new Error('plain'))).toBe(false);
  });
});

describe('toServingError', () => {
  it('returns serving errors unchanged', () => {
    const error = new ServingError('Timeout', 'slow');
    expect(toServingError(error)).toBe(error);
  });

  it('maps abort errors to Timeout', () => {
    const abort = new Error('The operation was aborted');
    abort.name = 'AbortError';

    const mapped = toServingError(abort);
    expect(mapped.code).toBe('Timeout');
    expect(mapped.cause).toBe(abort);
  });

  it('uses the fallback code for other errors', () => {
    expect(toServingError(new Error('disk')).code).toBe('Unavailable');
    expect(toServingError(new Error('disk'), 'StateCorrupted').code).toBe('StateCorrupted');
    expect(toServingError('boom').message).toBe('Unknown serving error');
  });
});

describe('createTimeoutError', () => {
  it('includes operation, timeout and model', () => {
    const error = createTimeoutError('predict', 250, 'heart');

    expect(error).toBeInstanceOf(TimeoutError);
    expect(error.code).toBe('Timeout');
    expect(error.message).toBe('Request timed out after 250ms: predict (model: heart)');
    expect(error.operation).toBe('predict');
    expect(error.timeout).toBe(250);
  });

  it('omits the model when not given', () => {
    expect(createTimeoutError('load', 10).message).toBe('Request timed out after 10ms: load');
  });
});

describe('zodErrorToServingError', () => {
  it('reports the first failing field', () => {
    const result = z.object({ features: z.array(z.number()) }).safeParse({ features: [1, 'x'] });
    if (result.success) {
      throw new Error('expected validation failure');
    }

    const error = zodErrorToServingError(result.error);
    expect(error.code).toBe('InvalidParams');
    expect(error.message).toBe("Validation error on field 'features.1': Expected number, received string");
    expect(error.details?.field).toBe('features.1');
  });
});
