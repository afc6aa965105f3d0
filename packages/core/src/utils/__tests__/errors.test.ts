/**
 * Tests for error classes and validation helpers
 */

import { describe, it, expect } from 'vitest';
import { z } from 'zod';
import { CadenceError, ResourceNotFoundError, ValidationError, isCadenceError, wrapError } from '../errors.js';
import { parseOrThrow } from '../validation.js';

describe('CadenceError', () => {
  it('should format code, component and operation', () => {
    const error = new ResourceNotFoundError('Unknown document d1', {
      component: 'InMemoryWorkspace',
      operation: 'removeDocument',
      resourceType: 'document',
      resourceId: 'd1',
    });

    expect(error.toString()).toBe('[RESOURCE_NOT_FOUND] InMemoryWorkspace.removeDocument: Unknown document d1');
    expect(error.toJSON()).toMatchObject({
      name: 'ResourceNotFoundError',
      details: { resourceType: 'document', resourceId: 'd1' },
      recoveryHint: 'Verify the document exists',
    });
  });

  it('should wrap foreign errors and keep the cause', () => {
    const original = new TypeError('bad');
    const wrapped = wrapError(original, { component: 'test', operation: 'run' });

    expect(isCadenceError(wrapped)).toBe(true);
    expect(wrapped.code).toBe('INTERNAL_ERROR');
    expect(wrapped.cause).toBe(original);
    expect(wrapError(wrapped, { component: 'other', operation: 'run' })).toBe(wrapped);
  });
});

describe('parseOrThrow', () => {
  const schema = z.object({ workerCount: z.number().int().min(1) });

  it('should return parsed values', () => {
    expect(parseOrThrow(schema, { workerCount: 2 }, { component: 'test', operation: 'setup' })).toEqual({
      workerCount: 2,
    });
  });

  it('should name every failing field', () => {
    const attempt = (): unknown => parseOrThrow(schema, { workerCount: 0 }, { component: 'test', operation: 'setup' });

    expect(attempt).toThrow(ValidationError);
    expect(attempt).toThrow(/^Invalid setup input: workerCount: /);

    try {
      attempt();
    } catch (error) {
      expect(error).toBeInstanceOf(CadenceError);
      expect(error).toMatchObject({ field: 'workerCount' });
    }
  });
});
