/**
 * Shared error and Result helper tests
 */

import { describe, it, expect } from 'vitest';

import {
  ExternalServiceError,
  ValidationError,
  errorMessage,
  isAppError,
} from '../errors';
import { generateId } from '../id';
import { tryCatch, tryCatchAsync } from '../result';

describe('errors', () => {
  it('should serialize an AppError without its stack', () => {
    const error = new ValidationError('Duration must be positive', 'durationMs', { value: 0 });

    expect(error.toJSON()).toEqual({
      name: 'ValidationError',
      code: 'VALIDATION_ERROR',
      message: 'Duration must be positive',
      statusCode: 400,
      details: { value: 0 },
    });
    expect(error.field).toBe('durationMs');
  });

  it('should let subclasses override the external service code', () => {
    const error = new ExternalServiceError('chaos-control-plane', 'HTTP 502', {}, 'UPSTREAM');

    expect(error.code).toBe('UPSTREAM');
    expect(error.statusCode).toBe(502);
    expect(error.details).toEqual({ service: 'chaos-control-plane' });
  });

  it('should recognise AppError subclasses', () => {
    expect(isAppError(new ValidationError('bad'))).toBe(true);
    expect(isAppError(new Error('bad'))).toBe(false);
  });

  it('should render any thrown value as a message', () => {
    expect(errorMessage(new Error('socket hang up'))).toBe('socket hang up');
    expect(errorMessage(503)).toBe('503');
  });
});

describe('result', () => {
  it('should capture a resolved value', async () => {
    const result = await tryCatchAsync(async () => 42);

    expect(result).toEqual({ ok: true, value: 42 });
  });

  it('should capture a rejection as a failure', async () => {
    const result = await tryCatchAsync(async () => {
      throw new Error('stop failed');
    });

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.message).toBe('stop failed');
    }
  });

  it('should normalise non-Error rejections', async () => {
    const result = await tryCatchAsync(() => Promise.reject('timeout'));

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error).toBeInstanceOf(Error);
      expect(result.error.message).toBe('timeout');
    }
  });
});

describe('tryCatch', () => {
  it('should capture a returned value', () => {
    expect(tryCatch(() => 'recorded')).toEqual({ ok: true, value: 'recorded' });
  });

  it('should capture a synchronous throw as a failure', () => {
    const result = tryCatch(() => {
      throw new Error('sink down');
    });

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.message).toBe('sink down');
    }
  });
});

describe('id', () => {
  it('should generate distinct UUID v4 values', () => {
    const id = generateId();

    expect(id).toMatch(/^[0-9a-f]{8}-[0-9a-f]{4}-4[0-9a-f]{3}-[89ab][0-9a-f]{3}-[0-9a-f]{12}$/);
    expect(generateId()).not.toBe(id);
  });
});
