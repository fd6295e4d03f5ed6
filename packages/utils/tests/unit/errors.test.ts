import { describe, it, expect } from 'vitest';
import {
  AppError,
  FormatError,
  InvalidArgumentError,
  isRunTerminatingError,
  NotFoundError,
  WriteError,
} from '../../src/errors.js';

describe('errors', () => {
  it('tags each failure kind with its code', () => {
    expect(new NotFoundError('missing', 'orders.json').code).toBe('NOT_FOUND');
    expect(new FormatError('bad json').code).toBe('FORMAT_ERROR');
    expect(new WriteError('out.json', new Error('EACCES')).code).toBe('WRITE_ERROR');
    expect(new InvalidArgumentError('bad token', 'oops').code).toBe('INVALID_ARGUMENT');
    expect(new AppError('generic').code).toBe('APP_ERROR');
  });

  it('keeps the path and cause of a write failure', () => {
    const cause = new Error('EACCES: permission denied');
    const error = new WriteError('/readonly/out.json', cause, { comment: 'Failed to save orders' });

    expect(error).toBeInstanceOf(AppError);
    expect(error.name).toBe('WriteError');
    expect(error.message).toBe('Failed to write file: /readonly/out.json');
    expect(error.path).toBe('/readonly/out.json');
    expect(error.cause).toBe(cause);
    expect(error.comment).toBe('Failed to save orders');
    expect(error.context).toEqual({ path: '/readonly/out.json', comment: 'Failed to save orders' });
  });

  it('merges the path into the not-found context', () => {
    const error = new NotFoundError('Orders file not found: a.json', 'a.json', {
      comment: 'Failed to locate the orders file',
    });

    expect(error.context).toEqual({ path: 'a.json', comment: 'Failed to locate the orders file' });
    expect(error.cause).toBeUndefined();
  });

  it('serializes to JSON with the cause message', () => {
    const error = new FormatError('bad', { comment: 'Failed to deserialize orders' }, new Error('Unexpected token'));

    expect(error.toJSON()).toMatchObject({
      name: 'FormatError',
      message: 'bad',
      code: 'FORMAT_ERROR',
      context: { comment: 'Failed to deserialize orders' },
      cause: 'Unexpected token',
    });
  });

  describe('isRunTerminatingError', () => {
    it('accepts the four run failures', () => {
      expect(isRunTerminatingError(new NotFoundError('x', 'x'))).toBe(true);
      expect(isRunTerminatingError(new FormatError('x'))).toBe(true);
      expect(isRunTerminatingError(new WriteError('x', null))).toBe(true);
      expect(isRunTerminatingError(new InvalidArgumentError('x', 'x'))).toBe(true);
    });

    it('rejects other errors', () => {
      expect(isRunTerminatingError(new AppError('x'))).toBe(false);
      expect(isRunTerminatingError(new TypeError('x'))).toBe(false);
      expect(isRunTerminatingError('x')).toBe(false);
    });
  });
});
