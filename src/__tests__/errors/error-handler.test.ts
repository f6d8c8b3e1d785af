/**
 * Error Handler Tests
 */

import { describe, it, expect } from 'vitest';
import {
  ErrorHandler,
  invalidArgument,
  KnowledgeError,
  notFound,
  toStoreFailure,
} from '../../errors/index.js';

describe('KnowledgeError', () => {
  it('should prefix the message with its kind', () => {
    const err = notFound('Node', 'node_1');
    expect(err.message).toBe('[NotFound] Node not found: node_1');
    expect(err.kind).toBe('NotFound');
    expect(err.detail).toBe('Node not found: node_1');
  });

  it('should pass knowledge errors through toStoreFailure', () => {
    const original = invalidArgument('bad');
    expect(toStoreFailure(original)).toBe(original);
  });

  it('should wrap other failures as StoreFailure with the cause', () => {
    const cause = new Error('SQLITE_BUSY: database is locked');
    const wrapped = toStoreFailure(cause);
    expect(wrapped.kind).toBe('StoreFailure');
    expect(wrapped.detail).toBe('SQLITE_BUSY: database is locked');
    expect(wrapped.cause).toBe(cause);
  });
});

describe('ErrorHandler', () => {
  describe('toStructuredError', () => {
    it('should map a knowledge error with hints', () => {
      const structured = ErrorHandler.toStructuredError(new KnowledgeError('Conflict', 'already promoted'));
      expect(structured.kind).toBe('Conflict');
      expect(structured.message).toBe('already promoted');
      expect(structured.retryable).toBe(true);
      expect(structured.recoveryHints.length).toBeGreaterThan(0);
    });

    it('should recover the kind from a message prefix', () => {
      const structured = ErrorHandler.toStructuredError(new Error('[NotFound] gone'));
      expect(structured.kind).toBe('NotFound');
      expect(structured.message).toBe('[NotFound] gone');
      expect(structured.retryable).toBe(false);
    });

    it('should treat unknown errors as StoreFailure', () => {
      expect(ErrorHandler.toStructuredError('boom')).toMatchObject({
        kind: 'StoreFailure',
        message: 'boom',
        retryable: false,
      });
      expect(ErrorHandler.toStructuredError(new Error('[Bogus] x')).kind).toBe('StoreFailure');
      expect(ErrorHandler.extractMessage(null)).toBe('null error');
      expect(ErrorHandler.extractMessage(undefined)).toBe('undefined error');
    });
  });

  describe('wrap', () => {
    it('should return data on success', async () => {
      await expect(ErrorHandler.wrap(async () => 42)).resolves.toEqual({ ok: true, data: 42 });
    });

    it('should never reject', async () => {
      const result = await ErrorHandler.wrap(async () => {
        throw invalidArgument('limit must be an integer between 1 and 50');
      });
      expect(result).toEqual({
        ok: false,
        error: {
          kind: 'InvalidArgument',
          message: 'limit must be an integer between 1 and 50',
          recoveryHints: ['Fix the arguments and call again'],
          retryable: false,
        },
      });
    });
  });
});
