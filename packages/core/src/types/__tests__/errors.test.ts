import { describe, it, expect } from 'vitest';

import {
  ShardCheckError,
  GeometryError,
  DocumentError,
  ConfigurationError,
  InputError,
  ValidationFailedError,
  InternalError,
  isShardCheckError,
} from '../errors.js';
import { ErrorCode } from '../../errors/codes.js';
import { createIssue, ISSUE_KINDS } from '../../validation/issue.js';

describe('Error Hierarchy', () => {
  describe('ShardCheckError base class', () => {
    class TestError extends ShardCheckError {
      constructor(message: string, cause?: Error) {
        super({ message, errorCode: ErrorCode.INTERNAL_ERROR, cause });
      }
    }

    it('creates error with params object', () => {
      const error = new TestError('Test message');

      expect(error.message).toBe('Test message');
      expect(error.errorCode).toBe(ErrorCode.INTERNAL_ERROR);
      expect(error.severity).toBe('error');
      expect(error.name).toBe('TestError');
      expect(error).toBeInstanceOf(Error);
    });

    it('keeps the cause and serializes it', () => {
      const cause = new Error('root cause');
      const json = new TestError('Higher level', cause).toJSON();

      expect(json.cause).toEqual({ name: 'Error', message: 'root cause' });
      expect(json.stack).toBeDefined();
    });
  });

  describe('toJSON', () => {
    it('drops stack and raw value in prod', () => {
      const error = new GeometryError('Range end [0] must be >= start [1]', {
        operation: 'Range',
        value: { start: [1], end: [0] },
      });

      const dev = error.toJSON('dev');
      const prod = error.toJSON('prod');

      expect(dev.context?.value).toEqual({ start: [1], end: [0] });
      expect(prod.context).toEqual({ operation: 'Range' });
      expect(prod.stack).toBeUndefined();
    });
  });

  describe('subclasses', () => {
    it('GeometryError defaults to E100 and accepts a narrower code', () => {
      expect(new GeometryError('bad').errorCode).toBe(ErrorCode.GEOMETRY_PRECONDITION);
      expect(
        new GeometryError('bad', undefined, ErrorCode.SHAPE_MISMATCH).getExitCode()
      ).toBe(31);
    });

    it('DocumentError records its pointer in the context', () => {
      const error = new DocumentError({
        message: 'duplicate node id t',
        path: '/nodes/1/id',
        errorCode: ErrorCode.DUPLICATE_NODE_ID,
      });

      expect(error.context?.path).toBe('/nodes/1/id');
      expect(error.getExitCode()).toBe(22);
    });

    it('maps each class to its exit code', () => {
      expect(new DocumentError({ message: 'x' }).getExitCode()).toBe(20);
      expect(new ConfigurationError('x').getExitCode()).toBe(50);
      expect(new InputError('x').getExitCode()).toBe(60);
      expect(new InternalError('x').getExitCode()).toBe(99);
    });

    it('ValidationFailedError carries the issues and formats them', () => {
      const issue = createIssue(ISSUE_KINDS.NODE_VALIDATION, 'Something is off');
      const error = new ValidationFailedError([issue]);

      expect(error.issues).toEqual([issue]);
      expect(error.context?.issueCount).toBe(1);
      expect(error.message).toBe(
        'Validation failed with 1 issue:\n\n* Error [NodeValidationError]: Something is off\n'
      );
      expect(error.getExitCode()).toBe(40);
    });
  });

  it('isShardCheckError recognises only the hierarchy', () => {
    expect(isShardCheckError(new InputError('x'))).toBe(true);
    expect(isShardCheckError(new Error('x'))).toBe(false);
    expect(isShardCheckError('x')).toBe(false);
  });
});
