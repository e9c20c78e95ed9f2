import { describe, it, expect } from 'vitest';
import {
  ValidationFailedError,
  isValidationError,
  maxAttemptsSchema,
  npmPackageNameSchema,
  pipPackageNameSchema,
  taskSchema,
  validate,
} from '../../src/utils/validation.js';

describe('Validation', () => {
  describe('validate function', () => {
    it('should return the converted value', () => {
      expect(validate(taskSchema, '  print the date  ')).toBe('print the date');
      expect(validate(maxAttemptsSchema, '5')).toBe(5);
    });

    it('should throw a validation error with details', () => {
      try {
        validate(taskSchema, '');
        expect.unreachable('validate should have thrown');
      } catch (error) {
        expect(isValidationError(error)).toBe(true);
        if (!(error instanceof ValidationFailedError)) return;
        expect(error.code).toBe('VALIDATION_FAILED');
        expect(error.message).toBe('Validation failed: A task description is required');
        expect(error.validationDetails).toEqual([{ field: '', message: 'A task description is required' }]);
      }
    });

    it('should reject tasks over 2000 characters', () => {
      expect(() => validate(taskSchema, 'x'.repeat(2001))).toThrow(ValidationFailedError);
    });
  });

  describe('isValidationError', () => {
    it('should return false for non-validation errors', () => {
      expect(isValidationError(new Error('Regular error'))).toBe(false);
    });
  });

  describe('package name schemas', () => {
    it('should accept ordinary pip distribution names', () => {
      for (const name of ['requests', 'scikit-learn', 'PyYAML', 'opencv-python', 'zope.interface']) {
        expect(pipPackageNameSchema.validate(name).error).toBeUndefined();
      }
    });

    it('should reject shell syntax in pip names', () => {
      for (const name of ['a b', 'pkg;ls', '-e', 'pkg>=1.0']) {
        expect(pipPackageNameSchema.validate(name).error).toBeDefined();
      }
    });

    it('should accept scoped and unscoped npm names', () => {
      for (const name of ['chalk', '@octokit/rest', 'lodash.merge']) {
        expect(npmPackageNameSchema.validate(name).error).toBeUndefined();
      }
      expect(npmPackageNameSchema.validate('Chalk').error).toBeDefined();
    });
  });
});
