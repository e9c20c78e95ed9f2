import Joi from 'joi';
import { ScriptMenderError } from '../types/errors.js';

/**
 * Common validation schemas for scriptmender
 */

export const taskSchema = Joi.string()
  .trim()
  .min(1)
  .max(2000)
  .required()
  .messages({
    'string.empty': 'A task description is required',
    'any.required': 'A task description is required',
  });

export const maxAttemptsSchema = Joi.number()
  .integer()
  .min(1)
  .max(20)
  .required();

// PEP 508 distribution names
export const pipPackageNameSchema = Joi.string()
  .max(214)
  .pattern(/^[A-Za-z0-9]([A-Za-z0-9._-]*[A-Za-z0-9])?$/)
  .required()
  .messages({
    'string.pattern.base': 'Package name can only contain letters, numbers, dots, hyphens, and underscores',
  });

export const npmPackageNameSchema = Joi.string()
  .max(214)
  .pattern(/^(@[a-z0-9-~][a-z0-9-._~]*\/)?[a-z0-9-~][a-z0-9-._~]*$/)
  .required()
  .messages({
    'string.pattern.base': 'Package name must be a valid npm package name',
  });

export const diagnosticSchema = Joi.string()
  .min(1)
  .max(1_000_000)
  .required();

export interface ValidationDetail {
  field: string;
  message: string;
}

export class ValidationFailedError extends ScriptMenderError {
  readonly isValidationError = true;
  readonly validationDetails: ValidationDetail[];

  constructor(message: string, details: ValidationDetail[]) {
    super(message, 'VALIDATION_FAILED');
    this.name = 'ValidationFailedError';
    this.validationDetails = details;
  }
}

/**
 * Validate data against a schema, returning the converted value
 */
export function validate<T>(schema: Joi.Schema<T>, data: unknown): T {
  const { error, value } = schema.validate(data, {
    abortEarly: false,
    stripUnknown: true,
  });

  if (error) {
    throw new ValidationFailedError(
      `Validation failed: ${error.details.map(d => d.message).join(', ')}`,
      error.details.map(detail => ({
        field: detail.path.join('.'),
        message: detail.message,
      }))
    );
  }

  return value;
}

/**
 * Check if an error is a validation error
 */
export function isValidationError(error: unknown): error is ValidationFailedError {
  return error instanceof ValidationFailedError;
}
