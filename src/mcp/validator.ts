/**
 * MCP tool input validation beyond what the Zod schemas express
 */
import { CodespecError } from '@utils/errors';

/**
 * Validation error - invalid tool input parameters
 */
export class ValidationError extends CodespecError {
  constructor(parameter: string, message: string, details?: unknown, suggestion?: string) {
    super(`Invalid parameter '${parameter}': ${message}`, 'VALIDATION_ERROR', details, suggestion);
  }

  static missingRequired(parameter: string): ValidationError {
    return new ValidationError(
      parameter,
      'This parameter is required',
      undefined,
      `Provide a value for '${parameter}'`
    );
  }

  static invalidFormat(parameter: string, value: string, expected: string): ValidationError {
    return new ValidationError(parameter, `Invalid value '${value}'`, { value, expected }, `Expected ${expected}`);
  }

  static emptyArray(parameter: string): ValidationError {
    return new ValidationError(parameter, 'Array cannot be empty', undefined, `Provide at least one element`);
  }
}

/** Collection names as the vector store accepts them */
const CODEBASE_PATTERN = /^[\w][\w.-]*$/;

/**
 * Validate a codebase name
 *
 * @returns The trimmed name
 * @throws {ValidationError} If the name is empty or not a valid collection name
 */
export const validateCodebaseName = (parameter: string, value: string): string => {
  const name = value.trim();
  if (name === '') {
    throw ValidationError.missingRequired(parameter);
  }
  if (!CODEBASE_PATTERN.test(name)) {
    throw ValidationError.invalidFormat(parameter, value, 'letters, digits, underscores, dots and hyphens');
  }
  return name;
};

/**
 * Validate and deduplicate a list of codebase names, keeping the first occurrence
 *
 * @throws {ValidationError} If the list is empty or any name is invalid
 */
export const validateCodebaseList = (parameter: string, values: string[]): string[] => {
  const names = values.map((value, index) => validateCodebaseName(`${parameter}[${String(index)}]`, value));
  if (names.length === 0) {
    throw ValidationError.emptyArray(parameter);
  }
  return [...new Set(names)];
};
