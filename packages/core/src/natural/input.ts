import { ErrorCode } from '../errors/codes.js';
import { InvalidInputError } from '../types/errors.js';

export interface NaturalInputContext {
  argument: string;
  operation?: string;
  maxNatural: number;
}

/**
 * Check that a caller-supplied value can stand for a Peano natural.
 *
 * @throws {InvalidInputError} INVALID_INPUT for anything that is not a
 * non-negative integer, INPUT_LIMIT_EXCEEDED above `maxNatural`
 */
export function assertNaturalInput(
  value: unknown,
  { argument, operation, maxNatural }: NaturalInputContext
): number {
  if (typeof value !== 'number' || !Number.isFinite(value)) {
    throw new InvalidInputError({
      message: `${argument} must be a finite number`,
      context: {
        argument,
        operation,
        value,
        suggestion: 'Pass a non-negative integer such as 0, 1 or 42',
      },
    });
  }
  if (!Number.isInteger(value)) {
    throw new InvalidInputError({
      message: `${argument} must be an integer, got ${value}`,
      context: {
        argument,
        operation,
        value,
        suggestion: 'Peano naturals have no fractional part; use a fraction instead',
      },
    });
  }
  if (value < 0) {
    throw new InvalidInputError({
      message: `${argument} must be non-negative, got ${value}`,
      context: {
        argument,
        operation,
        value,
        suggestion: 'Peano naturals start at 0',
      },
    });
  }
  if (value > maxNatural) {
    throw new InvalidInputError({
      message: `${argument} exceeds the configured maximum of ${maxNatural}`,
      errorCode: ErrorCode.INPUT_LIMIT_EXCEEDED,
      context: {
        argument,
        operation,
        value,
        limit: maxNatural,
        suggestion: 'Raise limits.maxNatural or pick a smaller value',
      },
    });
  }
  return value;
}

export function zeroDenominatorError(
  argument: string,
  operation?: string
): InvalidInputError {
  return new InvalidInputError({
    message: `${argument} must not be zero`,
    errorCode: ErrorCode.ZERO_DENOMINATOR,
    context: {
      argument,
      operation,
      value: 0,
      suggestion: 'A fraction needs a denominator of at least 1',
    },
  });
}
