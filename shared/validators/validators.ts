/**
 * Composable validators for STL token arguments
 * All validators are pure functions that can be chained together
 */

import type { Vec3 } from '../types/mesh';
import { createVec3 } from '../types/mesh';
import type { Result } from '../utils/result';
import { Ok, Err, all, andThen, map } from '../utils/result';

export type ValidationError = {
  readonly message: string;
  readonly code: string;
};

// sign, integer and/or fractional part, optional exponent
const FLOAT_LITERAL = /^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/;

/**
 * Validate that a number is finite and not NaN
 */
export const validateNumber = (value: number): Result<number, ValidationError> => {
  if (!Number.isFinite(value)) {
    return Err({
      message: `Invalid number: ${value}`,
      code: 'INVALID_NUMBER',
    });
  }
  return Ok(value);
};

/**
 * Parse a decimal floating-point literal
 */
export const parseNumber = (token: string): Result<number, ValidationError> => {
  if (!FLOAT_LITERAL.test(token)) {
    return Err({
      message: `Invalid number: ${token}`,
      code: 'INVALID_NUMBER',
    });
  }
  return validateNumber(Number(token));
};

/**
 * Validate the argument count of a token
 */
export const validateArity = (
  parts: readonly string[],
  expected: number,
  itemName: string
): Result<readonly string[], ValidationError> => {
  if (parts.length !== expected) {
    return Err({
      message: `${itemName} requires ${expected} components, got ${parts.length}`,
      code: 'INVALID_ARITY',
    });
  }
  return Ok(parts);
};

/**
 * Parse exactly three numeric components (x y z)
 */
export const parseVec3 = (
  parts: readonly string[],
  itemName: string
): Result<Vec3, ValidationError> =>
  andThen(validateArity(parts, 3, itemName), valid =>
    map(all(valid.map(parseNumber)), ([x, y, z]) => createVec3(x, y, z))
  );
