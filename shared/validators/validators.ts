/**
 * Composable validators using functional programming
 * All validators are pure functions that can be chained together
 */

import type { Face } from '../types/mesh';
import type { Result } from '../utils/result';
import { Ok, Err } from '../utils/result';

export type MeshErrorCode =
  | 'PARAMETER_VALIDATION'
  | 'INDEX_OUT_OF_RANGE'
  | 'IO_ERROR'
  | 'PARSE_ERROR';

export type MeshError = {
  readonly message: string;
  readonly code: MeshErrorCode;
  readonly path?: string;
};

export type Validator<T> = (value: T) => Result<T, MeshError>;

export const parameterError = (name: string, message: string): MeshError => ({
  message: `${name} ${message}`,
  code: 'PARAMETER_VALIDATION',
  path: name,
});

/**
 * Combine multiple validators into one (function composition)
 */
export const combine = <T>(
  ...validators: ReadonlyArray<Validator<T>>
): Validator<T> => {
  return (value: T): Result<T, MeshError> => {
    for (const validator of validators) {
      const result = validator(value);
      if (!result.ok) {
        return result;
      }
    }
    return Ok(value);
  };
};

/**
 * Validate that a number is finite and not NaN
 */
export const validateFinite = (name: string): Validator<number> => (value) => {
  if (typeof value !== 'number' || !Number.isFinite(value)) {
    return Err(parameterError(name, `must be a finite number, got ${value}`));
  }
  return Ok(value);
};

export const validatePositive = (name: string): Validator<number> =>
  combine(validateFinite(name), (value) =>
    value > 0 ? Ok(value) : Err(parameterError(name, `must be > 0, got ${value}`))
  );

export const validateMinInteger = (name: string, min: number): Validator<number> => (value) => {
  if (!Number.isInteger(value)) {
    return Err(parameterError(name, `must be an integer, got ${value}`));
  }
  if (value < min) {
    return Err(parameterError(name, `must be >= ${min}, got ${value}`));
  }
  return Ok(value);
};

/**
 * Validate that every face index lies in [1, vertexCount]
 */
export const validateFaceIndices = (
  faces: readonly Face[],
  vertexCount: number
): Result<readonly Face[], MeshError> => {
  for (let i = 0; i < faces.length; i++) {
    for (const index of faces[i]) {
      if (!Number.isInteger(index) || index < 1 || index > vertexCount) {
        return Err({
          message: `Face index ${index} out of range for ${vertexCount} vertices`,
          code: 'INDEX_OUT_OF_RANGE',
          path: `faces[${i}]`,
        });
      }
    }
  }

  return Ok(faces);
};
