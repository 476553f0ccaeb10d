import { TypeMismatchError } from '../errors';
import { unwrapOrFail } from '../optional';
import { isBigInt, isBoolean, isNumber, isString } from './type-guards';

/**
 * Converts a scalar value to its text form.
 *
 * Rules:
 * - strings pass through unchanged
 * - booleans become `"true"` / `"false"`
 * - numbers use the shortest round-trip form (`1`, `1.5`, `-0` → `"0"`)
 * - bigints drop the `n` suffix
 *
 * Optional layers are removed first.
 *
 * @throws {UnexpectedAbsentValueError} When the value is absent.
 * @throws {TypeMismatchError} For objects, arrays, symbols and functions.
 */
export function stringify(value: unknown): string {
  const scalar = unwrapOrFail(value);

  if (isString(scalar)) return scalar;
  if (isBoolean(scalar)) return scalar ? 'true' : 'false';
  if (isNumber(scalar) || isBigInt(scalar)) return String(scalar);

  throw new TypeMismatchError('text', scalar);
}
