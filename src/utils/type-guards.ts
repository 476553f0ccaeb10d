export type Guard<T> = (value: unknown) => value is T;

/**
 * Mapping of JavaScript `typeof` results to corresponding TypeScript types.
 * Used by the {@link is} factory.
 */
type PrimitiveTypeMap = {
  boolean: boolean;
  number: number;
  bigint: bigint;
  string: string;
  symbol: symbol;
  undefined: undefined;
};

/**
 * Runtime storage categories an enum case value can have.
 * Exactly the `typeof` keywords of {@link PrimitiveTypeMap} plus `object`.
 */
export type StorageType = keyof PrimitiveTypeMap | 'object';

/**
 * Creates a guard for a built-in primitive `typeof` check.
 *
 * @template T  One of the keys of {@link PrimitiveTypeMap}.
 * @param type  The primitive type keyword to compare against `typeof value`.
 * @returns     A guard that returns `true` iff `typeof value === type`.
 */
export function is<T extends keyof PrimitiveTypeMap>(
  type: T
): Guard<PrimitiveTypeMap[T]> {
  return (value: unknown): value is PrimitiveTypeMap[T] =>
    typeof value === type;
}

/** Guard verifying the value is a string. */
export const isString = is('string');

/** Guard verifying the value is a number (including NaN/Infinity). */
export const isNumber = is('number');

/** Guard verifying the value is a boolean. */
export const isBoolean = is('boolean');

/** Guard verifying the value is a bigint. */
export const isBigInt = is('bigint');

/**
 * Guard verifying the value is a finite number.
 *
 * Semantics:
 * - true  for:  0, 1, -1, 1.5, -0
 * - false for:  NaN, Infinity, -Infinity, non-numbers
 */
export function isFiniteValue(value: unknown): value is number {
  return isNumber(value) && Number.isFinite(value);
}

/**
 * Guard verifying the value is an integral number that a double holds
 * exactly.
 *
 * Note:
 * `1.0` is integral (JavaScript has a single number type); `1.5`, `NaN`,
 * `Infinity` and integers beyond `Number.MAX_SAFE_INTEGER` are not.
 */
export function isIntegerValue(value: unknown): value is number {
  return isNumber(value) && Number.isSafeInteger(value);
}

/**
 * Returns the storage category of a value: its `typeof`, except that `null`
 * and functions are reported as `object`.
 */
export function storageTypeOf(value: unknown): StorageType {
  const type = typeof value;
  return type === 'function' ? 'object' : type;
}

/**
 * Map for complex runtime categories to concrete TypeScript types.
 */
type ComplexTypeMap = {
  object: Record<string, unknown>;
  function: (...args: unknown[]) => unknown;
  array: unknown[];
};

/**
 * Creates a guard verifying the given value matches a complex runtime category.
 *
 * Notes:
 * - `"object"` excludes `null` and arrays.
 * - `"array"` uses `Array.isArray`.
 * - `"function"` uses `typeof === "function"`.
 */
export function isComplex<T extends keyof ComplexTypeMap>(
  type: T
): Guard<ComplexTypeMap[T]> {
  return (value: unknown): value is ComplexTypeMap[T] => {
    if (value === null) return false;

    if (type === 'array') {
      return Array.isArray(value);
    }

    if (type === 'object') {
      return typeof value === 'object' && !Array.isArray(value);
    }

    if (type === 'function') {
      return typeof value === 'function';
    }

    return false;
  };
}

/** Guard verifying the value is a non-null object (excluding arrays). */
export const isObject = isComplex('object');

/** Guard verifying the value is a function. */
export const isFunction = isComplex('function');

/** Guard verifying the value is an array. */
export const isArray = isComplex('array');

/**
 * Guard verifying the value is a thenable.
 *
 * Used to tell the synchronous and the asynchronous completion paths of a
 * producer apart: anything with a callable `then` is awaited, everything
 * else is taken as an immediate result.
 */
export function isPromiseLike<T = unknown>(
  value: unknown
): value is PromiseLike<T> {
  return (
    (isObject(value) || isFunction(value)) &&
    'then' in value &&
    isFunction(value.then)
  );
}
