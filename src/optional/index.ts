import { UnexpectedAbsentValueError } from '../errors';

/**
 * Explicit "no value" marker.
 *
 * Returned by the resolver for optional properties that evaluated to nothing,
 * and accepted everywhere an absent value can appear. `null` and `undefined`
 * are treated the same way at the base of an unwrap.
 *
 * Implementation Strategy:
 * Uses `Symbol.for` so the marker keeps its identity across duplicate module
 * instances.
 */
export const ABSENT = Symbol.for('typed-layout-templates.absent');
export type Absent = typeof ABSENT;

const OPTIONAL_BRAND = Symbol.for('typed-layout-templates.optional');

/**
 * An optional wrapper around a value.
 *
 * Boxes may nest (`some(some(1))`); every consumer goes through the
 * normalizer functions below, so downstream code never sees a wrapper.
 */
export type Optional<T = unknown> = {
  readonly [OPTIONAL_BRAND]: true;
  readonly value: T | Absent;
};

/**
 * Outcome of a non-throwing unwrap.
 *
 * Pattern:
 * - `present: true`  => `value` holds the innermost concrete value
 * - `present: false` => the value was absent at some layer
 */
export type Maybe<T> = { present: true; value: T } | { present: false };

/**
 * Canonical "absent" outcome. Shared to avoid repeated allocation.
 */
export const NOTHING: { present: false } = Object.freeze({ present: false });

export function present<T>(value: T): { present: true; value: T } {
  return { present: true, value };
}

/** Wraps a value in an optional box. */
export function some<T>(value: T): Optional<T> {
  return Object.freeze({ [OPTIONAL_BRAND]: true as const, value });
}

/** An empty optional box. */
export function none(): Optional<never> {
  return Object.freeze({ [OPTIONAL_BRAND]: true as const, value: ABSENT });
}

export function isOptional(value: unknown): value is Optional {
  return (
    typeof value === 'object' &&
    value !== null &&
    OPTIONAL_BRAND in value &&
    value[OPTIONAL_BRAND] === true
  );
}

/**
 * Checks whether a value is an absence marker at the base case:
 * {@link ABSENT}, `null` or `undefined`.
 */
export function isAbsentMarker(value: unknown): value is Absent | null | undefined {
  return value === ABSENT || value === null || value === undefined;
}

/**
 * Strips every optional layer.
 *
 * Boxes are frozen at creation and cannot contain themselves, so the loop
 * ends after as many steps as there are layers.
 */
function innermost(value: unknown): unknown {
  let current = value;
  while (isOptional(current)) {
    current = current.value;
  }
  return current;
}

/**
 * Removes all optional layers and returns the concrete value.
 *
 * @throws {UnexpectedAbsentValueError} When the innermost value is absent.
 */
export function unwrapOrFail(value: unknown): unknown {
  const result = unwrapOrAbsent(value);
  if (!result.present) {
    throw new UnexpectedAbsentValueError();
  }
  return result.value;
}

/**
 * Removes all optional layers, reporting absence instead of failing.
 * Used where absence is a legal outcome (optional properties).
 */
export function unwrapOrAbsent(value: unknown): Maybe<unknown> {
  const inner = innermost(value);
  return isAbsentMarker(inner) ? NOTHING : present(inner);
}

/**
 * Tests whether a value is absent after unwrapping, without building a result.
 */
export function isAbsent(value: unknown): boolean {
  return isAbsentMarker(innermost(value));
}
