import { describe, expect, it, test } from 'vitest';
import { UnexpectedAbsentValueError } from '../../errors';
import {
  ABSENT,
  isAbsent,
  isOptional,
  none,
  some,
  unwrapOrAbsent,
  unwrapOrFail
} from '../index';

/**
 * Wraps `value` in `depth` optional layers.
 */
function nest(value: unknown, depth: number): unknown {
  let current = value;
  for (let i = 0; i < depth; i++) current = some(current);
  return current;
}

/**
 * Test suite: optional normalization.
 *
 * Coverage:
 * - Present values survive any number of wrapper layers unchanged.
 * - Every absence marker fails `unwrapOrFail` at any depth.
 * - Non-throwing variants report the same outcome.
 */
describe('Optional Normalizer', () => {
  describe('Present Values', () => {
    const values = [
      { id: 'Zero', value: 0 },
      { id: 'False', value: false },
      { id: 'EmptyText', value: '' },
      { id: 'Object', value: { top: 1 } }
    ];
    const scenarios = values.flatMap(({ id, value }) =>
      [0, 1, 2, 5].map(depth => ({ id: `${id}@${depth}`, value, depth }))
    );

    test.for(scenarios)('[$id] unwraps to the innermost value', ({ value, depth }) => {
      // 1. Wrap the value.
      const wrapped = nest(value, depth);

      // 2. Both unwrapping variants must yield the same reference.
      expect(unwrapOrFail(wrapped)).toBe(value);
      expect(unwrapOrAbsent(wrapped)).toEqual({ present: true, value });
      expect(isAbsent(wrapped)).toBe(false);
    });
  });

  describe('Absent Values', () => {
    const markers = [
      { id: 'ABSENT', value: ABSENT },
      { id: 'null', value: null },
      { id: 'undefined', value: undefined },
      { id: 'none()', value: none() }
    ];
    const scenarios = markers.flatMap(({ id, value }) =>
      [0, 1, 3].map(depth => ({ id: `${id}@${depth}`, value, depth }))
    );

    test.for(scenarios)('[$id] is reported as absent', ({ value, depth }) => {
      const wrapped = nest(value, depth);

      expect(() => unwrapOrFail(wrapped)).toThrow(UnexpectedAbsentValueError);
      expect(unwrapOrAbsent(wrapped)).toEqual({ present: false });
      expect(isAbsent(wrapped)).toBe(true);
    });
  });

  it('reports a fixed message for absent values', () => {
    expect(() => unwrapOrFail(some(null))).toThrow('Unexpected absent value');
  });

  it('recognizes only branded wrappers as optional', () => {
    expect(isOptional(some(1))).toBe(true);
    expect(isOptional(none())).toBe(true);
    expect(isOptional({ value: 1 })).toBe(false);
    expect(isOptional(null)).toBe(false);
  });

  it('freezes wrappers', () => {
    expect(Object.isFrozen(some(1))).toBe(true);
  });
});
