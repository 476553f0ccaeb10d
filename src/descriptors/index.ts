import type { StandardSchemaV1 } from '@standard-schema/spec';
import {
  TypeMismatchError,
  UnknownEnumCaseError
} from '../errors';
import { ABSENT, isAbsent, unwrapOrFail } from '../optional';
import type { InferValue } from '../types/inference';
import type {
  BooleanDescriptor,
  EnumAdaptor,
  EnumDescriptor,
  FieldDescriptors,
  FloatingDescriptor,
  IntegerDescriptor,
  OpaqueDescriptor,
  StructuredDescriptor,
  TextDescriptor,
  TypeDescriptor
} from '../types/primitives';
import { stringify } from '../utils/stringify';
import {
  type Guard,
  type StorageType,
  isBigInt,
  isBoolean,
  isFiniteValue,
  isIntegerValue,
  isNumber,
  isString,
  storageTypeOf
} from '../utils/type-guards';
import { isPlainObject } from '../guards';
import { validateWithSchema } from './schema';

export const booleanType: BooleanDescriptor = Object.freeze({
  kind: 'boolean',
  optional: false,
  label: 'boolean'
});

export const integerType: IntegerDescriptor = Object.freeze({
  kind: 'integer',
  optional: false,
  label: 'integer'
});

export const floatingType: FloatingDescriptor = Object.freeze({
  kind: 'floating',
  optional: false,
  label: 'floating'
});

export const textType: TextDescriptor = Object.freeze({
  kind: 'text',
  optional: false,
  label: 'text'
});

export type EnumOptions<V> = {
  /** Overrides the default `enum(a|b|c)` label. */
  label?: string;

  /**
   * Converts non-text raw values into case values.
   * Without one, {@link storageAdaptor} over the declared cases is used.
   */
  adaptor?: EnumAdaptor<V>;
};

/**
 * The default enum adaptor.
 *
 * Accepts any raw value whose storage category (`typeof`, see
 * {@link storageTypeOf}) matches one of the declared cases and passes it
 * through unchanged. A raw `2` is therefore accepted by an enum stored as
 * numbers even when no case maps to `2`.
 *
 * When every numeric case is an integer, only safe integers are accepted:
 * `1.5`, `NaN` and `Infinity` are not values of such an enum.
 */
export function storageAdaptor(cases: Iterable<unknown>): EnumAdaptor<unknown> {
  const storage = new Set<StorageType>();
  let integral = true;
  for (const value of cases) {
    storage.add(storageTypeOf(value));
    if (isNumber(value) && !isIntegerValue(value)) integral = false;
  }

  return (raw: unknown) => {
    if (!storage.has(storageTypeOf(raw))) return undefined;
    if (integral && isNumber(raw) && !isIntegerValue(raw)) return undefined;
    return raw;
  };
}

/**
 * The value type accepted by {@link storageAdaptor}: literal case types
 * widened to their storage category.
 */
export type StorageOf<V> = V extends number
  ? number
  : V extends string
    ? string
    : V extends boolean
      ? boolean
      : V extends bigint
        ? bigint
        : V;

/**
 * Creates an enum descriptor from a case-name → stored-value table.
 *
 * Case names are case-sensitive and kept in declaration order.
 *
 * @example
 * ```ts
 * const alignment = enumeration({ left: 0, center: 1, right: 2 });
 * resolveValue(alignment, 'center'); // 1
 * resolveValue(alignment, 2);        // 2 (adaptor path)
 * ```
 */
export function enumeration<const V>(
  cases: Readonly<Record<string, V>>,
  options: EnumOptions<V> & { adaptor: EnumAdaptor<V> }
): EnumDescriptor<V>;
export function enumeration<const V>(
  cases: Readonly<Record<string, V>>,
  options?: { label?: string }
): EnumDescriptor<StorageOf<V>>;
export function enumeration(
  cases: Readonly<Record<string, unknown>>,
  options: EnumOptions<unknown> = {}
): EnumDescriptor<unknown> {
  const table = new Map<string, unknown>(Object.entries(cases));

  return Object.freeze({
    kind: 'enum',
    optional: false,
    label: options.label ?? `enum(${[...table.keys()].join('|')})`,
    cases: table,
    adaptor: options.adaptor ?? storageAdaptor(table.values())
  });
}

/**
 * Creates a structured value descriptor (e.g. an inset or a point), resolved
 * field by field in declaration order.
 */
export function structured(
  label: string,
  fields: FieldDescriptors
): StructuredDescriptor {
  return Object.freeze({
    kind: 'structured',
    optional: false,
    label,
    fields: Object.freeze({ ...fields })
  });
}

/**
 * Creates an opaque reference descriptor checked by a type guard.
 *
 * @example
 * ```ts
 * const image = opaque('Image', (value): value is Image => value instanceof Image);
 * ```
 */
export function opaque<T>(label: string, guard: Guard<T>): OpaqueDescriptor<T> {
  return Object.freeze({
    kind: 'opaque',
    optional: false,
    label,
    check: Object.freeze({ kind: 'guard', guard })
  });
}

/**
 * Creates an opaque reference descriptor checked by a Standard Schema
 * validator. The schema must validate synchronously.
 */
export function opaqueSchema<T>(
  label: string,
  schema: StandardSchemaV1<unknown, T>
): OpaqueDescriptor<T> {
  return Object.freeze({
    kind: 'opaque',
    optional: false,
    label,
    check: Object.freeze({ kind: 'schema', schema })
  });
}

/**
 * Marks a descriptor as optional: properties typed with it may resolve to
 * the absence marker instead of failing.
 */
export function optional<D extends TypeDescriptor>(
  descriptor: D
): D & { readonly optional: true } {
  const result: D & { readonly optional: true } = { ...descriptor, optional: true };
  Object.freeze(result);
  return result;
}

/**
 * Coerces a raw value into a value satisfying `descriptor`.
 *
 * The raw value is unwrapped first (see `unwrapOrFail`); absence is
 * therefore an `UnexpectedAbsentValueError` here. Callers that accept
 * absence check it before resolving.
 *
 * @throws {TypeMismatchError} When the value's runtime type cannot satisfy
 *   the descriptor's kind.
 * @throws {UnknownEnumCaseError} When text names no case of an enum.
 */
export function resolveValue<D extends TypeDescriptor>(
  descriptor: D,
  raw: unknown
): InferValue<D>;
export function resolveValue(descriptor: TypeDescriptor, raw: unknown): unknown {
  const value = unwrapOrFail(raw);

  switch (descriptor.kind) {
    case 'boolean':
      if (isBoolean(value)) return value;
      break;

    case 'integer':
      if (isIntegerValue(value)) return value;
      break;

    case 'floating':
      if (isFiniteValue(value)) return value;
      break;

    case 'text':
      if (isString(value) || isBoolean(value) || isNumber(value) || isBigInt(value)) {
        return stringify(value);
      }
      break;

    case 'enum':
      return resolveEnum(descriptor, value);

    case 'structured':
      return resolveStructured(descriptor, value);

    case 'opaque':
      if (descriptor.check.kind === 'schema') {
        return validateWithSchema(descriptor.check.schema, value, descriptor.label);
      }
      if (descriptor.check.guard(value)) return value;
      break;
  }

  throw new TypeMismatchError(descriptor.label, value);
}

/**
 * Enum resolution rule:
 * - text is looked up as an exact case name;
 * - anything else goes through the adaptor unchanged.
 */
function resolveEnum<V>(descriptor: EnumDescriptor<V>, value: unknown): V {
  if (isString(value)) {
    const mapped = descriptor.cases.get(value);
    if (mapped !== undefined) return mapped;
    throw new UnknownEnumCaseError(value, [...descriptor.cases.keys()]);
  }

  const adapted = descriptor.adaptor(value);
  if (adapted === undefined) {
    throw new TypeMismatchError(descriptor.label, value);
  }
  return adapted;
}

/**
 * Resolves a structured value field by field.
 *
 * Failure policy:
 * - the first failing field stops resolution;
 * - the failure is reported as a `TypeMismatchError` whose `path` names the
 *   field (nested structured values prepend their own field name);
 * - fields the descriptor does not declare are rejected.
 */
function resolveStructured(
  descriptor: StructuredDescriptor,
  value: unknown
): Readonly<Record<string, unknown>> {
  if (!isPlainObject(value)) {
    throw new TypeMismatchError(descriptor.label, value);
  }

  for (const key of Object.keys(value)) {
    if (!Object.hasOwn(descriptor.fields, key)) {
      throw new TypeMismatchError(descriptor.label, value, {
        path: [key],
        receivedLabel: 'undeclared field'
      });
    }
  }

  const result: Record<string, unknown> = {};

  for (const [field, fieldDescriptor] of Object.entries(descriptor.fields)) {
    const fieldValue = value[field];

    if (isAbsent(fieldValue)) {
      if (!fieldDescriptor.optional) {
        throw new TypeMismatchError(fieldDescriptor.label, fieldValue, {
          path: [field]
        });
      }
      result[field] = ABSENT;
      continue;
    }

    try {
      result[field] = resolveValue(fieldDescriptor, fieldValue);
    } catch (error) {
      if (error instanceof TypeMismatchError) throw error.atField(field);
      if (error instanceof UnknownEnumCaseError) {
        throw new TypeMismatchError(fieldDescriptor.label, error.caseName, {
          path: [field]
        });
      }
      throw error;
    }
  }

  return Object.freeze(result);
}
