import type { StandardSchemaV1 } from '@standard-schema/spec';

/**
 * Primitive descriptor kinds.
 *
 * Role: Coercion target.
 * Each kind names the runtime representation a resolved value must have:
 * - `boolean`:  `true` / `false`
 * - `integer`:  finite integral `number`
 * - `floating`: finite `number`
 * - `text`:     `string`
 */
export type PrimitiveKind = 'boolean' | 'integer' | 'floating' | 'text';

/**
 * Every descriptor kind understood by the resolver.
 */
export type DescriptorKind = PrimitiveKind | 'structured' | 'enum' | 'opaque';

/**
 * Fields shared by every descriptor.
 *
 * @template K - The discriminant.
 * @template T - The coerced value type (phantom; never present at runtime).
 */
export type DescriptorBase<K extends DescriptorKind, T> = {
  readonly kind: K;

  /**
   * Whether an absent value is a legal outcome for properties typed with this
   * descriptor. Required descriptors turn absence into a
   * `MissingRequiredValueError`.
   */
  readonly optional: boolean;

  /**
   * Human-readable name of the accepted shape, used in mismatch messages
   * (e.g. `"integer"`, `"enum(left|right)"`, `"EdgeInsets"`).
   */
  readonly label: string;

  /**
   * Type-level carrier for the coerced value type.
   * Always `undefined` at runtime.
   */
  readonly '~value'?: T;
};

export type BooleanDescriptor = DescriptorBase<'boolean', boolean>;
export type IntegerDescriptor = DescriptorBase<'integer', number>;
export type FloatingDescriptor = DescriptorBase<'floating', number>;
export type TextDescriptor = DescriptorBase<'text', string>;

export type PrimitiveDescriptor =
  | BooleanDescriptor
  | IntegerDescriptor
  | FloatingDescriptor
  | TextDescriptor;

/**
 * Converts an already-resolved raw value (e.g. an integer read from a
 * constant) into the canonical enum value.
 *
 * Returns `undefined` when the raw value cannot represent a case.
 */
export type EnumAdaptor<V> = (raw: unknown) => V | undefined;

export type EnumDescriptor<V = unknown> = DescriptorBase<'enum', V> & {
  /** Case name → stored value, in declaration order. Case-sensitive. */
  readonly cases: ReadonlyMap<string, V>;
  readonly adaptor: EnumAdaptor<V>;
};

/**
 * Field descriptors of a structured value, in declaration order.
 */
export type FieldDescriptors = Readonly<Record<string, TypeDescriptor>>;

export type StructuredDescriptor = DescriptorBase<
  'structured',
  Readonly<Record<string, unknown>>
> & {
  readonly fields: FieldDescriptors;
};

/**
 * How an opaque reference is checked.
 *
 * - `guard`:  a type predicate (e.g. an `instanceof` check).
 * - `schema`: any Standard Schema V1 validator (Zod, Valibot, ArkType, ...).
 *   Must validate synchronously.
 */
export type OpaqueCheck<T> =
  | { readonly kind: 'guard'; readonly guard: (value: unknown) => value is T }
  | { readonly kind: 'schema'; readonly schema: StandardSchemaV1<unknown, T> };

export type OpaqueDescriptor<T = unknown> = DescriptorBase<'opaque', T> & {
  readonly check: OpaqueCheck<T>;
};

/**
 * The accepted shape of a value for a named property.
 *
 * Immutable once created (every factory freezes its result) and safe to
 * share between all nodes of a target type.
 */
export type TypeDescriptor =
  | PrimitiveDescriptor
  | EnumDescriptor
  | StructuredDescriptor
  | OpaqueDescriptor;
