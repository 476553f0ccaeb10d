import { DescriptorRegistryError, UnknownPropertyError } from '../errors';
import type { StructuredDescriptor, TypeDescriptor } from '../types/primitives';
import type { DescriptorCatalog, DescriptorSet } from '../types/registry';

/**
 * Read-only access to the descriptor sets of a catalog.
 *
 * Each target type's set is computed on first use and then shared by every
 * node of that type for the registry's lifetime.
 */
export type DescriptorRegistry = {
  /** Whether the catalog declares `targetType`. */
  has(targetType: string): boolean;

  /**
   * The descriptor for `propertyName` on `targetType`, or `undefined` if the
   * type has no such property (or the property is excluded).
   *
   * @throws {DescriptorRegistryError} For unknown target types.
   */
  lookup(targetType: string, propertyName: string): TypeDescriptor | undefined;

  /**
   * Like {@link lookup}, but fails for unknown properties.
   *
   * @throws {UnknownPropertyError}
   */
  require(targetType: string, propertyName: string): TypeDescriptor;

  /**
   * The full descriptor set of `targetType`: inherited entries, own
   * entries, expanded sub-properties, minus exclusions.
   */
  descriptorsFor(targetType: string): DescriptorSet;
};

/**
 * Read-only view over a built descriptor map. The view is the only
 * reference handed out, so a shared set cannot be changed by a caller.
 */
class ReadonlyDescriptorSet implements DescriptorSet {
  private readonly entryMap: Map<string, TypeDescriptor>;

  constructor(entries: Map<string, TypeDescriptor>) {
    this.entryMap = entries;
    Object.freeze(this);
  }

  get size(): number {
    return this.entryMap.size;
  }

  get(name: string): TypeDescriptor | undefined {
    return this.entryMap.get(name);
  }

  has(name: string): boolean {
    return this.entryMap.has(name);
  }

  forEach(
    callback: (value: TypeDescriptor, key: string, set: DescriptorSet) => void,
    thisArg?: unknown
  ): void {
    this.entryMap.forEach((value, key) => callback.call(thisArg, value, key, this));
  }

  keys() {
    return this.entryMap.keys();
  }

  values() {
    return this.entryMap.values();
  }

  entries() {
    return this.entryMap.entries();
  }

  [Symbol.iterator]() {
    return this.entryMap[Symbol.iterator]();
  }
}

/**
 * Creates an explicit registry over a descriptor catalog.
 *
 * Set construction for one target type:
 * 1. Start from the resolved set of `extends` (if any).
 * 2. Apply own `properties`; an own entry replaces the inherited one and
 *    drops sub-properties derived from it.
 * 3. Expand structured descriptors into dotted sub-properties
 *    (`layoutMargins` → `layoutMargins.top`, ...), unless declared explicitly.
 * 4. Remove `exclude`d names together with their sub-properties.
 *
 * @example
 * ```ts
 * const registry = createDescriptorRegistry(defineCatalog({
 *   View: { properties: { hidden: booleanType, layoutMargins: insets } },
 *   Label: { extends: 'View', properties: { text: textType } }
 * }));
 * registry.lookup('Label', 'layoutMargins.top'); // floatingType
 * ```
 */
export function createDescriptorRegistry(
  catalog: DescriptorCatalog
): DescriptorRegistry {
  const cache = new Map<string, DescriptorSet>();

  function build(targetType: string, chain: readonly string[]): DescriptorSet {
    const cached = cache.get(targetType);
    if (cached) return cached;

    if (chain.includes(targetType)) {
      throw new DescriptorRegistryError(
        `Inheritance cycle: ${[...chain, targetType].join(' -> ')}`
      );
    }

    const definition = Object.hasOwn(catalog, targetType)
      ? catalog[targetType]
      : undefined;
    if (!definition) {
      throw new DescriptorRegistryError(
        chain.length > 0
          ? `Unknown target type "${targetType}" (extended by "${chain.at(-1)}")`
          : `Unknown target type "${targetType}"`
      );
    }

    const set = new Map<string, TypeDescriptor>(
      definition.extends === undefined
        ? []
        : build(definition.extends, [...chain, targetType])
    );

    for (const [name, descriptor] of Object.entries(definition.properties)) {
      removeSubProperties(set, name);
      set.set(name, descriptor);
    }

    for (const [name, descriptor] of [...set]) {
      if (descriptor.kind === 'structured') expand(set, name, descriptor);
    }

    for (const name of definition.exclude ?? []) {
      if (!set.delete(name)) {
        throw new DescriptorRegistryError(
          `"${targetType}" excludes "${name}", which it does not have`
        );
      }
      removeSubProperties(set, name);
    }

    const view = new ReadonlyDescriptorSet(set);
    cache.set(targetType, view);
    return view;
  }

  const descriptorsFor = (targetType: string): DescriptorSet =>
    build(targetType, []);

  return {
    has: targetType => Object.hasOwn(catalog, targetType),

    descriptorsFor,

    lookup: (targetType, propertyName) =>
      descriptorsFor(targetType).get(propertyName),

    require(targetType, propertyName) {
      const descriptor = descriptorsFor(targetType).get(propertyName);
      if (!descriptor) {
        throw new UnknownPropertyError(targetType, propertyName);
      }
      return descriptor;
    }
  };
}

function expand(
  set: Map<string, TypeDescriptor>,
  name: string,
  descriptor: StructuredDescriptor
): void {
  for (const [field, fieldDescriptor] of Object.entries(descriptor.fields)) {
    const key = `${name}.${field}`;
    if (!set.has(key)) set.set(key, fieldDescriptor);
    if (fieldDescriptor.kind === 'structured') {
      expand(set, key, fieldDescriptor);
    }
  }
}

function removeSubProperties(set: Map<string, TypeDescriptor>, name: string): void {
  const prefix = `${name}.`;
  for (const key of [...set.keys()]) {
    if (key.startsWith(prefix)) set.delete(key);
  }
}
