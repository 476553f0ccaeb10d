import type { TypeDescriptor } from './primitives';

/**
 * The descriptor set declared for one target type.
 *
 * Structure:
 * - `extends`:    Target type whose descriptors are inherited (like a view
 *                 subclass inheriting its superclass's properties).
 * - `properties`: Property name → descriptor. Overrides inherited entries.
 * - `exclude`:    Inherited property names that must not be settable on this
 *                 type. Excluding a name that is not present is a catalog error.
 */
export type TargetTypeDefinition = {
  extends?: string;
  properties: Readonly<Record<string, TypeDescriptor>>;
  exclude?: readonly string[];
};

/**
 * The generic constraint for catalog inference.
 *
 * - Key (`string`): the target type identifier used in templates.
 * - Value ({@link TargetTypeDefinition}): its declared descriptors.
 */
export type DescriptorCatalog = Readonly<Record<string, TargetTypeDefinition>>;

/**
 * The resolved, read-only descriptor set of one target type: own, inherited and
 * expanded sub-property descriptors, minus exclusions.
 */
export type DescriptorSet = ReadonlyMap<string, TypeDescriptor>;

/**
 * Creates a descriptor catalog with strict type inference.
 *
 * Acts as an identity function that validates the input structure against
 * {@link DescriptorCatalog} without widening the type, so the specific
 * descriptor types stay visible to downstream tooling.
 *
 * @template T - The specific catalog shape (inferred).
 * @param catalog - Target type → definition.
 * @returns The catalog object with specific types preserved.
 */
export function defineCatalog<T extends DescriptorCatalog>(catalog: T): T {
  return catalog;
}
