import type { DescriptorBase, DescriptorKind, TypeDescriptor } from './primitives';
import type { Absent } from '../optional';

/**
 * Extracts the coerced value type carried by a descriptor.
 *
 * Logic:
 * Reads the phantom `~value` slot of {@link DescriptorBase}.
 *
 * @example
 * ```ts
 * const align = enumeration({ left: 0, right: 1 });
 * type Align = InferValue<typeof align>; // 0 | 1
 * ```
 */
export type InferValue<D extends TypeDescriptor> =
  D extends DescriptorBase<DescriptorKind, infer T> ? T : never;

/**
 * The result type of resolving a property typed with `D`.
 *
 * Optional descriptors may resolve to the absence marker; required ones
 * never do (absence is an error).
 */
export type InferResolved<D extends TypeDescriptor> = D extends {
  optional: true;
}
  ? InferValue<D> | Absent
  : InferValue<D>;
