import { type types, is } from 'estree-toolkit';

/**
 * Narrowing helper for "object-like" values.
 *
 * Many type guards start from `unknown`. This helper provides a safe first step:
 * it checks that the value is a non-null object so properties can be read without
 * runtime errors and without type assertions.
 *
 * @param value
 *   Unknown value to test.
 * @returns
 *   `true` if `value` is a non-null object; otherwise `false`.
 */
export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null;
}

/**
 * Determines whether a value is a "plain object" (a simple POJO / dictionary
 * object).
 *
 * A value is considered plain if all of the following are true:
 * 1. It is not `null`.
 * 2. `typeof value === "object"`.
 * 3. Its prototype is either:
 *    - `Object.prototype` (typical object literals / `new Object()`), or
 *    - `null` (objects created via `Object.create(null)`).
 *
 * Structured descriptor values and template dictionaries (`constants`,
 * `expressions`) must be plain: class instances, Maps and arrays carry
 * behavior or ordering the field-by-field resolution cannot see.
 *
 * @typeParam T
 *   The (assumed) type of the object's property values after a successful check.
 * @param value
 *   The value to test.
 * @returns
 *   `true` if `value` is a plain object; otherwise `false`.
 */
export function isPlainObject<T = unknown>(
  value: unknown
): value is Record<string, T> {
  if (typeof value !== 'object' || value === null) return false;

  const proto = Object.getPrototypeOf(value);
  return proto === null || proto === Object.prototype;
}

/**
 * Checks whether a runtime value is "node-like" enough to be treated as an
 * ESTree node for the purpose of `estree-toolkit` type guards.
 *
 * This is a shallow bridge guard between the parser's output and the toolkit:
 * - ensures the value is an object (not null)
 * - excludes arrays
 * - ensures a string `type` discriminator exists
 *
 * @param value
 *   Runtime value to validate.
 * @returns
 *   `true` if `value` has the minimal shape of an ESTree node; otherwise `false`.
 *   When `true`, TypeScript narrows `value` to `types.Node`.
 */
export function isNodeLike(value: unknown): value is types.Node {
  return (
    isRecord(value) && !Array.isArray(value) && typeof value.type === 'string'
  );
}

/**
 * Checks whether an expression is a plain identifier chain such as
 * `layer.cornerRadius` (no computed access, no calls).
 *
 * @param node
 *   Candidate expression node.
 * @returns
 *   The dotted name when the chain is static; otherwise `null`.
 */
export function getDottedName(node: types.Node): string | null {
  if (is.identifier(node)) return node.name;

  if (is.memberExpression(node) && !node.computed && is.identifier(node.property)) {
    const objectName = getDottedName(node.object);
    return objectName === null ? null : `${objectName}.${node.property.name}`;
  }

  return null;
}
