import type { StandardSchemaV1 } from '@standard-schema/spec';
import { TemplateError, TypeMismatchError } from '../errors';

/**
 * Validates a raw value with a Standard Schema V1 compliant validator.
 *
 * Backs opaque descriptors created with `opaqueSchema`, so property values
 * can be checked with Zod, Valibot, ArkType and others without
 * library-specific adapters.
 *
 * About `~standard`:
 * The universal adapter returns a result object (`{ value }` or
 * `{ issues }`) instead of throwing, which keeps handling consistent across
 * libraries.
 *
 * @param schema - The schema instance (must contain `~standard`).
 * @param raw - The unwrapped value to check.
 * @param label - Descriptor label used in error messages.
 * @returns The validated (and potentially transformed) value.
 *
 * @throws
 * - `TemplateError` (`INVALID_SCHEMA`) if the object is not a Standard Schema.
 * - `TemplateError` (`ASYNC_SCHEMA`) if the validator returns a Promise.
 * - `TypeMismatchError` if validation reports issues; the first issue's path
 *   becomes the mismatch path.
 */
export function validateWithSchema<Output>(
  schema: StandardSchemaV1<unknown, Output>,
  raw: unknown,
  label: string
): Output {
  // Guards against plain objects being configured as schemas.
  if (!('~standard' in schema)) {
    throw new TemplateError(
      'INVALID_SCHEMA',
      `The schema for "${label}" is invalid. Expected an object with the "~standard" property (e.g. Zod, Valibot).`
    );
  }

  const result = schema['~standard'].validate(raw);

  // Property resolution is strictly synchronous.
  if (result instanceof Promise) {
    throw new TemplateError(
      'ASYNC_SCHEMA',
      `Async schema validation is not supported for "${label}".`
    );
  }

  const [firstIssue] = result.issues ?? [];
  if (firstIssue) {
    const path = (firstIssue.path ?? []).map(segment =>
      typeof segment === 'object' ? String(segment.key) : String(segment)
    );
    throw new TypeMismatchError(label, raw, {
      path,
      receivedLabel: `value rejected (${firstIssue.message})`
    });
  }

  if (result.issues === undefined) {
    return result.value;
  }

  throw new TypeMismatchError(label, raw);
}
