import { InvalidTemplateError } from '../errors';
import { isPlainObject } from '../guards';
import type { Template } from '../types/template';
import { isArray, isString } from '../utils/type-guards';

const TEMPLATE_KEYS = new Set([
  'targetType',
  'outlet',
  'constants',
  'expressions',
  'children',
  'templatePath',
  'relativePath'
]);

function optionalString(
  record: Record<string, unknown>,
  key: string,
  path: string
): string | undefined {
  const value = record[key];
  if (value === undefined || isString(value)) return value;
  throw new InvalidTemplateError(path, `"${key}" must be a string`);
}

/**
 * Validates the runtime shape of a template tree, as handed over by a
 * parser or a loader.
 *
 * Checks:
 * 1. every node is a plain object with no unknown keys
 * 2. `targetType` is a non-empty string
 * 3. `expressions` maps names to source strings; `constants` is a plain object
 * 4. `children` is an array of templates (checked recursively)
 *
 * @param value - The candidate template.
 * @param path - Location used in error messages (`$.children[1]`).
 * @returns A fresh `Template` holding only the validated fields.
 * @throws {InvalidTemplateError} For the first violation found.
 */
export function validateTemplate(value: unknown, path = '$'): Template {
  if (!isPlainObject(value)) {
    throw new InvalidTemplateError(path, 'expected a template object');
  }

  for (const key of Object.keys(value)) {
    if (!TEMPLATE_KEYS.has(key)) {
      throw new InvalidTemplateError(path, `unknown key "${key}"`);
    }
  }

  const targetType = value.targetType;
  if (!isString(targetType) || targetType === '') {
    throw new InvalidTemplateError(path, '"targetType" must be a non-empty string');
  }

  const template: Template = { targetType };

  const outlet = optionalString(value, 'outlet', path);
  if (outlet !== undefined) template.outlet = outlet;

  const templatePath = optionalString(value, 'templatePath', path);
  if (templatePath !== undefined) template.templatePath = templatePath;

  const relativePath = optionalString(value, 'relativePath', path);
  if (relativePath !== undefined) template.relativePath = relativePath;

  if (value.constants !== undefined) {
    if (!isPlainObject(value.constants)) {
      throw new InvalidTemplateError(path, '"constants" must be a plain object');
    }
    template.constants = { ...value.constants };
  }

  if (value.expressions !== undefined) {
    if (!isPlainObject(value.expressions)) {
      throw new InvalidTemplateError(path, '"expressions" must be a plain object');
    }
    const expressions: Record<string, string> = {};
    for (const [name, source] of Object.entries(value.expressions)) {
      if (!isString(source)) {
        throw new InvalidTemplateError(path, `expression "${name}" must be a string`);
      }
      expressions[name] = source;
    }
    template.expressions = expressions;
  }

  if (value.children !== undefined) {
    if (!isArray(value.children)) {
      throw new InvalidTemplateError(path, '"children" must be an array');
    }
    template.children = value.children.map((child, index) =>
      validateTemplate(child, `${path}.children[${index}]`)
    );
  }

  return template;
}
