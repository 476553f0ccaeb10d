import { resolveValue } from '../descriptors';
import {
  MissingRequiredValueError,
  TemplateError,
  TypeMismatchError,
  UnknownPropertyError
} from '../errors';
import { ABSENT, isAbsent } from '../optional';
import type { SymbolScope } from '../symbols/symbol-table';
import type { InferResolved } from '../types/inference';
import type { EnumDescriptor, TypeDescriptor } from '../types/primitives';
import type { DescriptorSet } from '../types/registry';
import type { PropertySource } from '../types/template';
import type { ExpressionEvaluator } from './evaluator';
import { interpolate, parseInterpolation } from './interpolation';

/**
 * Everything expression resolution needs besides the property itself.
 */
export type ResolutionContext = {
  /** Tagged onto every error raised while resolving. */
  targetType: string;
  evaluator: ExpressionEvaluator;
  /**
   * Prefix that forces an enum source to be read as an expression.
   * @default '@'
   */
  symbolPrefix?: string;
};

const INTEGER_LITERAL = /^[+-]?\d+$/;
const FLOATING_LITERAL = /^[+-]?(?:\d+\.?\d*|\.\d+)(?:[eE][+-]?\d+)?$/;

/**
 * Step 1: literal fast path.
 *
 * Sources that already spell a value of the descriptor's primitive kind are
 * converted directly, without consulting the symbol table.
 */
function literalValue(
  descriptor: TypeDescriptor,
  source: string
): { matched: true; value: unknown } | { matched: false } {
  const text = source.trim();

  switch (descriptor.kind) {
    case 'integer':
      if (INTEGER_LITERAL.test(text)) {
        const value = Number(text);
        if (!Number.isSafeInteger(value)) {
          throw new TypeMismatchError('integer', value, {
            receivedLabel: `unsafe integer ${text}`
          });
        }
        return { matched: true, value };
      }
      break;
    case 'floating':
      if (FLOATING_LITERAL.test(text)) return { matched: true, value: Number(text) };
      break;
    case 'boolean':
      if (text === 'true' || text === 'false') {
        return { matched: true, value: text === 'true' };
      }
      break;
  }

  return { matched: false };
}

/**
 * Produces the raw (uncoerced) value of an enum source.
 *
 * Precedence for text that is not prefixed:
 * 1. an exact case name wins, even if a symbol has the same spelling;
 * 2. otherwise the text is evaluated as an expression, so an unknown bare
 *    name is an undefined symbol.
 */
function enumSource(
  descriptor: EnumDescriptor,
  source: string,
  table: SymbolScope,
  context: ResolutionContext
): unknown {
  const text = source.trim();
  const prefix = context.symbolPrefix ?? '@';
  if (prefix && text.startsWith(prefix)) {
    return context.evaluator.evaluate(text.slice(prefix.length), table);
  }

  if (descriptor.cases.has(text)) return text;

  return context.evaluator.evaluate(source, table);
}

function rawValue(
  source: PropertySource,
  descriptor: TypeDescriptor,
  table: SymbolScope,
  context: ResolutionContext
): unknown {
  if (typeof source !== 'string') return source.value;

  if (descriptor.kind === 'text') {
    return interpolate(parseInterpolation(source), expression =>
      context.evaluator.evaluate(expression, table)
    );
  }

  const literal = literalValue(descriptor, source);
  if (literal.matched) return literal.value;

  if (descriptor.kind === 'enum') {
    return enumSource(descriptor, source, table, context);
  }

  return context.evaluator.evaluate(source, table);
}

/**
 * Evaluates a property source and coerces the result into the descriptor's
 * type.
 *
 * Algorithm:
 * 1. literal fast path (digits for integers, numerals for floats,
 *    `true`/`false`, plain text for text properties)
 * 2. enum case names, then expressions, via the evaluator
 * 3. absence after unwrapping: `ABSENT` for optional descriptors,
 *    `MissingRequiredValueError` otherwise
 * 4. descriptor resolution (`resolveValue`)
 *
 * Every `TemplateError` leaving this function carries `propertyName` and
 * `targetType`. Evaluation is pure: the same inputs give the same value or
 * the same error.
 */
export function evaluate<D extends TypeDescriptor>(
  propertyName: string,
  source: PropertySource,
  descriptor: D,
  table: SymbolScope,
  context: ResolutionContext
): InferResolved<D>;
export function evaluate(
  propertyName: string,
  source: PropertySource,
  descriptor: TypeDescriptor,
  table: SymbolScope,
  context: ResolutionContext
): unknown {
  try {
    const raw = rawValue(source, descriptor, table, context);

    if (isAbsent(raw)) {
      if (descriptor.optional) return ABSENT;
      throw new MissingRequiredValueError(propertyName);
    }

    return resolveValue(descriptor, raw);
  } catch (error) {
    if (error instanceof TemplateError) {
      throw error.withContext({ propertyName, targetType: context.targetType });
    }
    throw error;
  }
}

/**
 * Looks up the descriptor of `propertyName` in a target type's descriptor
 * set and evaluates the source against it.
 *
 * @throws {UnknownPropertyError} If the target type has no such property.
 */
export function resolveProperty(
  propertyName: string,
  source: PropertySource,
  descriptors: DescriptorSet,
  table: SymbolScope,
  context: ResolutionContext
): unknown {
  const descriptor = descriptors.get(propertyName);
  if (!descriptor) {
    throw new UnknownPropertyError(context.targetType, propertyName);
  }
  return evaluate(propertyName, source, descriptor, table, context);
}
