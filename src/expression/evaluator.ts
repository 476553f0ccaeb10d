import { is, type types } from 'estree-toolkit';
import {
  TypeMismatchError,
  UnexpectedAbsentValueError,
  UnsupportedExpressionError
} from '../errors';
import { getDottedName, isRecord } from '../guards';
import { isAbsent, unwrapOrAbsent, unwrapOrFail } from '../optional';
import type { SymbolScope } from '../symbols/symbol-table';
import { isBigInt, isNumber, isString } from '../utils/type-guards';
import { interpolationText } from './interpolation';
import { createParseCache } from './parser';
import { type EvaluationResult, NOT_HANDLED, evaluated } from './result';

/**
 * Evaluates expression source text against a symbol scope.
 *
 * The engine only needs this one method; any evaluator (a richer expression
 * language, a sandboxed interpreter, ...) can be plugged in.
 */
export type ExpressionEvaluator = {
  /**
   * @returns The value the expression evaluates to. May be absent.
   * @throws {TemplateError} For syntax errors, unsupported syntax or
   *   undefined symbols.
   */
  evaluate(source: string, scope: SymbolScope): unknown;
};

export type EstreeEvaluatorOptions = {
  /**
   * Number of parsed sources kept in the AST cache.
   * @default 500
   */
  cacheSize?: number;
};

type Evaluate = (node: types.Node) => unknown;

/**
 * Resolves `Literal` nodes: strings, numbers, booleans, bigints and `null`.
 */
function tryEvaluateLiteral(node: types.Node): EvaluationResult {
  if (is.literal(node)) {
    switch (typeof node.value) {
      case 'string':
      case 'number':
      case 'boolean':
      case 'bigint':
        return evaluated(node.value);
      case 'object':
        if (node.value === null) return evaluated(null);
        break;
    }
    // RegExp literals
    throw new UnsupportedExpressionError('RegExpLiteral');
  }
  return NOT_HANDLED;
}

/**
 * Resolves identifiers.
 *
 * `undefined`, `NaN` and `Infinity` are global constants, not symbols;
 * every other name is looked up in the scope.
 */
function tryEvaluateIdentifier(
  node: types.Node,
  scope: SymbolScope
): EvaluationResult {
  if (is.identifier(node)) {
    switch (node.name) {
      case 'undefined':
        return evaluated(undefined);
      case 'NaN':
        return evaluated(NaN);
      case 'Infinity':
        return evaluated(Infinity);
    }
    return evaluated(scope.resolve(node.name));
  }
  return NOT_HANDLED;
}

/**
 * Resolves member access.
 *
 * A static chain (`layer.cornerRadius`) is first tried as a single dotted
 * symbol, so tables can hold flattened names. Otherwise the object is
 * evaluated and the property read from it (own properties only).
 */
function tryEvaluateMember(
  node: types.Node,
  scope: SymbolScope,
  evaluate: Evaluate
): EvaluationResult {
  if (!is.memberExpression(node)) return NOT_HANDLED;

  const dotted = getDottedName(node);
  if (dotted !== null) {
    const symbol = scope.lookup(dotted);
    if (symbol.present) return evaluated(symbol.value);
  }

  if (node.object.type === 'Super') throw new UnsupportedExpressionError('Super');
  const target = unwrapOrAbsent(evaluate(node.object));
  if (!target.present) throw new UnexpectedAbsentValueError();

  let key: unknown;
  if (node.computed) {
    key = unwrapOrFail(evaluate(node.property));
  } else if (is.identifier(node.property)) {
    key = node.property.name;
  } else {
    throw new UnsupportedExpressionError(node.property.type);
  }

  if (!isString(key) && !isNumber(key)) {
    throw new TypeMismatchError('property key', key);
  }

  const object = target.value;
  if (isString(object)) {
    if (key === 'length') return evaluated(object.length);
    return evaluated(isNumber(key) ? object.charAt(key) : undefined);
  }
  if (!isRecord(object)) {
    throw new TypeMismatchError('object', object);
  }

  const name = String(key);
  return evaluated(Object.hasOwn(object, name) ? object[name] : undefined);
}

/**
 * Resolves template literals by stitching text and embedded values.
 * Absent values contribute an empty string.
 */
function tryEvaluateTemplate(
  node: types.Node,
  evaluate: Evaluate
): EvaluationResult {
  if (!is.templateLiteral(node)) return NOT_HANDLED;

  const parts: string[] = [];
  for (const [index, quasi] of node.quasis.entries()) {
    const text = quasi.value.cooked;
    if (typeof text !== 'string') {
      throw new UnsupportedExpressionError('InvalidEscapeSequence');
    }
    parts.push(text);

    const expression = node.expressions[index];
    if (expression) parts.push(interpolationText(evaluate(expression)));
  }

  return evaluated(parts.join(''));
}

/**
 * Resolves unary `-`, `+` and `!`.
 */
function tryEvaluateUnary(node: types.Node, evaluate: Evaluate): EvaluationResult {
  if (!is.unaryExpression(node)) return NOT_HANDLED;

  const operand = evaluate(node.argument);

  switch (node.operator) {
    case '!':
      return evaluated(isAbsent(operand) || !unwrapOrFail(operand));

    case '-': {
      const value = unwrapOrFail(operand);
      if (isNumber(value)) return evaluated(-value);
      if (isBigInt(value)) return evaluated(-value);
      throw new TypeMismatchError('number', value);
    }

    case '+': {
      const value = unwrapOrFail(operand);
      if (isNumber(value)) return evaluated(value);
      throw new TypeMismatchError('number', value);
    }
  }

  throw new UnsupportedExpressionError(`UnaryExpression(${node.operator})`);
}

/**
 * Resolves array literals. Holes and spreads are not supported.
 */
function tryEvaluateArray(node: types.Node, evaluate: Evaluate): EvaluationResult {
  if (!is.arrayExpression(node)) return NOT_HANDLED;

  return evaluated(
    node.elements.map(element => {
      if (element === null) throw new UnsupportedExpressionError('ArrayHole');
      if (is.spreadElement(element)) {
        throw new UnsupportedExpressionError('SpreadElement');
      }
      return evaluate(element);
    })
  );
}

/**
 * Resolves object literals into plain objects.
 *
 * Keys: identifiers, string/number literals or computed expressions
 * evaluating to text or numbers. Methods, accessors and spreads are not
 * supported.
 */
function tryEvaluateObject(node: types.Node, evaluate: Evaluate): EvaluationResult {
  if (!is.objectExpression(node)) return NOT_HANDLED;

  const result: Record<string, unknown> = {};

  for (const property of node.properties) {
    if (is.spreadElement(property)) {
      throw new UnsupportedExpressionError('SpreadElement');
    }
    if (property.kind !== 'init' || property.method) {
      throw new UnsupportedExpressionError(`Property(${property.kind})`);
    }

    let key: unknown;
    if (property.computed) {
      key = unwrapOrFail(evaluate(property.key));
    } else if (is.identifier(property.key)) {
      key = property.key.name;
    } else if (is.literal(property.key)) {
      key = property.key.value;
    }
    if (!isString(key) && !isNumber(key)) {
      throw new TypeMismatchError('property key', key);
    }

    // defineProperty keeps `__proto__` an ordinary key.
    Object.defineProperty(result, String(key), {
      value: evaluate(property.value),
      enumerable: true,
      writable: true,
      configurable: true
    });
  }

  return evaluated(result);
}

/**
 * Creates the default evaluator, backed by `meriyah` and `estree-toolkit`.
 *
 * Supported syntax:
 * - literals, `undefined`, `NaN`, `Infinity`
 * - identifiers (symbol lookup)
 * - member access (`a.b`, `a['b']`, `a[0]`)
 * - template literals
 * - unary `-`, `+`, `!`
 * - array and object literals
 *
 * Everything else (calls, arithmetic, assignment, ...) fails with
 * `UnsupportedExpressionError`.
 */
export function createEstreeEvaluator(
  options: EstreeEvaluatorOptions = {}
): ExpressionEvaluator {
  const parse = createParseCache(options.cacheSize ?? 500);

  return {
    evaluate(source, scope) {
      const evaluate: Evaluate = node => {
        let result: EvaluationResult;

        // 1. Atomic values
        if ((result = tryEvaluateLiteral(node)).handled) return result.value;
        if ((result = tryEvaluateIdentifier(node, scope)).handled) return result.value;

        // 2. Access and composition
        if ((result = tryEvaluateMember(node, scope, evaluate)).handled) return result.value;
        if ((result = tryEvaluateTemplate(node, evaluate)).handled) return result.value;
        if ((result = tryEvaluateUnary(node, evaluate)).handled) return result.value;

        // 3. Containers
        if ((result = tryEvaluateArray(node, evaluate)).handled) return result.value;
        if ((result = tryEvaluateObject(node, evaluate)).handled) return result.value;

        throw new UnsupportedExpressionError(node.type);
      };

      return evaluate(parse(source));
    }
  };
}
