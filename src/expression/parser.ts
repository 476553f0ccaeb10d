import { is, type types } from 'estree-toolkit';
import { parse } from 'meriyah';
import { ExpressionSyntaxError } from '../errors';
import { isNodeLike } from '../guards';

/**
 * Parses expression source text into a single ESTree expression node.
 *
 * Implementation detail:
 * - wraps the input in parentheses so object literals parse as expressions
 * - validates the returned AST shape:
 *   Program -> exactly one ExpressionStatement -> its `expression`
 *
 * @throws {ExpressionSyntaxError} If the text is not one valid expression.
 */
export function parseExpression(source: string): types.Expression {
  let ast: unknown;
  try {
    ast = parse(`(${source})`);
  } catch (error) {
    throw new ExpressionSyntaxError(
      source,
      error instanceof Error ? error.message : String(error)
    );
  }

  if (!isNodeLike(ast) || !is.program(ast)) {
    throw new ExpressionSyntaxError(source, 'parser did not produce a program');
  }

  const [first, ...rest] = ast.body;
  if (!first || rest.length > 0 || !is.expressionStatement(first)) {
    throw new ExpressionSyntaxError(source, 'expected a single expression');
  }

  return first.expression;
}

/**
 * Memoizes {@link parseExpression} per source string.
 *
 * Expressions are re-evaluated on every state change but rarely change
 * themselves; the cache keeps the AST of the most recently parsed sources.
 * When full, the oldest entry is evicted. Parse failures are not cached.
 */
export function createParseCache(
  maxEntries: number
): (source: string) => types.Expression {
  const cache = new Map<string, types.Expression>();

  return source => {
    const hit = cache.get(source);
    if (hit) return hit;

    const node = parseExpression(source);
    if (cache.size >= maxEntries) {
      const oldest = cache.keys().next();
      if (!oldest.done) cache.delete(oldest.value);
    }
    cache.set(source, node);
    return node;
  };
}
