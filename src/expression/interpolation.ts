import { ExpressionSyntaxError, TypeMismatchError } from '../errors';
import { unwrapOrAbsent } from '../optional';
import { stringify } from '../utils/stringify';
import { isBigInt, isBoolean, isNumber, isString } from '../utils/type-guards';

/**
 * One piece of a text source.
 *
 * - `text`:       literal characters, escapes already applied
 * - `expression`: the source between a `{` and its matching `}`
 */
export type Segment =
  | { kind: 'text'; text: string }
  | { kind: 'expression'; source: string };

/**
 * Splits a text source into literal and expression segments.
 *
 * Syntax:
 * - `{expr}` embeds an expression (braces inside it must balance; braces
 *   inside quoted strings are ignored)
 * - `{{` and `}}` stand for literal `{` and `}`
 *
 * Adjacent literal characters are merged into one segment, and empty
 * sources produce no segments.
 *
 * @example
 * ```ts
 * parseInterpolation('Hi {user.name}!');
 * // [ { kind: 'text', text: 'Hi ' },
 * //   { kind: 'expression', source: 'user.name' },
 * //   { kind: 'text', text: '!' } ]
 * ```
 *
 * @throws {ExpressionSyntaxError} On an unterminated `{`, a stray `}` or an
 *   empty `{}`.
 */
export function parseInterpolation(source: string): Segment[] {
  const segments: Segment[] = [];
  let text = '';
  let index = 0;

  const flushText = () => {
    if (text) segments.push({ kind: 'text', text });
    text = '';
  };

  while (index < source.length) {
    const char = source.charAt(index);
    const next = source.charAt(index + 1);

    if ((char === '{' && next === '{') || (char === '}' && next === '}')) {
      text += char;
      index += 2;
      continue;
    }

    if (char === '}') {
      throw new ExpressionSyntaxError(source, `unmatched "}" at ${index}`);
    }

    if (char !== '{') {
      text += char;
      index += 1;
      continue;
    }

    const end = findClosingBrace(source, index);
    if (end === -1) {
      throw new ExpressionSyntaxError(source, `unterminated "{" at ${index}`);
    }

    const expression = source.slice(index + 1, end).trim();
    if (!expression) {
      throw new ExpressionSyntaxError(source, `empty expression at ${index}`);
    }

    flushText();
    segments.push({ kind: 'expression', source: expression });
    index = end + 1;
  }

  flushText();
  return segments;
}

/**
 * Returns the index of the `}` closing the `{` at `open`, or -1.
 */
function findClosingBrace(source: string, open: number): number {
  let depth = 0;
  let quote: string | null = null;

  for (let index = open; index < source.length; index++) {
    const char = source.charAt(index);

    if (quote) {
      if (char === '\\') index++;
      else if (char === quote) quote = null;
      continue;
    }

    if (char === '"' || char === "'" || char === '`') quote = char;
    else if (char === '{') depth++;
    else if (char === '}' && --depth === 0) return index;
  }

  return -1;
}

/**
 * Text form of a value embedded in an interpolated string.
 *
 * Absent values contribute nothing; scalars are stringified; anything else
 * is a mismatch.
 */
export function interpolationText(value: unknown): string {
  const result = unwrapOrAbsent(value);
  if (!result.present) return '';

  const inner = result.value;
  if (isString(inner) || isBoolean(inner) || isNumber(inner) || isBigInt(inner)) {
    return stringify(inner);
  }
  throw new TypeMismatchError('text', inner);
}

/**
 * Evaluates an interpolated text source.
 *
 * A source made of exactly one `{expr}` yields the evaluated value itself
 * (not its text), so absence and non-text values reach descriptor
 * resolution unchanged. Every other source yields a string.
 */
export function interpolate(
  segments: readonly Segment[],
  evaluate: (source: string) => unknown
): unknown {
  const [only] = segments;
  if (segments.length === 1 && only?.kind === 'expression') {
    return evaluate(only.source);
  }

  return segments
    .map(segment =>
      segment.kind === 'text' ? segment.text : interpolationText(evaluate(segment.source))
    )
    .join('');
}
