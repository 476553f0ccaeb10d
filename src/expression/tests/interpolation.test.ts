import { describe, expect, it, test } from 'vitest';
import { ABSENT, some } from '../../optional';
import { captureError } from '../../tests/helpers';
import type { FailureScenario, TestScenario } from '../../tests/types';
import {
  type Segment,
  interpolate,
  interpolationText,
  parseInterpolation
} from '../interpolation';

describe('parseInterpolation', () => {
  const scenarios: TestScenario<string, Segment[]>[] = [
    {
      id: 'Plain',
      description: 'Text without braces is one literal segment',
      input: 'Hello',
      expected: [{ kind: 'text', text: 'Hello' }]
    },
    {
      id: 'Empty',
      description: 'An empty source produces no segments',
      input: '',
      expected: []
    },
    {
      id: 'Mixed',
      description: 'Literals and expressions alternate',
      input: 'Hi {user.name}!',
      expected: [
        { kind: 'text', text: 'Hi ' },
        { kind: 'expression', source: 'user.name' },
        { kind: 'text', text: '!' }
      ]
    },
    {
      id: 'Only',
      description: 'Expression text is trimmed',
      input: '{ count }',
      expected: [{ kind: 'expression', source: 'count' }]
    },
    {
      id: 'Escapes',
      description: 'Doubled braces are literal and merge with adjacent text',
      input: '{{a}} {b}',
      expected: [
        { kind: 'text', text: '{a} ' },
        { kind: 'expression', source: 'b' }
      ]
    },
    {
      id: 'NestedBraces',
      description: 'Balanced braces inside an expression belong to it',
      input: '{ {a: 1}.a }',
      expected: [{ kind: 'expression', source: '{a: 1}.a' }]
    },
    {
      id: 'QuotedBrace',
      description: 'Braces inside quoted strings are ignored',
      input: "{'}'}",
      expected: [{ kind: 'expression', source: "'}'" }]
    }
  ];

  test.for(scenarios)('[$id] $description', ({ input, expected }) => {
    expect(parseInterpolation(input)).toEqual(expected);
  });

  const failures: FailureScenario[] = [
    {
      id: 'Unterminated',
      description: 'An opening brace needs a closing one',
      input: 'a {b',
      code: 'EXPRESSION_SYNTAX',
      message: 'Invalid expression "a {b": unterminated "{" at 2'
    },
    {
      id: 'Stray',
      description: 'A single closing brace is rejected',
      input: 'a } b',
      code: 'EXPRESSION_SYNTAX',
      message: 'Invalid expression "a } b": unmatched "}" at 2'
    },
    {
      id: 'EmptyExpression',
      description: 'Braces must contain an expression',
      input: 'x{ }',
      code: 'EXPRESSION_SYNTAX',
      message: 'Invalid expression "x{ }": empty expression at 1'
    }
  ];

  test.for(failures)('[$id] $description', ({ input, code, message }) => {
    const error = captureError(() => parseInterpolation(input));
    expect(error.code).toBe(code);
    expect(error.message).toBe(message);
  });
});

describe('interpolate', () => {
  const values: Record<string, unknown> = {
    name: 'Ada',
    count: 3,
    missing: ABSENT,
    point: { x: 1 }
  };
  const lookup = (source: string) => values[source];

  it('passes the raw value of a lone expression through', () => {
    expect(interpolate(parseInterpolation('{count}'), lookup)).toBe(3);
    expect(interpolate(parseInterpolation('{point}'), lookup)).toEqual({ x: 1 });
  });

  it('joins literals and stringified values', () => {
    expect(interpolate(parseInterpolation('{name} has {count}'), lookup)).toBe(
      'Ada has 3'
    );
  });

  it('renders absent values as nothing', () => {
    expect(interpolate(parseInterpolation('[{missing}]'), lookup)).toBe('[]');
  });

  it('rejects objects embedded in text', () => {
    expect(() => interpolate(parseInterpolation('at {point}'), lookup)).toThrow(
      'Type mismatch: expected text, received object'
    );
  });
});

describe('interpolationText', () => {
  it('unwraps optional layers', () => {
    expect(interpolationText(some(some(false)))).toBe('false');
    expect(interpolationText(some(null))).toBe('');
  });
});
