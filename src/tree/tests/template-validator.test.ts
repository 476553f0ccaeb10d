import { describe, expect, it, test } from 'vitest';
import { captureError } from '../../tests/helpers';
import type { FailureScenario } from '../../tests/types';
import { validateTemplate } from '../template-validator';

describe('validateTemplate', () => {
  it('returns a copy holding only the validated fields', () => {
    const input = {
      targetType: 'Label',
      outlet: 'title',
      constants: { accent: 2 },
      expressions: { text: 'Hi' },
      children: [{ targetType: 'View' }],
      templatePath: 'footer.layout',
      relativePath: 'screens'
    };

    const template = validateTemplate(input);

    expect(template).toEqual(input);
    expect(template).not.toBe(input);
    expect(template.constants).not.toBe(input.constants);
  });

  it('omits fields that are not set', () => {
    expect(Object.keys(validateTemplate({ targetType: 'View' }))).toEqual([
      'targetType'
    ]);
  });

  const failures: FailureScenario<unknown>[] = [
    {
      id: 'NotObject',
      description: 'Templates are plain objects',
      input: 'Label',
      code: 'INVALID_TEMPLATE',
      message: 'Invalid template at "$": expected a template object'
    },
    {
      id: 'UnknownKey',
      description: 'Unknown keys are rejected',
      input: { targetType: 'Label', style: 'bold' },
      code: 'INVALID_TEMPLATE',
      message: 'Invalid template at "$": unknown key "style"'
    },
    {
      id: 'MissingType',
      description: 'The target type is required',
      input: { outlet: 'title' },
      code: 'INVALID_TEMPLATE',
      message: 'Invalid template at "$": "targetType" must be a non-empty string'
    },
    {
      id: 'EmptyType',
      description: 'The target type cannot be empty',
      input: { targetType: '' },
      code: 'INVALID_TEMPLATE',
      message: 'Invalid template at "$": "targetType" must be a non-empty string'
    },
    {
      id: 'Outlet',
      description: 'Outlets are strings',
      input: { targetType: 'Label', outlet: 3 },
      code: 'INVALID_TEMPLATE',
      message: 'Invalid template at "$": "outlet" must be a string'
    },
    {
      id: 'Constants',
      description: 'Constants are a plain object',
      input: { targetType: 'Label', constants: [1] },
      code: 'INVALID_TEMPLATE',
      message: 'Invalid template at "$": "constants" must be a plain object'
    },
    {
      id: 'ExpressionValue',
      description: 'Expression sources are strings',
      input: { targetType: 'Label', expressions: { numberOfLines: 2 } },
      code: 'INVALID_TEMPLATE',
      message: 'Invalid template at "$": expression "numberOfLines" must be a string'
    },
    {
      id: 'Children',
      description: 'Children are an array',
      input: { targetType: 'Stack', children: { targetType: 'Label' } },
      code: 'INVALID_TEMPLATE',
      message: 'Invalid template at "$": "children" must be an array'
    },
    {
      id: 'NestedChild',
      description: 'Child failures carry their path',
      input: {
        targetType: 'Stack',
        children: [{ targetType: 'Label' }, { targetType: 'Stack', children: [{}] }]
      },
      code: 'INVALID_TEMPLATE',
      message:
        'Invalid template at "$.children[1].children[0]": "targetType" must be a non-empty string'
    }
  ];

  test.for(failures)('[$id] $description', ({ input, code, message }) => {
    const error = captureError(() => validateTemplate(input));
    expect(error.code).toBe(code);
    expect(error.message).toBe(message);
  });
});
