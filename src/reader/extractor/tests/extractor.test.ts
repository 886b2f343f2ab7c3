import { describe, expect, test } from 'vitest';

import type { TestScenario } from '../../../test-utils/scenario';
import { ConfigurationError } from '../../../errors';
import { extractStaticValue, formatPath } from '..';
import { getExpressionNode } from './estree-utils';

/**
 * Test suite: strict static extraction of configuration literals.
 *
 * Coverage:
 * - Static containers and key forms.
 * - Every dynamic construct is rejected with a labelled error.
 * - Path labels.
 */
describe('Static Extraction', () => {
  const extract = (code: string) => extractStaticValue(getExpressionNode(code), 'Point.jsonKeys');

  describe('Static Containers', () => {
    const scenarios: TestScenario[] = [
      {
        id: 'Array of Primitives',
        description: 'Static array of primitives',
        code: '[1, "a", true]',
        expected: [1, 'a', true]
      },
      {
        id: 'Nested Objects',
        description: 'Nested static objects',
        code: '{ y: { name: "why", includeFromJson: false } }',
        expected: { y: { name: 'why', includeFromJson: false } }
      },
      {
        id: 'Key Forms',
        description: 'Identifier, string literal, computed and numeric keys',
        code: '{ a: 1, "b-c": 2, ["d"]: 3, 4: 5 }',
        expected: { a: 1, 'b-c': 2, d: 3, '4': 5 }
      },
      {
        id: 'Mixed Nesting',
        description: 'Arrays inside objects inside arrays',
        code: '[{ tags: ["x", -1] }]',
        expected: [{ tags: ['x', -1] }]
      },
      {
        id: 'Empty',
        description: 'Empty containers',
        code: '{ list: [], map: {} }',
        expected: { list: [], map: {} }
      }
    ];

    test.for(scenarios)('[$id] $description', ({ code, expected }) => {
      expect(extract(code)).toEqual(expected);
    });
  });

  describe('Dynamic Values', () => {
    const scenarios: TestScenario<string>[] = [
      {
        id: 'Identifier',
        description: 'Variable reference at the root',
        code: 'options',
        expected: '"Point.jsonKeys" must be a static value: Identifier is evaluated at runtime.'
      },
      {
        id: 'Nested Call',
        description: 'Call nested in an object',
        code: '{ y: { defaultValue: compute() } }',
        expected:
          '"Point.jsonKeys.y.defaultValue" must be a static value: CallExpression is evaluated at runtime.'
      },
      {
        id: 'Array Hole',
        description: 'Elision in an array',
        code: '{ tags: [1, , 2] }',
        expected: '"Point.jsonKeys.tags[1]" must be a static value: array holes are not supported.'
      },
      {
        id: 'Array Spread',
        description: 'Spread in an array',
        code: '[...rest]',
        expected: '"Point.jsonKeys[0]" must be a static value: spread elements are not supported.'
      },
      {
        id: 'Object Spread',
        description: 'Spread in an object',
        code: '{ ...base }',
        expected: '"Point.jsonKeys" must be a static value: spread elements are not supported.'
      },
      {
        id: 'Computed Key',
        description: 'Key resolved at runtime',
        code: '{ [key]: 1 }',
        expected: '"Point.jsonKeys" must be a static value: property keys must be static.'
      },
      {
        id: 'Method',
        description: 'Method shorthand',
        code: '{ y() { return 1; } }',
        expected: '"Point.jsonKeys.y" must be a static value: methods and accessors are not supported.'
      }
    ];

    test.for(scenarios)('[$id] $description', ({ code, expected }) => {
      expect(() => extract(code)).toThrow(ConfigurationError);
      expect(() => extract(code)).toThrow(expected);
    });
  });

  test('labels the offending element on the error', () => {
    try {
      extract('{ y: { name: label } }');
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(ConfigurationError);
      expect(error instanceof ConfigurationError && error.element).toBe(
        'Point.jsonKeys.y.name'
      );
    }
  });

  test('keeps a "__proto__" key as an own property', () => {
    const value = extract('{ "__proto__": { name: "parent" } }');

    expect(Object.getPrototypeOf(value)).toBe(Object.prototype);
    expect(Object.getOwnPropertyDescriptor(value, '__proto__')?.value).toEqual({ name: 'parent' });
  });

  test('formats string and numeric path segments', () => {
    expect(formatPath('Point.jsonKeys', 'y')).toBe('Point.jsonKeys.y');
    expect(formatPath('Point.jsonKeys.tags', 0)).toBe('Point.jsonKeys.tags[0]');
  });
});
