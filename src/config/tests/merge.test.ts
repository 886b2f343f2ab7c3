import { describe, expect, test } from 'vitest';

import type { TestScenario } from '../../test-utils/scenario';
import { ConfigurationError } from '../../errors';
import { captureError } from '../../test-utils/errors';
import { DEFAULT_GENERATION_SWITCHES, mergeConfig, resolveKeyConfig } from '../merge';

const options = { className: 'Point', fieldNames: ['x', 'y', 'createdAt'] };

/**
 * Test suite: layering of global, class and field configuration.
 *
 * Coverage:
 * - Precedence field > class > global > built-in defaults.
 * - Output key resolution.
 * - Malformed and conflicting payloads.
 */
describe('Config Merger', () => {
  describe('Precedence', () => {
    test('built-in defaults apply when no scope sets a switch', () => {
      const config = mergeConfig(undefined, true, undefined, options);

      expect({ ...config, fields: undefined }).toEqual({
        ...DEFAULT_GENERATION_SWITCHES,
        fields: undefined
      });
      expect(config.fields.size).toBe(0);
    });

    test('class overrides global, global overrides built-in defaults', () => {
      const config = mergeConfig(
        { createFieldMap: true, fieldRename: 'kebab', includeIfNull: false },
        { fieldRename: 'snake' },
        undefined,
        options
      );

      expect(config.createFieldMap).toBe(true);
      expect(config.fieldRename).toBe('snake');
      expect(config.includeIfNull).toBe(false);
    });

    test('field overrides win over the class scope', () => {
      const config = mergeConfig(
        { includeIfNull: true },
        { includeIfNull: false },
        { y: { includeIfNull: true } },
        options
      );

      expect(resolveKeyConfig('x', config).includeIfNull).toBe(false);
      expect(resolveKeyConfig('y', config).includeIfNull).toBe(true);
    });

    test('the resolved configuration is frozen', () => {
      const config = mergeConfig(undefined, {}, { x: { name: 'ex' } }, options);

      expect(Object.isFrozen(config)).toBe(true);
      expect(Object.isFrozen(config.fields.get('x'))).toBe(true);
    });
  });

  describe('Key Resolution', () => {
    const scenarios: TestScenario<string>[] = [
      {
        id: 'No Rename',
        description: 'Field name is the output key',
        code: 'createdAt',
        expected: 'createdAt'
      },
      {
        id: 'Class Rename',
        description: 'fieldRename of the class transforms the name',
        code: 'createdAt:snake',
        expected: 'created_at'
      },
      {
        id: 'Explicit Name',
        description: 'An explicit name wins over fieldRename',
        code: 'y:snake',
        expected: 'why'
      }
    ];

    test.for(scenarios)('[$id] $description', ({ code, expected }) => {
      const [fieldName = '', rename] = code.split(':');
      const config = mergeConfig(
        undefined,
        rename ? { fieldRename: rename } : true,
        { y: { name: 'why' } },
        options
      );

      expect(resolveKeyConfig(fieldName, config).outputKey).toBe(expected);
    });

    test('tri-state inclusion flags and defaults', () => {
      const config = mergeConfig(
        undefined,
        true,
        { y: { includeToJson: true, defaultValue: 0, omitIfDefault: true } },
        options
      );

      expect(resolveKeyConfig('x', config)).toEqual({
        fieldName: 'x',
        outputKey: 'x',
        includeFromJson: undefined,
        includeToJson: undefined,
        includeIfNull: true,
        hasDefault: false,
        defaultValue: undefined,
        omitIfDefault: false,
        annotated: false
      });
      expect(resolveKeyConfig('y', config)).toEqual({
        fieldName: 'y',
        outputKey: 'y',
        includeFromJson: undefined,
        includeToJson: true,
        includeIfNull: true,
        hasDefault: true,
        defaultValue: 0,
        omitIfDefault: true,
        annotated: true
      });
    });
  });

  describe('Invalid Payloads', () => {
    type Payload = { global?: unknown; classOverride?: unknown; fields?: unknown };

    const scenarios: (TestScenario<{ message: string; element: string }> & {
      payload: Payload;
    })[] = [
      {
        id: 'Unknown Field',
        description: 'Override for a field the class does not declare',
        code: 'jsonKeys',
        payload: { fields: { z: {} } },
        expected: {
          message: 'Override for "Point.z" targets a field the class does not declare.',
          element: 'Point.z'
        }
      },
      {
        id: 'Omit Without Default',
        description: 'omitIfDefault needs a defaultValue',
        code: 'jsonKeys',
        payload: { fields: { y: { omitIfDefault: true } } },
        expected: {
          message: '"Point.y" sets omitIfDefault without a defaultValue.',
          element: 'Point.y'
        }
      },
      {
        id: 'Omit Non-Primitive',
        description: 'omitIfDefault needs a primitive defaultValue',
        code: 'jsonKeys',
        payload: { fields: { y: { omitIfDefault: true, defaultValue: [0] } } },
        expected: {
          message: '"Point.y" sets omitIfDefault with a non-primitive defaultValue.',
          element: 'Point.y'
        }
      },
      {
        id: 'Overrides Not An Object',
        description: 'Field overrides must be keyed by field name',
        code: 'jsonKeys',
        payload: { fields: ['x'] },
        expected: {
          message: 'Field overrides of "Point" must be an object keyed by field name.',
          element: 'Point'
        }
      }
    ];

    test.for(scenarios)('[$id] $description', ({ payload, expected }) => {
      const error = captureError(() =>
        mergeConfig(payload.global, payload.classOverride ?? true, payload.fields, options)
      );

      expect(error).toBeInstanceOf(ConfigurationError);
      expect(error).toMatchObject(expected);
    });

    test('schema violations name the element and the failing path', () => {
      const error = captureError(() =>
        mergeConfig(undefined, true, { y: { name: 42 } }, options)
      );

      expect(error).toBeInstanceOf(ConfigurationError);
      expect(error).toMatchObject({ element: 'Point.y' });
      expect(String(error)).toMatch(/^ConfigurationError: Invalid configuration for "Point\.y" at "name": /);
    });

    test('unknown class switches are rejected', () => {
      const error = captureError(() =>
        mergeConfig(undefined, { createFactry: false }, undefined, options)
      );

      expect(error).toBeInstanceOf(ConfigurationError);
      expect(error).toMatchObject({ element: 'Point' });
    });

    test('malformed global defaults are reported against "defaults"', () => {
      const error = captureError(() =>
        mergeConfig({ fieldRename: 'camel' }, true, undefined, options)
      );

      expect(error).toBeInstanceOf(ConfigurationError);
      expect(error).toMatchObject({ element: 'defaults' });
    });
  });
});
