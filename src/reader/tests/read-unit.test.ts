import { describe, expect, test } from 'vitest';

import type { TestScenario } from '../../test-utils/scenario';
import { ConfigurationError, SourceParseError } from '../../errors';
import { captureError } from '../../test-utils/errors';
import { field, optional, required } from '../../test-utils/models';
import { readUnit } from '..';

const lines = (...input: string[]) => `${input.join('\n')}\n`;

/**
 * Test suite: the default model provider.
 *
 * Coverage:
 * - Annotations, fields, accessors, constructor parameters.
 * - Inheritance, type parameters and enums.
 * - Exported names and import bindings.
 * - Rejected declaration shapes.
 */
describe('Model Reader', () => {
  test('reads an annotated class with its overrides', () => {
    const source = lines(
      'export class Point {',
      '  static jsonSerializable = { createFieldMap: true };',
      "  static jsonKeys = { y: { name: 'why' } };",
      '',
      '  /** @type {number} */',
      '  x;',
      '',
      '  /** @type {number} */',
      '  y;',
      '',
      '  constructor(x, y = 0) {',
      '    this.x = x;',
      '    this.y = y;',
      '  }',
      '',
      '  get length() {',
      '    return Math.hypot(this.x, this.y);',
      '  }',
      '',
      '  scale(factor) {',
      '    return new Point(this.x * factor, this.y * factor);',
      '  }',
      '}'
    );

    expect(readUnit('src/point.js', source)).toEqual({
      path: 'src/point.js',
      source,
      elements: [
        {
          kind: 'class',
          model: {
            name: 'Point',
            fields: [
              field('x'),
              field('y'),
              field('length', 'unknown', { isFinal: true, hasSetter: false })
            ],
            constructorParameters: [required('x'), optional('y')],
            typeParameters: [],
            supertype: null
          },
          annotation: { createFieldMap: true },
          fieldAnnotations: { y: { name: 'why' } }
        }
      ],
      exportedNames: ['Point'],
      defaultExportName: null,
      importedBindings: []
    });
  });

  test('merges accessor pairs and skips private names', () => {
    const source = lines(
      'export class Temperature {',
      '  static jsonSerializable = true;',
      '',
      '  #celsius = 0;',
      '',
      '  /** @returns {number} */',
      '  get celsius() {',
      '    return this.#celsius;',
      '  }',
      '',
      '  set celsius(value) {',
      '    this.#celsius = value;',
      '  }',
      '',
      '  set calibration(value) {}',
      '',
      '  /**',
      '   * @private',
      '   * @type {string}',
      '   */',
      '  sensor;',
      '',
      '  /** @readonly @type {Date} */',
      '  readAt;',
      '}'
    );

    const [element] = readUnit('src/temperature.js', source).elements;

    expect(element?.kind === 'class' && element.model.fields).toEqual([
      field('celsius'),
      field('calibration', 'unknown', { hasGetter: false }),
      field('sensor', 'string', { visibility: 'private' }),
      field('readAt', 'Date', { isFinal: true })
    ]);
  });

  test('puts inherited fields first and inherits constructor parameters', () => {
    const source = lines(
      'class Entity {',
      '  constructor(id) {',
      '    /** @type {string} */',
      '    this.id = id;',
      '  }',
      '}',
      '',
      'export class User extends Entity {',
      '  static jsonSerializable = true;',
      '',
      '  /** @type {string | null} */',
      '  nickname = null;',
      '}'
    );

    const unit = readUnit('src/user.js', source);

    expect(unit.elements).toHaveLength(1);
    expect(unit.elements[0]?.model).toEqual({
      name: 'User',
      fields: [field('id', 'string'), field('nickname', 'string | null')],
      constructorParameters: [required('id')],
      typeParameters: [],
      supertype: 'Entity'
    });
    expect(unit.exportedNames).toEqual(['User']);
  });

  test('reads type parameters from @template', () => {
    const source = lines(
      '/**',
      ' * @template K, V',
      ' */',
      'export class Entry {',
      '  static jsonSerializable = { genericArgumentFactories: true };',
      '}'
    );

    const [element] = readUnit('src/entry.js', source).elements;

    expect(element?.kind === 'class' && element.model.typeParameters).toEqual(['K', 'V']);
  });

  test('reads @enum constants in source order', () => {
    const source = lines(
      '/** @enum {string} */',
      "export const Color = Object.freeze({ Red: 'red', Green: 'green' });",
      '',
      '/** @enum {number} */',
      'const Level = { Low: 1, High: 2 };',
      '',
      '/** Not an enum. */',
      'export const limits = { max: 3 };'
    );

    expect(readUnit('src/enums.js', source).elements).toEqual([
      { kind: 'enum', model: { name: 'Color', values: ['red', 'green'] } },
      { kind: 'enum', model: { name: 'Level', values: [1, 2] } }
    ]);
  });

  test('collects exported names and import bindings', () => {
    const source = lines(
      "import Money from './money.js';",
      "import * as geo from './geo.js';",
      "import { Address as PostalAddress, Country } from './address.js';",
      '',
      'class Hidden {}',
      'function helper() {}',
      'export { helper };',
      'export const VERSION = 1;',
      'export default class {}'
    );

    const unit = readUnit('src/module.js', source);

    expect(unit.elements).toEqual([]);
    expect(unit.exportedNames).toEqual(['helper', 'VERSION']);
    expect(unit.defaultExportName).toBeNull();
    expect(unit.importedBindings).toEqual([
      { kind: 'default', imported: 'default', local: 'Money', source: './money.js' },
      { kind: 'namespace', imported: '*', local: 'geo', source: './geo.js' },
      { kind: 'named', imported: 'Address', local: 'PostalAddress', source: './address.js' },
      { kind: 'named', imported: 'Country', local: 'Country', source: './address.js' }
    ]);
  });

  describe('Default Export', () => {
    const scenarios: TestScenario<string | null>[] = [
      { id: 'Class', description: 'Named class declaration', code: 'export default class Point {}', expected: 'Point' },
      { id: 'Identifier', description: 'Exported binding', code: 'class Point {}\nexport default Point;', expected: 'Point' },
      {
        id: 'Specifier',
        description: 'Renamed to default',
        code: 'class Point {}\nexport { Point as default };',
        expected: 'Point'
      },
      { id: 'Anonymous', description: 'Nothing to import by name', code: 'export default class {}', expected: null }
    ];

    test.for(scenarios)('[$id] $description', ({ code, expected }) => {
      expect(readUnit('src/module.js', code).defaultExportName).toBe(expected);
    });
  });

  describe('Rejected Sources', () => {
    test('dynamic annotation values', () => {
      const source = lines(
        'export class Point {',
        '  static jsonSerializable = buildOptions();',
        '}'
      );

      const error = captureError(() => readUnit('src/point.js', source));

      expect(error).toBeInstanceOf(ConfigurationError);
      expect(error).toMatchObject({
        message:
          '"Point.jsonSerializable" must be a static value: CallExpression is evaluated at runtime.'
      });
    });

    test('destructured constructor parameters', () => {
      const source = lines(
        'export class Point {',
        '  static jsonSerializable = true;',
        '  constructor({ x, y }) {}',
        '}'
      );

      expect(() => readUnit('src/point.js', source)).toThrow(
        new ConfigurationError(
          'Constructor parameter 1 of "Point" must be an identifier, optionally with a default value.',
          'Point'
        )
      );
    });

    test('enum values other than strings and numbers', () => {
      const source = lines('/** @enum */', 'const Flags = { On: true };');

      expect(() => readUnit('src/flags.js', source)).toThrow(
        'Values of @enum "Flags" must be strings or numbers.'
      );
    });

    test('sources that do not parse', () => {
      const error = captureError(() => readUnit('src/broken.js', 'export class {'));

      expect(error).toBeInstanceOf(SourceParseError);
      expect(error).toMatchObject({ filePath: 'src/broken.js' });
      expect(String(error)).toMatch(/^SourceParseError: Could not parse src\/broken\.js: /);
    });
  });
});
