import { describe, expect, test } from 'vitest';

import type { TestScenario } from '../../test-utils/scenario';
import { annotatedClass, classModel, compilationUnit, field } from '../../test-utils/models';
import { companionImports, companionPath, referencesName, siblingSpecifier } from '../companion';

describe('Companion Module', () => {
  describe('companionPath', () => {
    const scenarios: (TestScenario<string> & { suffix: string })[] = [
      { id: 'Default Suffix', description: 'Suffix before the extension', code: 'src/point.js', suffix: '.g', expected: 'src/point.g.js' },
      { id: 'Module Extension', description: 'Any extension is kept', code: 'lib/user.mjs', suffix: '.json', expected: 'lib/user.json.mjs' },
      { id: 'No Extension', description: 'Suffix appended', code: 'bin/tool', suffix: '.g', expected: 'bin/tool.g' }
    ];

    test.for(scenarios)('[$id] $description', ({ code, suffix, expected }) => {
      expect(companionPath(code, suffix)).toBe(expected);
    });
  });

  test('siblingSpecifier is relative to the directory', () => {
    expect(siblingSpecifier('src/models/point.g.js')).toBe('./point.g.js');
  });

  describe('referencesName', () => {
    const scenarios: (TestScenario<boolean> & { name: string })[] = [
      { id: 'Whole Word', description: 'Identifier on its own', code: 'new Point(x)', name: 'Point', expected: true },
      { id: 'Prefix', description: 'Part of a longer identifier', code: 'new PointList()', name: 'Point', expected: false },
      { id: 'Dollar', description: '$ continues an identifier', code: 'Point$1', name: 'Point', expected: false },
      { id: 'Member', description: 'Object of a member access', code: 'geo.Point.fromJson(e)', name: 'geo', expected: true }
    ];

    test.for(scenarios)('[$id] $description', ({ code, name, expected }) => {
      expect(referencesName(code, name)).toBe(expected);
    });
  });

  test('imports skip the companion itself and names already taken', () => {
    const unit = compilationUnit([annotatedClass(classModel('Route', [field('geo', 'geo.Point')]))], {
      exportedNames: ['Route'],
      importedBindings: [
        { kind: 'named', imported: 'routeFromJson', local: 'routeFromJson', source: './route.g.js' },
        { kind: 'namespace', imported: '*', local: 'geo', source: './geo.js' },
        { kind: 'default', imported: 'default', local: 'Route', source: './legacy.js' }
      ]
    });

    const output = 'export function routeFromJson(json) {\n  return new Route(geo.Point.fromJson(json["geo"]));\n}';

    expect(
      companionImports(unit, output, { source: './route.js', companion: './route.g.js' })
    ).toEqual(['import { Route } from "./route.js";', 'import * as geo from "./geo.js";']);
  });

  test.for([
    {
      id: 'Default Only',
      description: 'The default export is imported by default',
      exportedNames: [],
      expected: ['import Route from "./route.js";']
    },
    {
      id: 'Default And Named',
      description: 'The default import comes before the named ones',
      exportedNames: ['Geo'],
      expected: ['import Route from "./route.js";', 'import { Geo } from "./route.js";']
    },
    {
      id: 'Also Exported By Name',
      description: 'A name exported both ways is imported by name once',
      exportedNames: ['Route', 'Geo'],
      expected: ['import { Route, Geo } from "./route.js";']
    }
  ])('[$id] $description', ({ exportedNames, expected }) => {
    const unit = compilationUnit([annotatedClass(classModel('Route', [field('geo', 'Geo')]))], {
      exportedNames,
      defaultExportName: 'Route'
    });
    const output = 'export function routeFromJson(json) {\n  return new Route(Geo.fromJson(json["geo"]));\n}';

    expect(
      companionImports(unit, output, { source: './route.js', companion: './route.g.js' })
    ).toEqual(expected);
  });
});
