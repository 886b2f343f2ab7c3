import { describe, expect, test } from 'vitest';

import type { ClassModel } from '../../types';
import type { TestScenario } from '../../test-utils/scenario';
import { asFunction, evaluateGenerated } from '../../test-utils/evaluate';
import { classModel, emitContext, field } from '../../test-utils/models';
import { emitEncodeFunction } from '../encode-function';
import { emitFieldMap, emitPerFieldToJson } from '../field-maps';

function encode(model: ClassModel, annotation: unknown = true, fieldAnnotations?: unknown) {
  const { context } = emitContext(model, annotation, fieldAnnotations);
  return emitEncodeFunction(context, model.fields);
}

const point = classModel('Point', [field('x'), field('y'), field('z')]);

/**
 * Test suite: `<name>ToJson`, `<name>FieldMap` and `<name>PerFieldToJson`.
 */
describe('Encode Function', () => {
  const scenarios: (TestScenario<string[]> & {
    model: ClassModel;
    annotation?: unknown;
    fieldAnnotations?: unknown;
  })[] = [
    {
      id: 'Object Literal',
      description: 'Unconditional fields form a single literal',
      code: 'Point',
      model: point,
      expected: [
        'export function pointToJson(instance) {',
        '  return {',
        '    "x": instance.x,',
        '    "y": instance.y,',
        '    "z": instance.z',
        '  };',
        '}'
      ]
    },
    {
      id: 'Empty',
      description: 'No fields encode to an empty object',
      code: 'Empty',
      model: classModel('Empty', []),
      expected: ['export function emptyToJson(instance) {', '  return {};', '}']
    },
    {
      id: 'Include If Null',
      description: 'Statements take over from the first conditional field',
      code: 'Point',
      model: point,
      fieldAnnotations: { y: { includeIfNull: false } },
      expected: [
        'export function pointToJson(instance) {',
        '  const json = {',
        '    "x": instance.x',
        '  };',
        '  if (instance.y != null) {',
        '    json["y"] = instance.y;',
        '  }',
        '  json["z"] = instance.z;',
        '  return json;',
        '}'
      ]
    },
    {
      id: 'Omit If Default',
      description: 'Values equal to the default are left out',
      code: 'Point',
      model: classModel('Point', [field('x')]),
      annotation: { includeIfNull: false },
      fieldAnnotations: { x: { defaultValue: 0, omitIfDefault: true } },
      expected: [
        'export function pointToJson(instance) {',
        '  const json = {};',
        '  if (instance.x != null && instance.x !== 0) {',
        '    json["x"] = instance.x;',
        '  }',
        '  return json;',
        '}'
      ]
    },
    {
      id: 'Omit If NaN Default',
      description: 'A NaN default is compared with Number.isNaN',
      code: 'Reading',
      model: classModel('Reading', [field('value')]),
      fieldAnnotations: { value: { defaultValue: Number.NaN, omitIfDefault: true } },
      expected: [
        'export function readingToJson(instance) {',
        '  const json = {};',
        '  if (!Number.isNaN(instance.value)) {',
        '    json["value"] = instance.value;',
        '  }',
        '  return json;',
        '}'
      ]
    },
    {
      id: 'Converted Values',
      description: 'Values go through the registry, keys through the rename strategy',
      code: 'Event',
      model: classModel('Event', [field('startsAt', 'Date'), field('endsAt', 'Date | null')]),
      annotation: { fieldRename: 'kebab' },
      expected: [
        'export function eventToJson(instance) {',
        '  return {',
        '    "starts-at": instance.startsAt.toISOString(),',
        '    "ends-at": instance.endsAt == null ? null : instance.endsAt.toISOString()',
        '  };',
        '}'
      ]
    },
    {
      id: 'Generic',
      description: 'One callback per type parameter',
      code: 'Box',
      model: classModel('Box', [field('value', 'T')], undefined, { typeParameters: ['T'] }),
      annotation: { genericArgumentFactories: true },
      expected: [
        'export function boxToJson(instance, toJsonT) {',
        '  return {',
        '    "value": toJsonT(instance.value)',
        '  };',
        '}'
      ]
    },
    {
      id: 'Proto Key Literal',
      description: 'A "__proto__" output key is computed in the literal',
      code: 'Raw',
      model: classModel('Raw', [field('parent')]),
      fieldAnnotations: { parent: { name: '__proto__' } },
      expected: [
        'export function rawToJson(instance) {',
        '  return {',
        '    ["__proto__"]: instance.parent',
        '  };',
        '}'
      ]
    },
    {
      id: 'Proto Key Statement',
      description: 'A conditional "__proto__" output key is defined, not assigned',
      code: 'Raw',
      model: classModel('Raw', [field('parent')]),
      fieldAnnotations: { parent: { name: '__proto__', includeIfNull: false } },
      expected: [
        'export function rawToJson(instance) {',
        '  const json = {};',
        '  if (instance.parent != null) {',
        '    Object.defineProperty(json, "__proto__", { value: instance.parent, enumerable: true, writable: true, configurable: true });',
        '  }',
        '  return json;',
        '}'
      ]
    },
    {
      id: 'Non-Identifier Field',
      description: 'Field names that are not identifiers use bracket access',
      code: 'Header',
      model: classModel('Header', [field('content-type', 'string')]),
      expected: [
        'export function headerToJson(instance) {',
        '  return {',
        '    "content-type": instance["content-type"]',
        '  };',
        '}'
      ]
    }
  ];

  test.for(scenarios)('[$id] $description', ({ model, annotation, fieldAnnotations, expected }) => {
    expect(encode(model, annotation ?? true, fieldAnnotations)).toBe(expected.join('\n'));
  });

  test.for([
    { id: 'Literal', includeIfNull: true },
    { id: 'Statement', includeIfNull: false }
  ])('[$id] a "__proto__" output key stays an own property', ({ includeIfNull }) => {
    const raw = classModel('Raw', [field('parent')]);
    const output = encode(raw, true, { parent: { name: '__proto__', includeIfNull } });
    const toJson = asFunction(evaluateGenerated(output, ['rawToJson']).rawToJson);

    const json = toJson({ parent: 7 });

    expect(Object.getPrototypeOf(json)).toBe(Object.prototype);
    expect(Object.getOwnPropertyDescriptor(json, '__proto__')?.value).toBe(7);
  });

  test('a NaN default is omitted when encoding', () => {
    const reading = classModel('Reading', [field('value')]);
    const output = encode(reading, true, { value: { defaultValue: Number.NaN, omitIfDefault: true } });
    const toJson = asFunction(evaluateGenerated(output, ['readingToJson']).readingToJson);

    expect(toJson({ value: Number.NaN })).toEqual({});
    expect(toJson({ value: 3 })).toEqual({ value: 3 });
  });

  test('output is byte-identical across runs', () => {
    const annotations = { y: { includeIfNull: false, name: 'why' } };

    expect(encode(point, true, annotations)).toBe(encode(point, true, annotations));
  });
});

describe('Field Maps', () => {
  const event = classModel('Event', [field('id'), field('createdAt', 'Date')]);

  test('field map lists output keys by field name', () => {
    const { context } = emitContext(event, { fieldRename: 'snake' });

    expect(emitFieldMap(context, event.fields)).toBe(
      ['export const eventFieldMap = {', '  id: "id",', '  createdAt: "created_at"', '};'].join('\n')
    );
  });

  test('per-field encoders convert a single value', () => {
    const { context } = emitContext(event);

    expect(emitPerFieldToJson(context, event.fields)).toBe(
      [
        'export const eventPerFieldToJson = {',
        '  id: (value) => value,',
        '  createdAt: (value) => value.toISOString()',
        '};'
      ].join('\n')
    );
  });

  test('generic per-field encoders take the callbacks after the value', () => {
    const box = classModel('Box', [field('value', 'T')], undefined, { typeParameters: ['T'] });
    const { context } = emitContext(box, { genericArgumentFactories: true });

    expect(emitPerFieldToJson(context, box.fields)).toBe(
      ['export const boxPerFieldToJson = {', '  value: (value, toJsonT) => toJsonT(value)', '};'].join(
        '\n'
      )
    );
  });

  test('empty field sets produce empty constants', () => {
    const { context } = emitContext(classModel('Empty', []));

    expect(emitFieldMap(context, [])).toBe('export const emptyFieldMap = {};');
    expect(emitPerFieldToJson(context, [])).toBe('export const emptyPerFieldToJson = {};');
  });
});
