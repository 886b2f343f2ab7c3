import { describe, expect, test } from 'vitest';

import type { ClassModel } from '../../types';
import { UnavailableFieldError } from '../../errors';
import { captureError } from '../../test-utils/errors';
import { classModel, emitContext, field, optional, required } from '../../test-utils/models';
import { selectFields, unavailableReasons } from '../../selector/select-fields';
import { emitDecodeFactory } from '../decode-factory';
import { CHECK_KEYS_HELPER } from '../helpers';

function emit(model: ClassModel, annotation: unknown = true, fieldAnnotations?: unknown) {
  const { context, members } = emitContext(model, annotation, fieldAnnotations);
  const selection = selectFields(model, context.config);
  const result = emitDecodeFactory(context, selection.usable, unavailableReasons(selection));
  return { ...result, members };
}

/**
 * Test suite: `<name>FromJson` generation.
 */
describe('Decode Factory', () => {
  const point = classModel('Point', [field('x'), field('y')]);

  test('binds constructor parameters by name', () => {
    const { output, usedFields } = emit(point);

    expect(output).toBe(
      [
        'export function pointFromJson(json) {',
        '  return new Point(Number(json["x"]), Number(json["y"]));',
        '}'
      ].join('\n')
    );
    expect([...usedFields]).toEqual(['x', 'y']);
  });

  test('passes undefined for a skipped optional parameter in the middle', () => {
    const box = classModel(
      'Box',
      [field('a'), field('b'), field('c')],
      [required('a'), optional('b'), optional('c')]
    );

    expect(emit(box, true, { b: { includeFromJson: false } }).output).toBe(
      [
        'export function boxFromJson(json) {',
        '  return new Box(Number(json["a"]), undefined, Number(json["c"]));',
        '}'
      ].join('\n')
    );
  });

  test('drops trailing skipped optional parameters', () => {
    const box = classModel(
      'Box',
      [field('a'), field('b'), field('c')],
      [required('a'), optional('b'), optional('c')]
    );

    const { output, usedFields } = emit(box, true, {
      b: { includeFromJson: false },
      c: { includeFromJson: false }
    });

    expect(output).toBe(
      ['export function boxFromJson(json) {', '  return new Box(Number(json["a"]));', '}'].join(
        '\n'
      )
    );
    expect([...usedFields]).toEqual(['a']);
  });

  test('assigns writable fields the constructor does not take', () => {
    const item = classModel(
      'Item',
      [
        field('id', 'number', { isFinal: true }),
        field('label', 'string'),
        field('total', 'number', { isFinal: true, hasSetter: false })
      ],
      [required('id')]
    );

    const { output, usedFields } = emit(item);

    expect(output).toBe(
      [
        'export function itemFromJson(json) {',
        '  const instance = new Item(Number(json["id"]));',
        '  instance.label = String(json["label"]);',
        '  return instance;',
        '}'
      ].join('\n')
    );
    expect([...usedFields]).toEqual(['id', 'label']);
  });

  test('falls back to the default value for a missing key', () => {
    const { output } = emit(point, true, { y: { defaultValue: 0 } });

    expect(output).toContain(
      'return new Point(Number(json["x"]), json["y"] == null ? 0 : Number(json["y"]));'
    );
  });

  test('reads renamed keys', () => {
    const event = classModel('Event', [field('createdAt', 'Date | null')]);

    expect(emit(event, { fieldRename: 'snake' }).output).toBe(
      [
        'export function eventFromJson(json) {',
        '  return new Event(json["created_at"] == null ? null : new Date(json["created_at"]));',
        '}'
      ].join('\n')
    );
  });

  test('checks for unrecognized keys when asked to', () => {
    const { output, members } = emit(point, { disallowUnrecognizedKeys: true }, { y: { name: 'why' } });

    expect(output).toBe(
      [
        'export function pointFromJson(json) {',
        '  $checkKeys(json, ["x", "why"]);',
        '  return new Point(Number(json["x"]), Number(json["why"]));',
        '}'
      ].join('\n')
    );
    expect(members).toEqual([CHECK_KEYS_HELPER]);
  });

  test('takes one callback per type parameter with generic argument factories', () => {
    const box = classModel('Box', [field('value', 'T')], undefined, { typeParameters: ['T'] });

    expect(emit(box, { genericArgumentFactories: true }).output).toBe(
      [
        'export function boxFromJson(json, fromJsonT) {',
        '  return new Box(fromJsonT(json["value"]));',
        '}'
      ].join('\n')
    );
  });

  test('handles a class without fields', () => {
    expect(emit(classModel('Empty', [])).output).toBe(
      ['export function emptyFromJson(json) {', '  return new Empty();', '}'].join('\n')
    );
  });

  describe('Unavailable Constructor Arguments', () => {
    test('a required parameter bound to an excluded field names the exclusion', () => {
      const secret = classModel('Secret', [field('id'), field('key', 'string', { visibility: 'private' })]);

      const error = captureError(() => emit(secret));

      expect(error).toBeInstanceOf(UnavailableFieldError);
      expect(error).toMatchObject({
        message:
          'Cannot populate the required constructor argument: key. It is assigned to a private field.',
        element: 'Secret.key'
      });
    });

    test('a required parameter without a field is reported', () => {
      const shape = classModel('Shape', [field('kind', 'string')], [required('kind'), required('sides')]);

      expect(() => emit(shape)).toThrow(
        'Cannot populate the required constructor argument: sides. There is no field named "sides".'
      );
    });
  });
});
