import type { FieldDescriptor } from '../types';
import type { ClassEmitContext } from './context';

import { resolveKeyConfig } from '../config/merge';
import { typeArgumentParameters } from './context';
import { encodeField } from './encode-function';
import { fieldMapName, perFieldToJsonName, propertyKey } from './naming';

function constant(name: string, entries: readonly string[]): string {
  const body = entries.length === 0 ? '{}' : `{\n${entries.map(entry => `  ${entry}`).join(',\n')}\n}`;
  return `export const ${name} = ${body};`;
}

/**
 * Emits `<name>FieldMap`: field name -> output key.
 *
 * @example
 * ```js
 * export const pointFieldMap = {
 *   x: "x",
 *   createdAt: "created_at"
 * };
 * ```
 */
export function emitFieldMap(
  context: ClassEmitContext,
  fields: readonly FieldDescriptor[]
): string {
  const entries = fields.map(
    field =>
      `${propertyKey(field.name)}: ${JSON.stringify(resolveKeyConfig(field.name, context.config).outputKey)}`
  );
  return constant(fieldMapName(context.model.name), entries);
}

/**
 * Emits `<name>PerFieldToJson`: field name -> encoder of a single value.
 * Generic classes take the `toJsonT` callbacks after the value.
 */
export function emitPerFieldToJson(
  context: ClassEmitContext,
  fields: readonly FieldDescriptor[]
): string {
  const parameters = ['value', ...typeArgumentParameters(context, 'toJson')].join(', ');
  const entries = fields.map(
    field =>
      `${propertyKey(field.name)}: (${parameters}) => ${encodeField(context, field, 'value')}`
  );
  return constant(perFieldToJsonName(context.model.name), entries);
}
