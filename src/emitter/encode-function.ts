import type { FieldDescriptor, ResolvedKeyConfig } from '../types';
import type { ClassEmitContext } from './context';

import { resolveKeyConfig } from '../config/merge';
import { conversionContext, fieldType, typeArgumentParameters } from './context';
import { PROTO_KEY, memberAccess, quotedPropertyKey, renderLiteral, toJsonName } from './naming';

/**
 * Encodes the value found at `expression` for one field.
 */
export function encodeField(
  context: ClassEmitContext,
  field: FieldDescriptor,
  expression: string
): string {
  return context.registry.encode(
    expression,
    fieldType(context, field),
    conversionContext(context, field)
  );
}

/**
 * Condition under which a field is written, or `null` when it always is.
 */
function writeCondition(
  key: ResolvedKeyConfig,
  access: string,
  element: string
): string | null {
  const conditions: string[] = [];

  if (!key.includeIfNull) {
    conditions.push(`${access} != null`);
  }
  if (key.omitIfDefault) {
    const { defaultValue } = key;
    // `NaN` is never `!==`-equal to itself.
    conditions.push(
      typeof defaultValue === 'number' && Number.isNaN(defaultValue)
        ? `!Number.isNaN(${access})`
        : `${access} !== ${renderLiteral(defaultValue, element)}`
    );
  }

  return conditions.length === 0 ? null : conditions.join(' && ');
}

type EncodedEntry = {
  /**
   * Resolved output key, unquoted.
   */
  readonly key: string;
  readonly value: string;
  readonly condition: string | null;
};

function objectLiteral(entries: readonly EncodedEntry[]): string {
  if (entries.length === 0) return '{}';
  const lines = entries.map(entry => `    ${quotedPropertyKey(entry.key)}: ${entry.value}`);
  return `{\n${lines.join(',\n')}\n  }`;
}

function statement(entry: EncodedEntry): string {
  // An assignment to `__proto__` would replace the prototype.
  const assignment =
    entry.key === PROTO_KEY
      ? `Object.defineProperty(json, ${JSON.stringify(PROTO_KEY)}, { value: ${entry.value}, enumerable: true, writable: true, configurable: true });`
      : `json[${JSON.stringify(entry.key)}] = ${entry.value};`;
  return entry.condition === null
    ? `  ${assignment}`
    : `  if (${entry.condition}) {\n    ${assignment}\n  }`;
}

/**
 * Emits `<name>ToJson(instance[, toJsonT...])`.
 *
 * Entries follow declaration order. While every field is unconditional the
 * body is a single object literal; from the first conditional field on
 * (`includeIfNull: false`, `omitIfDefault`) the remaining entries are written
 * as statements so the output key order stays stable.
 *
 * @param fields - The final encode set.
 */
export function emitEncodeFunction(
  context: ClassEmitContext,
  fields: readonly FieldDescriptor[]
): string {
  const { model } = context;

  const entries: EncodedEntry[] = fields.map(field => {
    const key = resolveKeyConfig(field.name, context.config);
    const access = memberAccess('instance', field.name);
    return {
      key: key.outputKey,
      value: encodeField(context, field, access),
      condition: writeCondition(key, access, `${model.name}.${field.name}`)
    };
  });

  const firstConditional = entries.findIndex(entry => entry.condition !== null);

  const body =
    firstConditional === -1
      ? [`  return ${objectLiteral(entries)};`]
      : [
          `  const json = ${objectLiteral(entries.slice(0, firstConditional))};`,
          ...entries.slice(firstConditional).map(statement),
          '  return json;'
        ];

  const parameters = ['instance', ...typeArgumentParameters(context, 'toJson')];
  return [
    `export function ${toJsonName(model.name)}(${parameters.join(', ')}) {`,
    ...body,
    '}'
  ].join('\n');
}
