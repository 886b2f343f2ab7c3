import type { FieldDescriptor } from '../types';
import type { ClassEmitContext } from './context';

import { resolveKeyConfig } from '../config/merge';
import { UnavailableFieldError } from '../errors';
import { conversionContext, fieldType, typeArgumentParameters } from './context';
import { CHECK_KEYS_HELPER, CHECK_KEYS_HELPER_NAME } from './helpers';
import { factoryName, jsonAccess, memberAccess, renderLiteral } from './naming';

export type DecodeFactoryResult = {
  readonly output: string;

  /**
   * Names of the fields the factory reads, through the constructor or by
   * assignment after construction.
   */
  readonly usedFields: ReadonlySet<string>;
};

/**
 * Placeholder for an optional constructor parameter without a usable field.
 */
const SKIPPED = 'undefined';

/**
 * Decodes one field from `json`, falling back to the configured default
 * when the key is missing or `null`.
 */
function decodeField(context: ClassEmitContext, field: FieldDescriptor): string {
  const key = resolveKeyConfig(field.name, context.config);
  const access = jsonAccess(key.outputKey);
  const type = fieldType(context, field);
  const conversion = conversionContext(context, field);

  if (!key.hasDefault) {
    return context.registry.decode(access, type, conversion);
  }

  const fallback = renderLiteral(key.defaultValue, conversion.element);
  const converted = context.registry.decode(access, { ...type, nullable: false }, conversion);
  return `${access} == null ? ${fallback} : ${converted}`;
}

function missingFieldReason(
  name: string,
  unavailable: ReadonlyMap<string, string>
): string {
  return unavailable.get(name) ?? `There is no field named "${name}".`;
}

/**
 * Emits `<name>FromJson(json[, fromJsonT...])`.
 *
 * Constructor parameters are bound by name to usable fields and passed
 * positionally. An optional parameter without a usable field is passed as
 * `undefined` when a later argument follows, and left out otherwise. Usable
 * fields the constructor does not take are assigned afterwards when they are
 * writable; read-only ones are skipped.
 *
 * @param usable - Decode-eligible fields, in declaration order.
 * @param unavailable - Exclusion reasons of the other fields, by name.
 * @throws {UnavailableFieldError} When a required constructor parameter has
 *         no usable field.
 */
export function emitDecodeFactory(
  context: ClassEmitContext,
  usable: readonly FieldDescriptor[],
  unavailable: ReadonlyMap<string, string>
): DecodeFactoryResult {
  const { model } = context;
  const usableByName = new Map(usable.map(field => [field.name, field]));
  const usedFields = new Set<string>();

  const args: string[] = [];
  for (const parameter of model.constructorParameters) {
    const field = usableByName.get(parameter.name);

    if (field) {
      args.push(decodeField(context, field));
      usedFields.add(field.name);
    } else if (parameter.isOptional) {
      args.push(SKIPPED);
    } else {
      throw new UnavailableFieldError(
        `Cannot populate the required constructor argument: ${parameter.name}. ${missingFieldReason(parameter.name, unavailable)}`,
        `${model.name}.${parameter.name}`
      );
    }
  }

  while (args.length > 0 && args[args.length - 1] === SKIPPED) {
    args.pop();
  }

  const assignments: string[] = [];
  for (const field of usable) {
    if (usedFields.has(field.name) || field.isFinal || !field.hasSetter) continue;

    assignments.push(`  ${memberAccess('instance', field.name)} = ${decodeField(context, field)};`);
    usedFields.add(field.name);
  }

  const body: string[] = [];

  if (context.config.disallowUnrecognizedKeys) {
    context.addMember(CHECK_KEYS_HELPER);
    const allowedKeys = model.fields
      .filter(field => usedFields.has(field.name))
      .map(field => JSON.stringify(resolveKeyConfig(field.name, context.config).outputKey));
    body.push(`  ${CHECK_KEYS_HELPER_NAME}(json, [${allowedKeys.join(', ')}]);`);
  }

  const construction = `new ${model.name}(${args.join(', ')})`;
  if (assignments.length === 0) {
    body.push(`  return ${construction};`);
  } else {
    body.push(`  const instance = ${construction};`, ...assignments, '  return instance;');
  }

  const parameters = ['json', ...typeArgumentParameters(context, 'fromJson')];
  const output = [
    `export function ${factoryName(model.name)}(${parameters.join(', ')}) {`,
    ...body,
    '}'
  ].join('\n');

  return { output, usedFields };
}
