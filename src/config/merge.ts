import type { ConfigurationLayering } from '../architecture';
import type {
  GenerationSwitches,
  KeyConfig,
  ResolvedConfig,
  ResolvedKeyConfig
} from '../types';

import { ConfigurationError } from '../errors';
import { isPlainObject } from '../guards';
import { renameField } from './field-rename';
import {
  type GenerationOptions,
  generationOptionsSchema,
  keyConfigSchema
} from './schema';
import { validateWithSchema } from './validator';

/**
 * Built-in defaults, the broadest scope.
 */
export const DEFAULT_GENERATION_SWITCHES: Readonly<GenerationSwitches> =
  Object.freeze({
    createFactory: true,
    createToJson: true,
    createFieldMap: false,
    createPerFieldToJson: false,
    genericArgumentFactories: false,
    disallowUnrecognizedKeys: false,
    includeIfNull: true,
    ignoreUnannotated: false,
    fieldRename: 'none'
  });

export type MergeOptions = {
  /**
   * Name of the class being configured; used in error messages.
   */
  className: string;

  /**
   * Names of the fields the class declares. When given, overrides for other
   * names are rejected.
   */
  fieldNames?: readonly string[];
};

/**
 * Normalizes a class-level annotation payload.
 *
 * `true`, `null` and `undefined` stand for "annotated, no overrides".
 */
function normalizeClassOverride(classOverride: unknown): unknown {
  if (classOverride === true || classOverride == null) return {};
  return classOverride;
}

/**
 * Validates one scope of generation switches.
 */
function parseSwitches(payload: unknown, elementName: string): GenerationOptions {
  return validateWithSchema(generationOptionsSchema, payload, elementName);
}

/**
 * Validates field overrides entry by entry so errors name the field
 * (`Point.y`) rather than the class.
 */
function parseFieldOverrides(
  payload: unknown,
  options: MergeOptions
): Map<string, Readonly<KeyConfig>> {
  const fields = new Map<string, Readonly<KeyConfig>>();
  if (payload == null) return fields;

  if (!isPlainObject(payload)) {
    throw new ConfigurationError(
      `Field overrides of "${options.className}" must be an object keyed by field name.`,
      options.className
    );
  }

  const known = options.fieldNames ? new Set(options.fieldNames) : undefined;

  for (const [fieldName, rawOverride] of Object.entries(payload)) {
    const elementName = `${options.className}.${fieldName}`;

    if (known && !known.has(fieldName)) {
      throw new ConfigurationError(
        `Override for "${elementName}" targets a field the class does not declare.`,
        elementName
      );
    }

    const override = validateWithSchema(keyConfigSchema, rawOverride, elementName);
    assertOmitIfDefaultIsUsable(override, elementName);
    fields.set(fieldName, Object.freeze(override));
  }

  return fields;
}

/**
 * `omitIfDefault` compares the encoded value with the default using `!==`
 * (`Number.isNaN` for a `NaN` default), which is only meaningful for
 * primitives.
 */
function assertOmitIfDefaultIsUsable(override: KeyConfig, elementName: string): void {
  if (!override.omitIfDefault) return;

  if (override.defaultValue === undefined) {
    throw new ConfigurationError(
      `"${elementName}" sets omitIfDefault without a defaultValue.`,
      elementName
    );
  }

  if (typeof override.defaultValue === 'object' && override.defaultValue !== null) {
    throw new ConfigurationError(
      `"${elementName}" sets omitIfDefault with a non-primitive defaultValue.`,
      elementName
    );
  }
}

/**
 * Layers global defaults, the class override and field overrides into one
 * resolved configuration.
 *
 * Precedence (see {@link ConfigurationLayering}):
 *   field > class > global > built-in defaults
 *
 * Field overrides are kept as validated payloads; their effective values are
 * computed per field by {@link resolveKeyConfig}.
 *
 * @param global - Global defaults (already the `CodegenOptions.defaults` payload).
 * @param classOverride - Raw class-level annotation payload.
 * @param fieldOverrides - Raw field-level overrides keyed by field name.
 * @returns A frozen configuration.
 * @throws {ConfigurationError} On malformed or conflicting payloads.
 */
export function mergeConfig(
  global: unknown,
  classOverride: unknown,
  fieldOverrides: unknown,
  options: MergeOptions
): ResolvedConfig {
  const globalLayer = parseSwitches(global ?? {}, 'defaults');
  const classLayer = parseSwitches(
    normalizeClassOverride(classOverride),
    options.className
  );
  const fields = parseFieldOverrides(fieldOverrides, options);
  const defaults = DEFAULT_GENERATION_SWITCHES;

  return Object.freeze({
    createFactory:
      classLayer.createFactory ?? globalLayer.createFactory ?? defaults.createFactory,
    createToJson:
      classLayer.createToJson ?? globalLayer.createToJson ?? defaults.createToJson,
    createFieldMap:
      classLayer.createFieldMap ?? globalLayer.createFieldMap ?? defaults.createFieldMap,
    createPerFieldToJson:
      classLayer.createPerFieldToJson ??
      globalLayer.createPerFieldToJson ??
      defaults.createPerFieldToJson,
    genericArgumentFactories:
      classLayer.genericArgumentFactories ??
      globalLayer.genericArgumentFactories ??
      defaults.genericArgumentFactories,
    disallowUnrecognizedKeys:
      classLayer.disallowUnrecognizedKeys ??
      globalLayer.disallowUnrecognizedKeys ??
      defaults.disallowUnrecognizedKeys,
    includeIfNull:
      classLayer.includeIfNull ?? globalLayer.includeIfNull ?? defaults.includeIfNull,
    ignoreUnannotated:
      classLayer.ignoreUnannotated ??
      globalLayer.ignoreUnannotated ??
      defaults.ignoreUnannotated,
    fieldRename: classLayer.fieldRename ?? globalLayer.fieldRename ?? defaults.fieldRename,
    fields
  });
}

/**
 * Computes the effective settings of one field.
 *
 * - Output key: explicit `name`, otherwise the field name passed through
 *   `fieldRename`.
 * - `includeIfNull`: field override, otherwise the class-resolved value.
 * - Inclusion flags stay tri-state (`undefined` = no explicit decision).
 */
export function resolveKeyConfig(
  fieldName: string,
  config: ResolvedConfig
): ResolvedKeyConfig {
  const override = config.fields.get(fieldName);

  return {
    fieldName,
    outputKey: override?.name ?? renameField(fieldName, config.fieldRename),
    includeFromJson: override?.includeFromJson,
    includeToJson: override?.includeToJson,
    includeIfNull: override?.includeIfNull ?? config.includeIfNull,
    hasDefault: override?.defaultValue !== undefined,
    defaultValue: override?.defaultValue,
    omitIfDefault: override?.omitIfDefault ?? false,
    annotated: override !== undefined
  };
}
