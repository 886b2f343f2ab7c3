import type { FragmentDeduplicationPolicy } from '../architecture';
import type { EnumModel } from '../types';

import { enumValuesName, renderLiteral } from './naming';

/**
 * Shared helpers contributed by several classes and passes.
 *
 * Each helper is produced by exactly one constant or function here so every
 * copy is byte-identical and collapses under {@link FragmentDeduplicationPolicy}.
 */

export const CHECK_KEYS_HELPER_NAME = '$checkKeys';

export const CHECK_KEYS_HELPER = [
  `function ${CHECK_KEYS_HELPER_NAME}(json, allowedKeys) {`,
  '  const unrecognized = Object.keys(json).filter((key) => !allowedKeys.includes(key));',
  '  if (unrecognized.length > 0) {',
  '    throw new Error(`Unrecognized keys: ${unrecognized.join(", ")}`);',
  '  }',
  '}'
].join('\n');

export const ENUM_DECODE_HELPER_NAME = '$enumDecode';

export const ENUM_DECODE_HELPER = [
  `function ${ENUM_DECODE_HELPER_NAME}(values, source, enumName) {`,
  '  if (!values.includes(source)) {',
  '    throw new Error(`${JSON.stringify(source)} is not one of the supported values of ${enumName}: ${values.join(", ")}`);',
  '  }',
  '  return source;',
  '}'
].join('\n');

/**
 * The frozen list of values an enum accepts when decoding.
 *
 * @example
 * ```js
 * export const colorEnumValues = Object.freeze(["red", "green"]);
 * ```
 */
export function enumValuesFragment(model: EnumModel): string {
  const values = model.values.map(value => renderLiteral(value, model.name));
  return `export const ${enumValuesName(model.name)} = Object.freeze([${values.join(', ')}]);`;
}
