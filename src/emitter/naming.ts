import { ConfigurationError } from '../errors';
import { isArray, isPlainObject } from '../guards';

const IDENTIFIER_PATTERN = /^[A-Za-z_$][\w$]*$/;

export function lowerFirst(name: string): string {
  return name.length === 0 ? name : `${name.charAt(0).toLowerCase()}${name.slice(1)}`;
}

export function factoryName(className: string): string {
  return `${lowerFirst(className)}FromJson`;
}

export function toJsonName(className: string): string {
  return `${lowerFirst(className)}ToJson`;
}

export function fieldMapName(className: string): string {
  return `${lowerFirst(className)}FieldMap`;
}

export function perFieldToJsonName(className: string): string {
  return `${lowerFirst(className)}PerFieldToJson`;
}

export function enumValuesName(enumName: string): string {
  return `${lowerFirst(enumName)}EnumValues`;
}

/**
 * Callback parameter carrying the conversion of one type parameter
 * (`fromJsonT`, `toJsonT`).
 */
export function typeArgumentCallback(
  direction: 'fromJson' | 'toJson',
  typeParameter: string
): string {
  return `${direction}${typeParameter}`;
}

/**
 * The one key an object literal treats as a prototype assignment unless it
 * is computed.
 */
export const PROTO_KEY = '__proto__';

/**
 * Renders an object literal key: bare when it is an identifier, quoted otherwise.
 * `__proto__` is rendered computed so it stays an own property.
 */
export function propertyKey(name: string): string {
  if (name === PROTO_KEY) return quotedPropertyKey(name);
  return IDENTIFIER_PATTERN.test(name) ? name : JSON.stringify(name);
}

/**
 * Renders an always-quoted object literal key (`"x"`, `["__proto__"]`).
 */
export function quotedPropertyKey(name: string): string {
  const quoted = JSON.stringify(name);
  return name === PROTO_KEY ? `[${quoted}]` : quoted;
}

/**
 * Renders a member access on `target` (`instance.x`, `instance["a-b"]`).
 */
export function memberAccess(target: string, name: string): string {
  return IDENTIFIER_PATTERN.test(name)
    ? `${target}.${name}`
    : `${target}[${JSON.stringify(name)}]`;
}

/**
 * Renders a JSON key lookup (`json["x"]`).
 */
export function jsonAccess(outputKey: string): string {
  return `json[${JSON.stringify(outputKey)}]`;
}

/**
 * Renders a static value as a JavaScript expression.
 *
 * Supports the values the static extractor produces: primitives (including
 * `undefined`, `NaN`, `Infinity`, `-0` and bigints), regular expressions,
 * arrays and plain objects.
 *
 * @param element - Owning element, named in errors.
 * @throws {ConfigurationError} For values without a literal form.
 */
export function renderLiteral(value: unknown, element: string): string {
  switch (typeof value) {
    case 'undefined':
      return 'undefined';
    case 'bigint':
      return `${value}n`;
    case 'boolean':
    case 'string':
      return JSON.stringify(value);
    case 'number':
      // String() already yields `NaN`, `Infinity` and `-Infinity`.
      return Object.is(value, -0) ? '-0' : String(value);
  }

  if (value === null) return 'null';
  if (value instanceof RegExp) return String(value);

  if (isArray(value)) {
    return `[${value.map(item => renderLiteral(item, element)).join(', ')}]`;
  }

  if (isPlainObject(value)) {
    const entries = Object.entries(value).map(
      ([key, item]) => `${propertyKey(key)}: ${renderLiteral(item, element)}`
    );
    return entries.length === 0 ? '{}' : `{ ${entries.join(', ')} }`;
  }

  throw new ConfigurationError(
    `The default value of "${element}" has no literal form.`,
    element
  );
}
