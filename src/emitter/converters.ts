import type { ConversionContext, TypeConverter } from './type-registry';
import type { TypeReference } from './type-reference';

import {
  ENUM_DECODE_HELPER,
  ENUM_DECODE_HELPER_NAME,
  enumValuesFragment
} from './helpers';
import { enumValuesName, typeArgumentCallback } from './naming';

/**
 * Lambda parameter names used for nested conversions. Shadowing in nested
 * lambdas is intended: every level only reads its own parameter.
 */
const ELEMENT = 'e';
const KEY = 'k';

function isPlain(type: TypeReference, ...names: string[]): boolean {
  return type.args.length === 0 && names.includes(type.name);
}

/**
 * Converter whose encode side is a pass-through.
 */
function scalar(
  id: string,
  names: readonly string[],
  decode: (expression: string) => string,
  encode: (expression: string) => string = expression => expression
): TypeConverter {
  return {
    id,
    matches: type => isPlain(type, ...names),
    decode: expression => decode(expression),
    encode: expression => encode(expression)
  };
}

/**
 * Returns the single type argument of a one-argument generic, or `undefined`.
 */
function onlyArgument(type: TypeReference): TypeReference | undefined {
  return type.args.length === 1 ? type.args[0] : undefined;
}

/**
 * Returns the value type of a `<string, V>` generic, or `undefined`.
 */
function stringKeyedValue(type: TypeReference): TypeReference | undefined {
  const [keyType, valueType] = type.args;
  if (type.args.length !== 2 || !keyType || !valueType) return undefined;
  return isPlain(keyType, 'string') && !keyType.nullable ? valueType : undefined;
}

const identityConverter = scalar('identity', ['unknown', 'any', 'object'], e => e);

const stringConverter = scalar('string', ['string'], e => `String(${e})`);

const numberConverter = scalar('number', ['number'], e => `Number(${e})`);

const booleanConverter = scalar('boolean', ['boolean'], e => e);

const bigintConverter = scalar(
  'bigint',
  ['bigint'],
  e => `BigInt(${e})`,
  e => `${e}.toString()`
);

const dateConverter = scalar(
  'date',
  ['Date'],
  e => `new Date(${e})`,
  e => `${e}.toISOString()`
);

const urlConverter = scalar(
  'url',
  ['URL'],
  e => `new URL(${e})`,
  e => `${e}.toString()`
);

const arrayConverter: TypeConverter = {
  id: 'array',
  matches: type =>
    (type.name === 'Array' || type.name === 'ReadonlyArray') &&
    onlyArgument(type) !== undefined,
  decode(expression, type, context) {
    const inner = nested('decode', ELEMENT, onlyArgument(type), context);
    return inner === ELEMENT
      ? `Array.from(${expression})`
      : `${expression}.map((${ELEMENT}) => ${inner})`;
  },
  encode(expression, type, context) {
    const inner = nested('encode', ELEMENT, onlyArgument(type), context);
    return inner === ELEMENT ? expression : `${expression}.map((${ELEMENT}) => ${inner})`;
  }
};

const setConverter: TypeConverter = {
  id: 'set',
  matches: type =>
    (type.name === 'Set' || type.name === 'ReadonlySet') &&
    onlyArgument(type) !== undefined,
  decode(expression, type, context) {
    const inner = nested('decode', ELEMENT, onlyArgument(type), context);
    return inner === ELEMENT
      ? `new Set(${expression})`
      : `new Set(${expression}.map((${ELEMENT}) => ${inner}))`;
  },
  encode(expression, type, context) {
    const inner = nested('encode', ELEMENT, onlyArgument(type), context);
    return inner === ELEMENT
      ? `Array.from(${expression})`
      : `Array.from(${expression}, (${ELEMENT}) => ${inner})`;
  }
};

const recordConverter: TypeConverter = {
  id: 'record',
  matches: type => type.name === 'Record' && stringKeyedValue(type) !== undefined,
  decode(expression, type, context) {
    const inner = nested('decode', ELEMENT, stringKeyedValue(type), context);
    return inner === ELEMENT
      ? `{ ...${expression} }`
      : `Object.fromEntries(Object.entries(${expression}).map(([${KEY}, ${ELEMENT}]) => [${KEY}, ${inner}]))`;
  },
  encode(expression, type, context) {
    const inner = nested('encode', ELEMENT, stringKeyedValue(type), context);
    return inner === ELEMENT
      ? expression
      : `Object.fromEntries(Object.entries(${expression}).map(([${KEY}, ${ELEMENT}]) => [${KEY}, ${inner}]))`;
  }
};

const mapConverter: TypeConverter = {
  id: 'map',
  matches: type =>
    (type.name === 'Map' || type.name === 'ReadonlyMap') &&
    stringKeyedValue(type) !== undefined,
  decode(expression, type, context) {
    const inner = nested('decode', ELEMENT, stringKeyedValue(type), context);
    return inner === ELEMENT
      ? `new Map(Object.entries(${expression}))`
      : `new Map(Object.entries(${expression}).map(([${KEY}, ${ELEMENT}]) => [${KEY}, ${inner}]))`;
  },
  encode(expression, type, context) {
    const inner = nested('encode', ELEMENT, stringKeyedValue(type), context);
    return inner === ELEMENT
      ? `Object.fromEntries(${expression})`
      : `Object.fromEntries(Array.from(${expression}, ([${KEY}, ${ELEMENT}]) => [${KEY}, ${inner}]))`;
  }
};

/**
 * Enums declared in the unit. Decoding validates membership through the
 * shared `$enumDecode` helper; encoding passes the value through.
 */
const enumConverter: TypeConverter = {
  id: 'enum',
  matches: (type, context) => type.args.length === 0 && context.enums.has(type.name),
  decode(expression, type, context) {
    const model = context.enums.get(type.name);
    if (model) {
      context.addMember(enumValuesFragment(model));
    }
    context.addMember(ENUM_DECODE_HELPER);
    return `${ENUM_DECODE_HELPER_NAME}(${enumValuesName(type.name)}, ${expression}, ${JSON.stringify(type.name)})`;
  },
  encode: expression => expression
};

/**
 * Type parameters of the class being generated. With generic argument
 * factories the conversion is delegated to the `fromJsonT` / `toJsonT`
 * callbacks; without, values pass through.
 */
const typeParameterConverter: TypeConverter = {
  id: 'type-parameter',
  matches: (type, context) =>
    type.args.length === 0 && context.typeParameters.includes(type.name),
  decode: (expression, type, context) =>
    context.genericArgumentFactories
      ? `${typeArgumentCallback('fromJson', type.name)}(${expression})`
      : expression,
  encode: (expression, type, context) =>
    context.genericArgumentFactories
      ? `${typeArgumentCallback('toJson', type.name)}(${expression})`
      : expression
};

/**
 * Capitalized built-ins that are never convertible classes.
 */
const RESERVED_NAMES = new Set([
  'Array',
  'ReadonlyArray',
  'Set',
  'ReadonlySet',
  'Map',
  'ReadonlyMap',
  'Record',
  'Date',
  'URL',
  'Object',
  'Promise',
  'Function'
]);

/**
 * Any other capitalized name is a convertible class: it exposes
 * `static fromJson(json, ...)` and `toJson(...)`, taking one conversion
 * lambda per type argument.
 */
const convertibleClassConverter: TypeConverter = {
  id: 'convertible-class',
  matches: type =>
    !RESERVED_NAMES.has(type.name) &&
    /^[A-Z][\w$]*(?:\.[A-Za-z_$][\w$]*)*$/.test(type.name),
  decode(expression, type, context) {
    const lambdas = type.args.map(
      arg => `(${ELEMENT}) => ${context.registry.decode(ELEMENT, arg, context)}`
    );
    return `${type.name}.fromJson(${[expression, ...lambdas].join(', ')})`;
  },
  encode(expression, type, context) {
    const lambdas = type.args.map(
      arg => `(${ELEMENT}) => ${context.registry.encode(ELEMENT, arg, context)}`
    );
    return `${expression}.toJson(${lambdas.join(', ')})`;
  }
};

/**
 * Converts a nested value through the registry.
 */
function nested(
  direction: 'decode' | 'encode',
  expression: string,
  type: TypeReference | undefined,
  context: ConversionContext
): string {
  // `matches` guarantees the argument exists; keep the type checker honest.
  if (!type) return expression;
  return context.registry[direction](expression, type, context);
}

/**
 * Built-in converters in lookup order. Enum and type-parameter lookups come
 * before the convertible-class fallback, which accepts any capitalized name.
 */
export const BUILT_IN_CONVERTERS: readonly TypeConverter[] = [
  identityConverter,
  stringConverter,
  numberConverter,
  booleanConverter,
  bigintConverter,
  dateConverter,
  urlConverter,
  arrayConverter,
  setConverter,
  recordConverter,
  mapConverter,
  enumConverter,
  typeParameterConverter,
  convertibleClassConverter
];
