import type { EnumModel } from '../types';
import type { TypeReference } from './type-reference';

import { UnsupportedTypeError } from '../errors';
import { BUILT_IN_CONVERTERS } from './converters';

/**
 * Everything a converter may need besides the type itself.
 */
export type ConversionContext = {
  /**
   * Registry used for nested conversions (container elements, type arguments).
   */
  readonly registry: TypeRegistry;

  /**
   * Element being converted (`Point.x`), named in errors.
   */
  readonly element: string;

  readonly typeParameters: readonly string[];
  readonly genericArgumentFactories: boolean;

  /**
   * Enums known in the unit, by name.
   */
  readonly enums: ReadonlyMap<string, EnumModel>;

  /**
   * Contributes a shared helper fragment (deduplicated by the composer).
   */
  readonly addMember: (fragment: string) => void;
};

/**
 * Encode/decode expression templates for one family of types.
 *
 * `decode` and `encode` receive a side-effect free expression (`json["x"]`,
 * `instance.x`, a lambda parameter) and a non-nullable type; the registry
 * handles nullability around them.
 */
export interface TypeConverter {
  readonly id: string;
  matches(type: TypeReference, context: ConversionContext): boolean;
  decode(expression: string, type: TypeReference, context: ConversionContext): string;
  encode(expression: string, type: TypeReference, context: ConversionContext): string;
}

export type TypeRegistry = {
  readonly converters: readonly TypeConverter[];
  decode(expression: string, type: TypeReference, context: ConversionContext): string;
  encode(expression: string, type: TypeReference, context: ConversionContext): string;
};

/**
 * Wraps a conversion in a null check when the type admits `null` /
 * `undefined`. Pass-through conversions need no guard.
 */
function guardNullable(expression: string, converted: string, type: TypeReference): string {
  if (!type.nullable || converted === expression) return converted;
  return `${expression} == null ? null : ${converted}`;
}

/**
 * Creates a registry; custom converters are consulted before the built-ins.
 */
export function createTypeRegistry(
  customConverters: readonly TypeConverter[] = []
): TypeRegistry {
  const converters = [...customConverters, ...BUILT_IN_CONVERTERS];

  const find = (type: TypeReference, context: ConversionContext): TypeConverter => {
    const converter = converters.find(candidate => candidate.matches(type, context));
    if (!converter) {
      throw new UnsupportedTypeError(type.text, context.element);
    }
    return converter;
  };

  return {
    converters,

    decode(expression, type, context) {
      const nonNullable = { ...type, nullable: false };
      const converted = find(nonNullable, context).decode(expression, nonNullable, context);
      return guardNullable(expression, converted, type);
    },

    encode(expression, type, context) {
      const nonNullable = { ...type, nullable: false };
      const converted = find(nonNullable, context).encode(expression, nonNullable, context);
      return guardNullable(expression, converted, type);
    }
  };
}
