import type { ClassModel, EnumModel, FieldDescriptor, ResolvedConfig } from '../types';
import type { ConversionContext, TypeRegistry } from './type-registry';
import type { TypeReference } from './type-reference';

import { parseTypeReference } from './type-reference';
import { typeArgumentCallback } from './naming';

/**
 * Inputs shared by every fragment of one class.
 */
export type ClassEmitContext = {
  readonly model: ClassModel;
  readonly config: ResolvedConfig;
  readonly registry: TypeRegistry;
  readonly enums: ReadonlyMap<string, EnumModel>;
  readonly addMember: (fragment: string) => void;
};

/**
 * `true` when the generated functions take one callback per type parameter.
 */
export function usesTypeArgumentCallbacks(context: ClassEmitContext): boolean {
  return context.config.genericArgumentFactories && context.model.typeParameters.length > 0;
}

/**
 * Extra parameters after `json` / `instance` (`fromJsonT`, `toJsonT`, ...).
 */
export function typeArgumentParameters(
  context: ClassEmitContext,
  direction: 'fromJson' | 'toJson'
): string[] {
  if (!usesTypeArgumentCallbacks(context)) return [];
  return context.model.typeParameters.map(name => typeArgumentCallback(direction, name));
}

export function conversionContext(
  context: ClassEmitContext,
  field: FieldDescriptor
): ConversionContext {
  return {
    registry: context.registry,
    element: `${context.model.name}.${field.name}`,
    typeParameters: context.model.typeParameters,
    genericArgumentFactories: context.config.genericArgumentFactories,
    enums: context.enums,
    addMember: context.addMember
  };
}

export function fieldType(context: ClassEmitContext, field: FieldDescriptor): TypeReference {
  return parseTypeReference(field.type, `${context.model.name}.${field.name}`);
}
