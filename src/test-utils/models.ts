import type { ClassEmitContext } from '../emitter/context';
import type {
  AnnotatedClass,
  ClassModel,
  CompilationUnit,
  ConstructorParameter,
  EnumModel,
  FieldDescriptor
} from '../types';

import { mergeConfig } from '../config/merge';
import { createTypeRegistry } from '../emitter/type-registry';

/**
 * Public, readable and writable field.
 */
export function field(
  name: string,
  type = 'number',
  overrides: Partial<Omit<FieldDescriptor, 'name' | 'type'>> = {}
): FieldDescriptor {
  return {
    name,
    type,
    visibility: 'public',
    isFinal: false,
    hasGetter: true,
    hasSetter: true,
    ...overrides
  };
}

export function required(name: string): ConstructorParameter {
  return { name, isOptional: false };
}

export function optional(name: string): ConstructorParameter {
  return { name, isOptional: true };
}

export function classModel(
  name: string,
  fields: readonly FieldDescriptor[],
  constructorParameters: readonly ConstructorParameter[] = fields.map(entry => required(entry.name)),
  extra: Partial<Pick<ClassModel, 'typeParameters' | 'supertype'>> = {}
): ClassModel {
  return {
    name,
    fields,
    constructorParameters,
    typeParameters: extra.typeParameters ?? [],
    supertype: extra.supertype ?? null
  };
}

export function annotatedClass(
  model: ClassModel,
  annotation: unknown = true,
  fieldAnnotations: unknown = undefined
): AnnotatedClass {
  return { kind: 'class', model, annotation, fieldAnnotations };
}

export function compilationUnit(
  elements: CompilationUnit['elements'],
  overrides: Partial<Omit<CompilationUnit, 'elements'>> = {}
): CompilationUnit {
  return {
    path: 'src/model.js',
    source: '',
    exportedNames: elements.map(element => element.model.name),
    defaultExportName: null,
    importedBindings: [],
    ...overrides,
    elements
  };
}

/**
 * Emit context over a merged configuration; shared helpers land in `members`.
 */
export function emitContext(
  model: ClassModel,
  annotation: unknown = true,
  fieldAnnotations: unknown = undefined,
  enums: readonly EnumModel[] = []
): { context: ClassEmitContext; members: string[] } {
  const members: string[] = [];
  const config = mergeConfig(undefined, annotation, fieldAnnotations, {
    className: model.name,
    fieldNames: model.fields.map(entry => entry.name)
  });

  return {
    context: {
      model,
      config,
      registry: createTypeRegistry(),
      enums: new Map(enums.map(entry => [entry.name, entry])),
      addMember: fragment => members.push(fragment)
    },
    members
  };
}
