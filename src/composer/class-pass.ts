import type { ClassEmitContext } from '../emitter/context';
import type { AnnotatedClass, CompilationUnit, EnumModel, ResolvedConfig } from '../types';
import type { JsonClassPass, PassContext } from './pass';

import { mergeConfig } from '../config/merge';
import { emitDecodeFactory } from '../emitter/decode-factory';
import { emitEncodeFunction } from '../emitter/encode-function';
import { emitFieldMap, emitPerFieldToJson } from '../emitter/field-maps';
import { resolveEncodeFields, selectFields, unavailableReasons } from '../selector/select-fields';

/**
 * Merges the configuration of an annotated class.
 */
export function resolveClassConfig(element: AnnotatedClass, defaults: unknown): ResolvedConfig {
  const { model } = element;
  return mergeConfig(defaults, element.annotation, element.fieldAnnotations, {
    className: model.name,
    fieldNames: model.fields.map(field => field.name)
  });
}

export function unitEnums(unit: CompilationUnit): Map<string, EnumModel> {
  const enums = new Map<string, EnumModel>();
  for (const element of unit.elements) {
    if (element.kind === 'enum') enums.set(element.model.name, element.model);
  }
  return enums;
}

/**
 * Whether the companion module can import `name` from the source module.
 */
function isImportable(unit: CompilationUnit, name: string): boolean {
  return unit.exportedNames.includes(name) || unit.defaultExportName === name;
}

function reportClassWarnings(
  element: AnnotatedClass,
  config: ResolvedConfig,
  unit: CompilationUnit,
  context: PassContext
): void {
  const { model } = element;

  if (config.genericArgumentFactories && model.typeParameters.length === 0) {
    context.diagnostics.warning(
      'unused-generic-argument-factories',
      `genericArgumentFactories has no effect on "${model.name}": it declares no type parameters.`,
      model.name
    );
  }

  if ((config.createFactory || config.createToJson) && !isImportable(unit, model.name)) {
    context.diagnostics.warning(
      'class-not-exported',
      `"${model.name}" is not exported; the companion module cannot import it.`,
      model.name
    );
  }
}

/**
 * Generates the fragments of one class, in a fixed order: decode factory,
 * encode function, field map, per-field encoders, then the shared helpers
 * they requested.
 */
function generateClass(
  element: AnnotatedClass,
  unit: CompilationUnit,
  context: PassContext,
  enums: ReadonlyMap<string, EnumModel>
): string[] {
  const { model } = element;
  const config = resolveClassConfig(element, context.defaults);
  const selection = selectFields(model, config);

  reportClassWarnings(element, config, unit, context);
  for (const excluded of selection.excluded) {
    if (excluded.kind === 'setter-only') {
      context.diagnostics.warning(
        'setter-only-field',
        `Skipping "${model.name}.${excluded.field.name}": ${excluded.reason}`,
        `${model.name}.${excluded.field.name}`
      );
    }
  }

  const members: string[] = [];
  const emitContext: ClassEmitContext = {
    model,
    config,
    registry: context.registry,
    enums,
    addMember: fragment => members.push(fragment)
  };

  const fragments: string[] = [];
  let usedFields: ReadonlySet<string> | undefined;

  if (config.createFactory) {
    const factory = emitDecodeFactory(emitContext, selection.usable, unavailableReasons(selection));
    fragments.push(factory.output);
    usedFields = factory.usedFields;
  }

  const encodeFields = resolveEncodeFields(model, config, selection.usable, usedFields);

  if (config.createToJson) {
    fragments.push(emitEncodeFunction(emitContext, encodeFields));
  }

  if (config.createFieldMap) {
    fragments.push(emitFieldMap(emitContext, encodeFields));
  }

  if (config.createPerFieldToJson) {
    fragments.push(emitPerFieldToJson(emitContext, encodeFields));
  }

  return [...fragments, ...members];
}

export function createJsonClassPass(): JsonClassPass {
  return {
    kind: 'json-class',
    run(unit, context) {
      const enums = unitEnums(unit);
      const fragments: string[] = [];

      for (const element of unit.elements) {
        if (element.kind === 'class') {
          fragments.push(...generateClass(element, unit, context, enums));
        }
      }

      return { fragments, patches: [] };
    }
  };
}
