import type { types } from 'estree-toolkit';
import type { AnnotatedElement, CompilationUnit, ModelProvider } from '../types';
import type { LocatedClass } from '../source/locate';

import { leadingJsDoc, parseJsDoc } from '../source/jsdoc';
import {
  classOfStatement,
  exportedNames,
  defaultExportName,
  importBindings,
  topLevelClasses
} from '../source/locate';
import { parseModule, rangeOf } from '../source/parse';
import { type ModuleContext, readClassAnnotations, readClassModel } from './class-model';
import { readEnumModel } from './enum-model';

export {
  CLASS_ANNOTATION_PROPERTY,
  FIELD_ANNOTATIONS_PROPERTY
} from './class-model';

function variableDeclarationOf(
  statement: types.Program['body'][number]
): types.VariableDeclaration | null {
  if (statement.type === 'VariableDeclaration') return statement;
  if (
    statement.type === 'ExportNamedDeclaration' &&
    statement.declaration?.type === 'VariableDeclaration'
  ) {
    return statement.declaration;
  }
  return null;
}

/**
 * Default {@link ModelProvider}: reads annotated classes and `@enum`
 * constants from a JavaScript module.
 *
 * @example
 * ```js
 * export class Point {
 *   static jsonSerializable = { createFieldMap: true };
 *   static jsonKeys = { y: { name: 'why' } };
 *
 *   constructor(x, y = 0) {
 *     this.x = x;
 *     this.y = y;
 *   }
 * }
 * ```
 *
 * Elements keep source order.
 *
 * @throws {SourceParseError} When the module does not parse.
 * @throws {ConfigurationError} For dynamic annotation values or unsupported
 *         declaration shapes.
 */
export const readUnit: ModelProvider = (path, source) => {
  const { program, comments } = parseModule(source, path);

  const classes = new Map<string, LocatedClass>();
  for (const located of topLevelClasses(program)) {
    if (located.node.id) classes.set(located.node.id.name, located);
  }

  const context: ModuleContext = { source, comments, classes };
  const elements: AnnotatedElement[] = [];

  for (const statement of program.body) {
    const node = classOfStatement(statement);

    if (node) {
      const className = node.id?.name ?? 'default';
      const { annotated, annotation, fieldAnnotations } = readClassAnnotations(node, className);

      if (annotated) {
        elements.push({
          kind: 'class',
          model: readClassModel({ node, statement }, context),
          annotation,
          fieldAnnotations
        });
      }
      continue;
    }

    const declaration = variableDeclarationOf(statement);
    if (!declaration) continue;

    const tags = parseJsDoc(leadingJsDoc(source, comments, rangeOf(statement)[0]));
    if (tags.enum) {
      elements.push({ kind: 'enum', model: readEnumModel(declaration) });
    }
  }

  return {
    path,
    source,
    elements,
    exportedNames: exportedNames(program),
    defaultExportName: defaultExportName(program),
    importedBindings: importBindings(program)
  } satisfies CompilationUnit;
};
