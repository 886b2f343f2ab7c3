import type { SingleSpliceStrategy, InPlaceIdempotency } from '../architecture';
import type { types } from 'estree-toolkit';
import type { ClassModel, CompilationUnit, PatchInstruction, ResolvedConfig } from '../types';
import type { LocatedClass } from '../source/locate';
import type { InPlacePass } from './pass';

import { ClassNotFoundError } from '../errors';
import { factoryName, toJsonName, typeArgumentCallback } from '../emitter/naming';
import { findClass, hasMember, importDeclarations, namedImportBindings } from '../source/locate';
import { parseModule, rangeOf } from '../source/parse';
import { resolveClassConfig } from './class-pass';

const INDENT = '  ';

/**
 * Leading whitespace of the line `offset` sits on.
 */
function lineIndent(source: string, offset: number): string {
  const lineStart = source.lastIndexOf('\n', offset - 1) + 1;
  return /^[ \t]*/.exec(source.slice(lineStart, offset))?.[0] ?? '';
}

function method(indent: string, signature: string, statement: string): string {
  return `${indent}${signature} {\n${indent}${INDENT}${statement}\n${indent}}`;
}

/**
 * Delegating members a class still lacks.
 */
function missingMembers(
  located: LocatedClass,
  model: ClassModel,
  config: ResolvedConfig,
  indent: string
): string[] {
  const generic = config.genericArgumentFactories && model.typeParameters.length > 0;
  const members: string[] = [];

  if (config.createFactory && !hasMember(located.node, 'fromJson', true)) {
    const callbacks = generic
      ? model.typeParameters.map(name => typeArgumentCallback('fromJson', name))
      : [];
    const parameters = ['json', ...callbacks].join(', ');
    members.push(
      method(
        indent,
        `static fromJson(${parameters})`,
        `return ${factoryName(model.name)}(${parameters});`
      )
    );
  }

  if (config.createToJson && !hasMember(located.node, 'toJson', false)) {
    const callbacks = generic
      ? model.typeParameters.map(name => typeArgumentCallback('toJson', name))
      : [];
    members.push(
      method(
        indent,
        `toJson(${callbacks.join(', ')})`,
        `return ${toJsonName(model.name)}(${['this', ...callbacks].join(', ')});`
      )
    );
  }

  return members;
}

/**
 * One zero-width insertion after the last member of the class body. The
 * whitespace in front of the closing brace is kept as it is.
 */
function memberInsertion(
  unit: CompilationUnit,
  located: LocatedClass,
  members: readonly string[]
): PatchInstruction {
  const { source } = unit;
  const [, bodyEnd] = rangeOf(located.node.body);
  const closingBrace = bodyEnd - 1;

  let offset = closingBrace;
  while (offset > 0 && /\s/.test(source.charAt(offset - 1))) offset--;

  const classIndent = lineIndent(source, rangeOf(located.statement)[0]);
  const isEmptyBody = source.charAt(offset - 1) === '{';
  const trailing = source.slice(offset, closingBrace);

  const text =
    members.map((member, index) => (index === 0 && isEmptyBody ? '\n' : '\n\n') + member).join('') +
    (trailing.includes('\n') ? '' : `\n${classIndent}`);

  return { filePath: unit.path, startOffset: offset, endOffset: offset, replacementText: text };
}

function importStatement(names: readonly string[], specifier: string): string {
  return `import { ${names.join(', ')} } from ${JSON.stringify(specifier)};`;
}

function isPlainNamedImport(declaration: types.ImportDeclaration): boolean {
  return declaration.specifiers.every(
    specifier =>
      specifier.type === 'ImportSpecifier' &&
      specifier.imported.type === 'Identifier' &&
      specifier.imported.name === specifier.local.name
  );
}

/**
 * Adds or extends the import of the companion module.
 *
 * - Import listing every name: nothing to do.
 * - Plain named import missing names: replaced by the full list.
 * - Import with aliases, default or namespace bindings: a second import for
 *   the missing names is added after it.
 * - No import: added after the last import, or at the top of the module.
 */
function companionImport(
  unit: CompilationUnit,
  program: types.Program,
  specifier: string,
  names: readonly string[]
): PatchInstruction | null {
  const imports = importDeclarations(program);
  const existing = imports.find(declaration => declaration.source.value === specifier);

  if (existing) {
    const present = namedImportBindings(existing);
    const missing = names.filter(name => !present.includes(name));
    if (missing.length === 0) return null;

    const [start, end] = rangeOf(existing);

    if (isPlainNamedImport(existing)) {
      return {
        filePath: unit.path,
        startOffset: start,
        endOffset: end,
        replacementText: importStatement([...present, ...missing], specifier)
      };
    }

    return {
      filePath: unit.path,
      startOffset: end,
      endOffset: end,
      replacementText: `\n${importStatement(missing, specifier)}`
    };
  }

  const last = imports.at(-1);
  if (last) {
    const [, end] = rangeOf(last);
    return {
      filePath: unit.path,
      startOffset: end,
      endOffset: end,
      replacementText: `\n${importStatement(names, specifier)}`
    };
  }

  // A hashbang must stay on the first line.
  const offset = unit.source.startsWith('#!') ? unit.source.indexOf('\n') + 1 : 0;
  return {
    filePath: unit.path,
    startOffset: offset,
    endOffset: offset,
    replacementText: `${importStatement(names, specifier)}\n\n`
  };
}

/**
 * Patches delegating members into annotated classes:
 *
 * ```js
 * static fromJson(json) {
 *   return pointFromJson(json);
 * }
 *
 * toJson() {
 *   return pointToJson(this);
 * }
 * ```
 *
 * plus the import of the companion functions they call. See
 * {@link SingleSpliceStrategy} and {@link InPlaceIdempotency}.
 *
 * A class the source does not declare is reported as a `class-not-found`
 * error diagnostic; only its patch is dropped.
 */
export function createInPlacePass(): InPlacePass {
  return {
    kind: 'in-place',
    run(unit, context) {
      const classes = unit.elements.flatMap(element => (element.kind === 'class' ? [element] : []));
      if (classes.length === 0) return { fragments: [], patches: [] };

      const { program } = parseModule(unit.source, unit.path);
      const patches: PatchInstruction[] = [];
      const importNames = new Set<string>();

      for (const element of classes) {
        const { model } = element;
        const config = resolveClassConfig(element, context.defaults);
        if (!config.createFactory && !config.createToJson) continue;

        const located = findClass(program, model.name);
        if (!located) {
          const error = new ClassNotFoundError(model.name, unit.path);
          context.diagnostics.reportError(error);
          continue;
        }

        if (config.createFactory) importNames.add(factoryName(model.name));
        if (config.createToJson) importNames.add(toJsonName(model.name));

        const indent = lineIndent(unit.source, rangeOf(located.statement)[0]) + INDENT;
        const members = missingMembers(located, model, config, indent);
        if (members.length > 0) {
          patches.push(memberInsertion(unit, located, members));
        }
      }

      if (importNames.size > 0) {
        const patch = companionImport(unit, program, context.companionSpecifier, [...importNames]);
        if (patch) patches.push(patch);
      }

      return { fragments: [], patches };
    }
  };
}
