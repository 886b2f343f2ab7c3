import { basename, extname } from 'node:path';

import type { CompilationUnit, ImportBinding } from '../types';

export const COMPANION_HEADER = '// Generated by class-json-codegen. Do not edit.';

/**
 * `src/point.js` + `.g` -> `src/point.g.js`.
 */
export function companionPath(sourcePath: string, suffix: string): string {
  const extension = extname(sourcePath);
  return `${sourcePath.slice(0, sourcePath.length - extension.length)}${suffix}${extension}`;
}

/**
 * Relative specifier of a sibling file (`./point.g.js`).
 */
export function siblingSpecifier(filePath: string): string {
  return `./${basename(filePath)}`;
}

function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/**
 * `true` when `name` occurs in `code` as a whole identifier.
 */
export function referencesName(code: string, name: string): boolean {
  return new RegExp(`(?<![\\w$])${escapeRegExp(name)}(?![\\w$])`).test(code);
}

function renderBindings(source: string, bindings: readonly ImportBinding[]): string[] {
  const statements: string[] = [];
  const specifier = JSON.stringify(source);
  const named: string[] = [];

  for (const binding of bindings) {
    switch (binding.kind) {
      case 'default':
        statements.push(`import ${binding.local} from ${specifier};`);
        break;
      case 'namespace':
        statements.push(`import * as ${binding.local} from ${specifier};`);
        break;
      case 'named':
        named.push(
          binding.imported === binding.local
            ? binding.local
            : `${binding.imported} as ${binding.local}`
        );
        break;
    }
  }

  if (named.length > 0) {
    statements.push(`import { ${named.join(', ')} } from ${specifier};`);
  }
  return statements;
}

/**
 * Import statements of the companion module:
 *
 * 1. the exported names of the source module the output references, and
 *    its default export when referenced and not exported by name;
 * 2. the source module's own import bindings the output references, with
 *    their original specifiers (both files live in the same directory).
 *
 * Bindings of the companion itself are skipped.
 */
export function companionImports(
  unit: CompilationUnit,
  output: string,
  specifiers: { readonly source: string; readonly companion: string }
): string[] {
  const fromSource = unit.exportedNames.filter(name => referencesName(output, name));
  const taken = new Set(fromSource);

  const { defaultExportName } = unit;
  const defaultImport =
    defaultExportName !== null &&
    !taken.has(defaultExportName) &&
    referencesName(output, defaultExportName)
      ? defaultExportName
      : null;
  if (defaultImport !== null) taken.add(defaultImport);

  const bindingsBySource = new Map<string, ImportBinding[]>();
  for (const binding of unit.importedBindings) {
    if (
      binding.source === specifiers.companion ||
      taken.has(binding.local) ||
      !referencesName(output, binding.local)
    ) {
      continue;
    }

    taken.add(binding.local);
    const group = bindingsBySource.get(binding.source);
    if (group) group.push(binding);
    else bindingsBySource.set(binding.source, [binding]);
  }

  const sourceSpecifier = JSON.stringify(specifiers.source);
  const statements: string[] = [];
  if (defaultImport !== null) {
    statements.push(`import ${defaultImport} from ${sourceSpecifier};`);
  }
  if (fromSource.length > 0) {
    statements.push(`import { ${fromSource.join(', ')} } from ${sourceSpecifier};`);
  }
  for (const [source, bindings] of bindingsBySource) {
    statements.push(...renderBindings(source, bindings));
  }
  return statements;
}

/**
 * Full text of the companion module.
 */
export function renderCompanion(
  unit: CompilationUnit,
  output: string,
  specifiers: { readonly source: string; readonly companion: string }
): string {
  const imports = companionImports(unit, output, specifiers);
  const sections = [COMPANION_HEADER, ...(imports.length > 0 ? [imports.join('\n')] : []), output];
  return `${sections.join('\n\n')}\n`;
}
