import type { types } from 'estree-toolkit';
import type { ImportBinding } from '../types';

/**
 * Class declaration node; `export default class {}` may omit the name.
 */
export type ClassNode =
  | types.ClassDeclaration
  | Extract<types.ExportDefaultDeclaration['declaration'], { type: 'ClassDeclaration' }>;

/**
 * A class declaration found at the top level of a module, together with the
 * statement carrying it (`export class ...` starts at `export`).
 */
export type LocatedClass = {
  readonly node: ClassNode;
  readonly statement: types.Program['body'][number];
};

/**
 * Unwraps `export` / `export default` around a top-level class declaration.
 */
export function classOfStatement(
  statement: types.Program['body'][number]
): ClassNode | null {
  switch (statement.type) {
    case 'ClassDeclaration':
      return statement;
    case 'ExportNamedDeclaration':
      return statement.declaration?.type === 'ClassDeclaration' ? statement.declaration : null;
    case 'ExportDefaultDeclaration':
      return statement.declaration.type === 'ClassDeclaration' ? statement.declaration : null;
    default:
      return null;
  }
}

/**
 * Top-level class declarations in source order.
 */
export function topLevelClasses(program: types.Program): LocatedClass[] {
  const classes: LocatedClass[] = [];

  for (const statement of program.body) {
    const node = classOfStatement(statement);
    if (node) classes.push({ node, statement });
  }

  return classes;
}

/**
 * Finds a top-level class by name, or `null`.
 */
export function findClass(program: types.Program, name: string): LocatedClass | null {
  return topLevelClasses(program).find(located => located.node.id?.name === name) ?? null;
}

/**
 * Static, non-computed name of a class member or object property key.
 * Private names (`#x`) and computed keys yield `null`.
 */
export function memberName(
  key: types.Expression | types.PrivateIdentifier,
  computed: boolean
): string | null {
  if (computed) return null;
  if (key.type === 'Identifier') return key.name;
  if (key.type === 'Literal' && typeof key.value === 'string') return key.value;
  return null;
}

/**
 * `true` when the class body declares a member called `name` with the given
 * staticness, as a method, accessor or field.
 */
export function hasMember(
  classNode: ClassNode,
  name: string,
  isStatic: boolean
): boolean {
  return classNode.body.body.some(
    member =>
      member.type !== 'StaticBlock' &&
      member.static === isStatic &&
      memberName(member.key, member.computed) === name
  );
}

/**
 * Top-level import declarations in source order.
 */
export function importDeclarations(program: types.Program): types.ImportDeclaration[] {
  return program.body.filter(
    (statement): statement is types.ImportDeclaration => statement.type === 'ImportDeclaration'
  );
}

function moduleExportName(node: types.Identifier | types.Literal): string {
  return node.type === 'Identifier' ? node.name : String(node.value);
}

/**
 * Local names bound by the named specifiers of an import
 * (`import { a, b as c }` -> `['a', 'c']`).
 */
export function namedImportBindings(declaration: types.ImportDeclaration): string[] {
  const names: string[] = [];

  for (const specifier of declaration.specifiers) {
    if (specifier.type === 'ImportSpecifier') names.push(specifier.local.name);
  }

  return names;
}

/**
 * Names a module exports under their own local name: exported declarations
 * and `export { a }` specifiers. Default exports are left out.
 */
export function exportedNames(program: types.Program): string[] {
  const names: string[] = [];

  for (const statement of program.body) {
    if (statement.type !== 'ExportNamedDeclaration') continue;

    const { declaration } = statement;
    if (declaration?.type === 'ClassDeclaration' || declaration?.type === 'FunctionDeclaration') {
      if (declaration.id) names.push(declaration.id.name);
    } else if (declaration?.type === 'VariableDeclaration') {
      for (const declarator of declaration.declarations) {
        if (declarator.id.type === 'Identifier') names.push(declarator.id.name);
      }
    }

    if (statement.source) continue;
    for (const specifier of statement.specifiers) {
      const local = moduleExportName(specifier.local);
      if (local === moduleExportName(specifier.exported)) names.push(local);
    }
  }

  return names;
}

/**
 * Local name behind the module's default export:
 * `export default class Point {}`, `export default Point` or
 * `export { Point as default }`. Anonymous defaults yield `null`.
 */
export function defaultExportName(program: types.Program): string | null {
  for (const statement of program.body) {
    if (statement.type === 'ExportDefaultDeclaration') {
      const { declaration } = statement;
      if (declaration.type === 'ClassDeclaration' || declaration.type === 'FunctionDeclaration') {
        return declaration.id ? declaration.id.name : null;
      }
      return declaration.type === 'Identifier' ? declaration.name : null;
    }

    if (statement.type !== 'ExportNamedDeclaration' || statement.source) continue;
    for (const specifier of statement.specifiers) {
      if (moduleExportName(specifier.exported) === 'default') {
        return moduleExportName(specifier.local);
      }
    }
  }

  return null;
}

/**
 * Every binding created by the module's import declarations.
 */
export function importBindings(program: types.Program): ImportBinding[] {
  const bindings: ImportBinding[] = [];

  for (const declaration of importDeclarations(program)) {
    const source = String(declaration.source.value);

    for (const specifier of declaration.specifiers) {
      const local = specifier.local.name;

      switch (specifier.type) {
        case 'ImportSpecifier':
          bindings.push({ kind: 'named', imported: moduleExportName(specifier.imported), local, source });
          break;
        case 'ImportDefaultSpecifier':
          bindings.push({ kind: 'default', imported: 'default', local, source });
          break;
        case 'ImportNamespaceSpecifier':
          bindings.push({ kind: 'namespace', imported: '*', local, source });
          break;
      }
    }
  }

  return bindings;
}
