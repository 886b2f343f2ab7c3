import type { types } from 'estree-toolkit';
import type { EnumModel } from '../types';

import { ConfigurationError } from '../errors';
import { isPlainObject } from '../guards';
import { extractStaticValue } from './extractor';

/**
 * Unwraps `Object.freeze({...})`.
 */
function enumLiteral(init: types.Expression): types.Expression {
  if (
    init.type === 'CallExpression' &&
    init.callee.type === 'MemberExpression' &&
    init.callee.object.type === 'Identifier' &&
    init.callee.object.name === 'Object' &&
    init.callee.property.type === 'Identifier' &&
    init.callee.property.name === 'freeze' &&
    init.arguments.length === 1
  ) {
    const [argument] = init.arguments;
    if (argument && argument.type !== 'SpreadElement') return argument;
  }
  return init;
}

/**
 * Reads an `@enum` constant: `const Color = { Red: 'red', Green: 'green' }`,
 * optionally wrapped in `Object.freeze`. Values keep declaration order and
 * must be strings or numbers.
 *
 * @throws {ConfigurationError} For any other declaration shape or value.
 */
export function readEnumModel(declaration: types.VariableDeclaration): EnumModel {
  const [declarator] = declaration.declarations;

  if (
    declaration.declarations.length !== 1 ||
    !declarator ||
    declarator.id.type !== 'Identifier'
  ) {
    throw new ConfigurationError(
      'An @enum declaration must declare exactly one named constant.',
      null
    );
  }

  const name = declarator.id.name;
  const value = declarator.init
    ? extractStaticValue(enumLiteral(declarator.init), name)
    : undefined;

  if (!isPlainObject(value)) {
    throw new ConfigurationError(`@enum "${name}" must be initialized with an object literal.`, name);
  }

  const values = Object.values(value).map(entry => {
    if (typeof entry === 'string' || typeof entry === 'number') return entry;
    throw new ConfigurationError(`Values of @enum "${name}" must be strings or numbers.`, name);
  });

  return { name, values };
}
