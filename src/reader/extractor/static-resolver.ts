import { is, types } from 'estree-toolkit';
import { type StaticResult, UNRESOLVED, resolved } from './constants';

/**
 * Resolves atomic values from ESTree `Literal` nodes.
 *
 * Supported: `string`, `number`, `boolean`, `bigint`, `null` and regular
 * expressions. The parser pre-evaluates `node.value`, so a regex literal
 * already carries a `RegExp` instance.
 */
function tryResolveLiteral(node: types.Node): StaticResult {
  if (is.literal(node)) {
    switch (typeof node.value) {
      case 'string':
      case 'number':
      case 'boolean':
      case 'bigint':
        return resolved(node.value);

      case 'object':
        if (node.value === null) {
          return resolved(null);
        }
        if (node.value instanceof RegExp) {
          return resolved(node.value);
        }
        break;
    }
  }
  return UNRESOLVED;
}

/**
 * Resolves the global constants `undefined`, `NaN` and `Infinity`.
 *
 * They are identifiers syntactically; static analysis treats them as
 * constants so `{ fallback: undefined }` and `{ fallback: void 0 }` produce
 * the same data.
 */
function tryResolveIdentifier(node: types.Node): StaticResult {
  if (is.identifier(node)) {
    switch (node.name) {
      case 'undefined':
        return resolved(undefined);
      case 'NaN':
        return resolved(NaN);
      case 'Infinity':
        return resolved(Infinity);
    }
  }
  return UNRESOLVED;
}

/**
 * Resolves signed numeric constants and `void 0`.
 *
 * Default values are commonly written as `-1` or `-Infinity`, which parse as
 * a unary minus applied to a literal. Only numeric and bigint operands are
 * folded.
 */
function tryResolveUnary(node: types.Node): StaticResult {
  if (!is.unaryExpression(node)) return UNRESOLVED;

  const operand = tryResolveStaticValue(node.argument);
  if (!operand.success) return UNRESOLVED;

  switch (node.operator) {
    case 'void':
      return resolved(undefined);
    case '-':
      if (typeof operand.value === 'number') return resolved(-operand.value);
      if (typeof operand.value === 'bigint') return resolved(-operand.value);
      break;
    case '+':
      if (typeof operand.value === 'number') return resolved(operand.value);
      break;
  }

  return UNRESOLVED;
}

/**
 * Resolves template strings whose interpolations are all static.
 *
 * Quasis frame the structure (`quasis.length === expressions.length + 1`),
 * so the loop runs over them and stitches the interpolations in between.
 * `cooked` is used; it is undefined for invalid escapes, which fails the
 * resolution. Interpolated values go through `${}` so `null` renders as
 * `"null"`.
 *
 * @example
 * `v${1}.${0}` -> "v1.0"
 */
function tryResolveTemplate(node: types.Node): StaticResult {
  if (is.templateLiteral(node)) {
    const parts: string[] = [];
    const expressions = node.expressions;

    for (const [index, quasi] of node.quasis.entries()) {
      const text = quasi.value.cooked;
      if (typeof text !== 'string') return UNRESOLVED;

      parts.push(text);

      if (index < expressions.length) {
        const expression = expressions[index];
        if (!expression) return UNRESOLVED;

        const result = tryResolveStaticValue(expression);
        if (!result.success) return UNRESOLVED;

        parts.push(`${result.value}`);
      }
    }

    return resolved(parts.join(''));
  }
  return UNRESOLVED;
}

/**
 * Resolves an AST node into an atomic static value.
 *
 * Scope is strictly declarative data: primitives, global constants, signed
 * numbers and static template strings. Binary, logical and conditional
 * expressions are not folded and resolve as failures.
 */
export function tryResolveStaticValue(node: types.Node): StaticResult {
  let result: StaticResult;

  if ((result = tryResolveLiteral(node)).success) return result;
  if ((result = tryResolveIdentifier(node)).success) return result;
  if ((result = tryResolveUnary(node)).success) return result;
  if ((result = tryResolveTemplate(node)).success) return result;

  return UNRESOLVED;
}
