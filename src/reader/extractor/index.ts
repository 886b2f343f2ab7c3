import type { types } from 'estree-toolkit';
import { is } from 'estree-toolkit';

import { ConfigurationError } from '../../errors';

import { extractPropertyKey } from './key-extractor';
import { tryResolveStaticValue } from './static-resolver';

/**
 * Builds a human-readable path label for diagnostics.
 *
 * String segments use dot notation, numeric segments bracket notation:
 *   formatPath("Point.jsonKeys", "y")        -> "Point.jsonKeys.y"
 *   formatPath("Point.jsonKeys.y.tags", 0)   -> "Point.jsonKeys.y.tags[0]"
 */
export function formatPath(base: string, segment: string | number): string {
  return typeof segment === 'number' ? `${base}[${segment}]` : `${base}.${segment}`;
}

function dynamicValue(pathLabel: string, reason: string): ConfigurationError {
  return new ConfigurationError(
    `"${pathLabel}" must be a static value: ${reason}.`,
    pathLabel
  );
}

/**
 * Arrays: every element must be static. Holes and spreads make the
 * positions non-deterministic and are rejected.
 */
function extractArray(node: types.ArrayExpression, pathLabel: string): unknown[] {
  return node.elements.map((element, index) => {
    const elementLabel = formatPath(pathLabel, index);

    if (element === null) {
      throw dynamicValue(elementLabel, 'array holes are not supported');
    }
    if (is.spreadElement(element)) {
      throw dynamicValue(elementLabel, 'spread elements are not supported');
    }

    return extractStaticValue(element, elementLabel);
  });
}

/**
 * Objects: every key and every value must be static. Spreads are rejected
 * because the extracted object would not reflect the runtime value.
 */
function extractObject(
  node: types.ObjectExpression,
  pathLabel: string
): Record<string, unknown> {
  const aggregate: Record<string, unknown> = {};

  for (const property of node.properties) {
    if (is.spreadElement(property)) {
      throw dynamicValue(pathLabel, 'spread elements are not supported');
    }

    const key = extractPropertyKey(property);
    if (key === null) {
      throw dynamicValue(pathLabel, 'property keys must be static');
    }

    if (property.kind !== 'init' || property.method) {
      throw dynamicValue(formatPath(pathLabel, key), 'methods and accessors are not supported');
    }

    // Defined, not assigned: `__proto__` must land as an own key.
    Object.defineProperty(aggregate, key, {
      value: extractStaticValue(property.value, formatPath(pathLabel, key)),
      enumerable: true,
      writable: true,
      configurable: true
    });
  }

  return aggregate;
}

/**
 * Decodes an ESTree node into a plain static value.
 *
 * Atomic nodes go through {@link tryResolveStaticValue}; arrays and objects
 * recurse. Anything else (identifiers, calls, arrow functions, operators) is
 * runtime logic.
 *
 * A dynamic subtree is an error, never a partial result.
 *
 * @param pathLabel - Label of the node (`Point.jsonKeys.y.defaultValue`),
 *                    named in errors.
 * @throws {ConfigurationError} When the node or a part of it is dynamic.
 */
export function extractStaticValue(node: types.Node, pathLabel: string): unknown {
  const resolution = tryResolveStaticValue(node);
  if (resolution.success) {
    return resolution.value;
  }

  if (is.arrayExpression(node)) {
    return extractArray(node, pathLabel);
  }

  if (is.objectExpression(node)) {
    return extractObject(node, pathLabel);
  }

  throw dynamicValue(pathLabel, `${node.type} is evaluated at runtime`);
}
