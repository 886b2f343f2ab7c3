import type { types } from 'estree-toolkit';
import { is } from 'estree-toolkit';
import { parse } from 'meriyah';

import { SourceParseError, toError } from '../errors';
import { isNodeLike, isRecord } from '../guards';

/**
 * A block or line comment with its source offsets.
 */
export type SourceComment = {
  readonly kind: 'block' | 'line';

  /**
   * Comment text without the delimiters (`* @type {number} ` for a JSDoc).
   */
  readonly value: string;

  readonly start: number;
  readonly end: number;
};

export type ParsedModule = {
  readonly program: types.Program;

  /**
   * Comments in source order.
   */
  readonly comments: readonly SourceComment[];
};

/**
 * Parses a JavaScript module with ranges and collected comments.
 *
 * The tree is only ever read: offsets taken from it refer to `source`.
 *
 * @throws {SourceParseError} When the module does not parse.
 */
export function parseModule(source: string, filePath: string): ParsedModule {
  const comments: SourceComment[] = [];
  let ast: unknown;

  try {
    ast = parse(source, {
      module: true,
      ranges: true,
      onComment: (type, value, start, end) => {
        comments.push({ kind: type === 'MultiLine' ? 'block' : 'line', value, start, end });
      }
    });
  } catch (error) {
    throw new SourceParseError(
      `Could not parse ${filePath}: ${toError(error).message}`,
      filePath,
      error
    );
  }

  if (!isNodeLike(ast) || !is.program(ast)) {
    throw new SourceParseError(
      `Expected parser output for ${filePath} to be an ESTree Program node.`,
      filePath,
      undefined
    );
  }

  return { program: ast, comments };
}

/**
 * Source offsets of a node as `[start, end)`.
 *
 * @throws When the node was produced without ranges.
 */
export function rangeOf(node: types.Node): readonly [number, number] {
  if (node.range) return node.range;

  if (isRecord(node) && typeof node.start === 'number' && typeof node.end === 'number') {
    return [node.start, node.end];
  }

  throw new Error(`${node.type} node carries no source range.`);
}
