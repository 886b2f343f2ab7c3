import { UnsupportedTypeError } from '../errors';

/**
 * Parsed form of a declared type expression.
 *
 * - `number`             -> { name: 'number', args: [], nullable: false }
 * - `Array<Point> | null` -> { name: 'Array', args: [Point], nullable: true }
 * - `string[]`           -> { name: 'Array', args: [string], nullable: false }
 * - `A | B`              -> { name: '|', args: [A, B], nullable: false }
 *
 * `text` keeps the normalized source form for diagnostics.
 */
export type TypeReference = {
  readonly name: string;
  readonly args: readonly TypeReference[];
  readonly nullable: boolean;
  readonly text: string;
};

/**
 * Name used for unions that remain after `null` / `undefined` were removed.
 * No built-in converter accepts it.
 */
export const UNION_TYPE_NAME = '|';

const TOKEN_PATTERN = /\s*([A-Za-z_$][\w$]*(?:\.[A-Za-z_$][\w$]*)*|[<>,|()[\]])/y;

function tokenize(text: string): string[] | null {
  const tokens: string[] = [];
  TOKEN_PATTERN.lastIndex = 0;

  while (TOKEN_PATTERN.lastIndex < text.length) {
    const start = TOKEN_PATTERN.lastIndex;
    const match = TOKEN_PATTERN.exec(text);

    if (!match || match[1] === undefined) {
      // Only trailing whitespace may remain.
      return text.slice(start).trim() === '' ? tokens : null;
    }
    tokens.push(match[1]);
  }

  return tokens;
}

/**
 * Recursive-descent parser over the token list.
 *
 * union   := postfix ('|' postfix)*
 * postfix := primary ('[' ']')*
 * primary := NAME ('<' union (',' union)* '>')? | '(' union ')'
 */
class TypeParser {
  private position = 0;

  constructor(private readonly tokens: readonly string[]) {}

  parse(): TypeReference | null {
    const result = this.parseUnion();
    return result && this.position === this.tokens.length ? result : null;
  }

  private peek(): string | undefined {
    return this.tokens[this.position];
  }

  private accept(token: string): boolean {
    if (this.peek() !== token) return false;
    this.position++;
    return true;
  }

  private parseUnion(): TypeReference | null {
    const members: TypeReference[] = [];

    do {
      const member = this.parsePostfix();
      if (!member) return null;
      members.push(member);
    } while (this.accept('|'));

    const nonNull = members.filter(
      member => member.name !== 'null' && member.name !== 'undefined'
    );
    const nullable = nonNull.length !== members.length;
    const [single] = nonNull;

    if (nonNull.length === 1 && single) {
      return nullable ? withNullable(single) : single;
    }

    // `null | undefined` alone, or a real union.
    const args = nonNull.length === 0 ? members : nonNull;
    return {
      name: UNION_TYPE_NAME,
      args,
      nullable,
      text: members.map(member => member.text).join(' | ')
    };
  }

  private parsePostfix(): TypeReference | null {
    let current = this.parsePrimary();
    if (!current) return null;

    while (this.peek() === '[') {
      this.position++;
      if (!this.accept(']')) return null;
      current = { name: 'Array', args: [current], nullable: false, text: `${current.text}[]` };
    }

    return current;
  }

  private parsePrimary(): TypeReference | null {
    if (this.accept('(')) {
      const inner = this.parseUnion();
      return inner && this.accept(')') ? inner : null;
    }

    const name = this.peek();
    if (name === undefined || !/^[A-Za-z_$]/.test(name)) return null;
    this.position++;

    if (!this.accept('<')) {
      return { name, args: [], nullable: false, text: name };
    }

    const args: TypeReference[] = [];
    do {
      const arg = this.parseUnion();
      if (!arg) return null;
      args.push(arg);
    } while (this.accept(','));

    if (!this.accept('>')) return null;

    return {
      name,
      args,
      nullable: false,
      text: `${name}<${args.map(arg => arg.text).join(', ')}>`
    };
  }
}

function withNullable(type: TypeReference): TypeReference {
  return type.nullable ? type : { ...type, nullable: true, text: `${type.text} | null` };
}

/**
 * Parses a declared type expression.
 *
 * @param text - Type expression as carried by the semantic model.
 * @param element - Owning element (`Point.x`), named in errors.
 * @throws {UnsupportedTypeError} When the expression does not parse.
 */
export function parseTypeReference(text: string, element: string): TypeReference {
  const tokens = tokenize(text);
  const parsed = tokens && tokens.length > 0 ? new TypeParser(tokens).parse() : null;

  if (!parsed) {
    throw new UnsupportedTypeError(text, element);
  }
  return parsed;
}
