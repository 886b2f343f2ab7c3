import type { SourceComment } from './parse';

/**
 * Tags read from a JSDoc block.
 */
export type JsDocTags = {
  /**
   * Type expression of `@type {T}`; falls back to `@returns {T}` then the
   * first `@param {T}` so accessor halves carry a type too.
   */
  readonly type: string | null;

  readonly readonly: boolean;
  readonly private: boolean;
  readonly enum: boolean;

  /**
   * Names declared by `@template T, U` (one tag may list several).
   */
  readonly templates: readonly string[];
};

const EMPTY_TAGS: JsDocTags = {
  type: null,
  readonly: false,
  private: false,
  enum: false,
  templates: []
};

/**
 * Returns the JSDoc block directly in front of `offset`, with only
 * whitespace in between.
 */
export function leadingJsDoc(
  source: string,
  comments: readonly SourceComment[],
  offset: number
): SourceComment | null {
  let candidate: SourceComment | null = null;

  for (const comment of comments) {
    if (comment.end > offset) break;
    candidate = comment;
  }

  if (!candidate || candidate.kind !== 'block' || !candidate.value.startsWith('*')) {
    return null;
  }
  return source.slice(candidate.end, offset).trim() === '' ? candidate : null;
}

/**
 * Reads the braced type expression starting at `open` (the `{`), honoring
 * nested braces (`{Record<string, {a: number}>}`).
 */
function readBraced(text: string, open: number): string | null {
  let depth = 0;

  for (let index = open; index < text.length; index++) {
    const char = text[index];
    if (char === '{') depth++;
    if (char === '}' && --depth === 0) {
      return text.slice(open + 1, index).trim();
    }
  }
  return null;
}

function typeOfTag(text: string, tag: string): string | null {
  const match = new RegExp(`@${tag}\\s*\\{`).exec(text);
  if (!match) return null;
  return readBraced(text, match.index + match[0].length - 1);
}

function hasTag(text: string, tag: string): boolean {
  return new RegExp(`@${tag}(?![\\w-])`).test(text);
}

function templateNames(text: string): string[] {
  const names: string[] = [];

  for (const match of text.matchAll(/@template\s+(?:\{[^}]*\}\s*)?([^\n*@]+)/g)) {
    const declared = match[1] ?? '';
    for (const name of declared.split(',')) {
      const trimmed = name.trim().split(/\s+/)[0];
      if (trimmed && /^[A-Za-z_$][\w$]*$/.test(trimmed)) names.push(trimmed);
    }
  }

  return names;
}

/**
 * Parses the tags this reader understands; other tags are ignored.
 */
export function parseJsDoc(comment: SourceComment | null): JsDocTags {
  if (!comment) return EMPTY_TAGS;
  const text = comment.value;

  return {
    type:
      typeOfTag(text, 'type') ??
      typeOfTag(text, 'returns') ??
      typeOfTag(text, 'return') ??
      typeOfTag(text, 'param'),
    readonly: hasTag(text, 'readonly'),
    private: hasTag(text, 'private') || hasTag(text, 'protected'),
    enum: hasTag(text, 'enum'),
    templates: templateNames(text)
  };
}
