import type { FieldRename } from '../types';

/**
 * Inserts `separator` in front of every uppercase letter and lowercases it.
 * A separator produced for a leading uppercase letter is dropped.
 *
 * Example: `fixCase('createdAt', '_')` -> `created_at`
 */
function fixCase(input: string, separator: string): string {
  const result = input.replace(/[A-Z]/g, match => `${separator}${match.toLowerCase()}`);
  return result.startsWith(separator) ? result.slice(separator.length) : result;
}

/**
 * Applies a rename strategy to a field name.
 */
export function renameField(name: string, strategy: FieldRename): string {
  switch (strategy) {
    case 'none':
      return name;
    case 'kebab':
      return fixCase(name, '-');
    case 'snake':
      return fixCase(name, '_');
    case 'screamingSnake':
      return fixCase(name, '_').toUpperCase();
    case 'pascal':
      return name.length === 0 ? name : `${name.charAt(0).toUpperCase()}${name.slice(1)}`;
  }
}
