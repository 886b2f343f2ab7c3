import { is, types } from 'estree-toolkit';
import { tryResolveStaticValue } from './static-resolver';

/**
 * A non-computed identifier key is a label (`{ name: ... }` -> `"name"`), not
 * a variable reference, and must not go through the value resolver.
 */
function tryExtractNamedKey(property: types.Property): string | null {
  if (!property.computed && is.identifier(property.key)) {
    return property.key.name;
  }
  return null;
}

/**
 * Extracts the key of an object property.
 *
 * - `{ a: ... }`      -> `"a"` (label)
 * - `{ "a-b": ... }`  -> `"a-b"` (literal, resolved as data)
 * - `{ ["a"]: ... }`  -> `"a"` (computed, resolved as data)
 * - `{ [1]: ... }`    -> `"1"`
 *
 * Numeric keys are normalized to strings, matching how they land in the
 * resulting object. Keys resolving to anything else (`null`, booleans,
 * bigints) or not resolving at all are rejected.
 *
 * @returns The key, or `null` when it is not statically addressable.
 */
export function extractPropertyKey(property: types.Property): string | null {
  const namedKey = tryExtractNamedKey(property);
  if (namedKey !== null) {
    return namedKey;
  }

  const resolution = tryResolveStaticValue(property.key);

  if (resolution.success) {
    const resolvedValue = resolution.value;

    if (typeof resolvedValue === 'string') return resolvedValue;
    if (typeof resolvedValue === 'number') return String(resolvedValue);
  }

  return null;
}
