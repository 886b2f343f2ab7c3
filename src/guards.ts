import type { types } from 'estree-toolkit';

/**
 * Checks whether a value is an array.
 *
 * Wrapper around `Array.isArray` that acts as a TypeScript **type guard**
 * (`value is T[]`). Note: `T` is not validated at runtime.
 */
export function isArray<T = unknown>(value: unknown): value is T[] {
  return Array.isArray(value);
}

/**
 * Determines whether a value is a "plain object" (a simple POJO / dictionary
 * object).
 *
 * A value is considered plain if all of the following are true:
 * 1. It is not `null`.
 * 2. `typeof value === "object"`.
 * 3. Its prototype is either `Object.prototype` or `null`.
 *
 * Arrays, Dates, Maps, class instances and other host objects are rejected.
 *
 * @typeParam T
 *   The (assumed) type of the object's property values after a successful check.
 *   Compile-time hint only.
 */
export function isPlainObject<T = unknown>(
  value: unknown
): value is Record<PropertyKey, T> {
  if (typeof value !== 'object' || value === null) return false;

  const proto = Object.getPrototypeOf(value);
  return proto === null || proto === Object.prototype;
}

/**
 * Narrowing helper for "object-like" values, so properties can be read without
 * runtime errors and without type assertions.
 */
export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null;
}

/**
 * Shallow bridge guard between parser output and `estree-toolkit` guards:
 * a non-array object with a string `type` discriminator.
 */
export function isNodeLike(value: unknown): value is types.Node {
  return isRecord(value) && !isArray(value) && typeof value.type === 'string';
}
