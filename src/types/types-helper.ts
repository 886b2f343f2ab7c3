/**
 * Flattens intersections into a single object type for readable hovers.
 *
 * @example
 * ```ts
 * type A = { a: string } & { b: number };
 * type B = Simplify<A>; // { a: string; b: number }
 * ```
 */
export type Simplify<T> = { [KeyType in keyof T]: T[KeyType] } & {};
