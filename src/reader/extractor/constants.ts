/**
 * Represents a successful static resolution.
 *
 * `value` is what the node evaluates to. It may legitimately be `undefined`;
 * that is distinct from failure (`success: false`).
 */
export type StaticSuccess<T> = {
  success: true;
  value: T;
};

/**
 * The node could not be resolved under the resolver allowlist (identifiers,
 * calls, unsupported operators). Failure carries no payload.
 */
export type StaticFailure = {
  success: false;
};

/**
 * Outcome of a static resolution attempt.
 *
 * Distinguishes "evaluates to undefined" (success with `value === undefined`)
 * from "could not resolve" (failure).
 */
export type StaticResult<T = unknown> = StaticSuccess<T> | StaticFailure;

/**
 * Shared failure sentinel.
 */
export const UNRESOLVED: StaticFailure = { success: false } as const;

export function resolved<T>(value: T): StaticSuccess<T> {
  return { success: true, value };
}
