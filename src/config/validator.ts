import type { StandardSchemaV1 } from '@standard-schema/spec';

import { ConfigurationError } from '../errors';

/**
 * Validates a raw metadata payload using a Standard Schema V1 compliant
 * validator (the zod schemas in `./schema`).
 *
 * Schema Object Layout:
 * ```ts
 * const schema = {
 *   // Universal adapter (result pattern):
 *   // returns `{ value }` or `{ issues }` and never throws.
 *   "~standard": {
 *     validate: (input) => Result
 *   },
 *   // Library-specific internals (`parse`, ...) are not used.
 *   ...otherLibrarySpecificProps
 * };
 * ```
 *
 * @param schema - The schema instance.
 * @param input - The raw payload handed over by the metadata reader.
 * @param elementName - Element the payload belongs to (`Point`, `Point.y`).
 * @returns The validated payload.
 *
 * @throws {ConfigurationError}
 * - If the validator returns a Promise (metadata is merged synchronously).
 * - If validation fails; the message names the element and the first issue.
 */

/**
 * Public Overload:
 * Establishes the typed contract; the implementation below works on the
 * erased `StandardSchemaV1` and returns `unknown`.
 */
export function validateWithSchema<S extends StandardSchemaV1>(
  schema: S,
  input: unknown,
  elementName: string
): StandardSchemaV1.InferOutput<S>;

export function validateWithSchema(
  schema: StandardSchemaV1,
  input: unknown,
  elementName: string
) {
  const result = schema['~standard'].validate(input);

  if (result instanceof Promise) {
    throw new ConfigurationError(
      `Async schema validation is not supported for "${elementName}".`,
      elementName
    );
  }

  const [firstIssue] = result.issues ?? [];
  if (firstIssue) {
    const issuePath = formatIssuePath(firstIssue.path);
    const location = issuePath ? ` at "${issuePath}"` : '';
    throw new ConfigurationError(
      `Invalid configuration for "${elementName}"${location}: ${firstIssue.message}`,
      elementName
    );
  }

  if ('value' in result) {
    return result.value;
  }

  return input;
}

/**
 * Joins an issue path into a dotted label (`fields.y.name`).
 *
 * Path segments may be plain keys or `{ key }` objects.
 */
function formatIssuePath(
  path: StandardSchemaV1.Issue['path']
): string | undefined {
  if (!path || path.length === 0) return undefined;

  return path
    .map(segment =>
      typeof segment === 'object' ? String(segment.key) : String(segment)
    )
    .join('.');
}
