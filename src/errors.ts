import type { FailFastUnitPolicy } from './architecture';

/**
 * Base class of every error raised while generating or patching.
 *
 * `element` names the originating element (`Point`, `Point.y`, a file path)
 * so diagnostics can be attached to it.
 *
 * @see {@link FailFastUnitPolicy}
 */
export class CodegenError extends Error {
  readonly element: string | null;

  constructor(message: string, element: string | null, options?: ErrorOptions) {
    super(message, options);
    this.name = new.target.name;
    this.element = element;
  }
}

/**
 * Malformed or conflicting options found while merging configuration.
 */
export class ConfigurationError extends CodegenError {}

/**
 * Two fields of the final encode set resolve to the same output key.
 */
export class DuplicateKeyError extends CodegenError {
  readonly outputKey: string;
  readonly fieldNames: readonly [string, string];

  constructor(className: string, outputKey: string, first: string, second: string) {
    super(
      `More than one field of "${className}" has the JSON key "${outputKey}": ` +
        `"${first}" and "${second}".`,
      `${className}.${second}`
    );
    this.outputKey = outputKey;
    this.fieldNames = [first, second];
  }
}

/**
 * A required constructor parameter maps to a field excluded from decoding.
 */
export class UnavailableFieldError extends CodegenError {}

/**
 * No converter of the registry accepts a declared type.
 */
export class UnsupportedTypeError extends CodegenError {
  readonly typeExpression: string;

  constructor(typeExpression: string, element: string) {
    super(
      `Could not generate JSON conversion code for "${element}" of type "${typeExpression}".`,
      element
    );
    this.typeExpression = typeExpression;
  }
}

/**
 * A unit source could not be read.
 */
export class SourceReadError extends CodegenError {
  readonly filePath: string;

  constructor(message: string, filePath: string, cause: unknown) {
    super(message, filePath, { cause });
    this.filePath = filePath;
  }
}

/**
 * A unit source could not be parsed.
 */
export class SourceParseError extends CodegenError {
  readonly filePath: string;

  constructor(message: string, filePath: string, cause: unknown) {
    super(message, filePath, { cause });
    this.filePath = filePath;
  }
}

/**
 * The declaration of an annotated class cannot be located in the unit source.
 * Only cancels the in-place patch of that class.
 */
export class ClassNotFoundError extends CodegenError {
  readonly filePath: string;

  constructor(className: string, filePath: string) {
    super(`Class "${className}" not found in ${filePath}.`, className);
    this.filePath = filePath;
  }
}

/**
 * A patch range is invalid against the current file contents.
 */
export class PatchRangeError extends CodegenError {
  readonly filePath: string;

  constructor(message: string, filePath: string) {
    super(message, filePath);
    this.filePath = filePath;
  }
}

/**
 * Reading or writing a patch target failed.
 */
export class PatchIoError extends CodegenError {
  readonly filePath: string;

  constructor(message: string, filePath: string, cause: unknown) {
    super(message, filePath, { cause });
    this.filePath = filePath;
  }
}

/**
 * Normalizes anything thrown into an `Error`.
 */
export function toError(thrown: unknown): Error {
  return thrown instanceof Error ? thrown : new Error(String(thrown));
}
