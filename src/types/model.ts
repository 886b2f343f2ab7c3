/**
 * Visibility of a field as seen by generated code living outside the class.
 *
 * - `'public'`: readable and writable from a companion module.
 * - `'private'`: documented as internal (`@private` / `@protected`); only
 *   participates in decoding when explicitly opted in.
 */
export type Visibility = 'public' | 'private';

/**
 * One field of a class, after inheritance has been flattened.
 *
 * Accessor pairs (`get x()` / `set x(v)`) are represented as a single field
 * with `hasGetter` / `hasSetter` describing which halves exist.
 */
export type FieldDescriptor = {
  readonly name: string;

  /**
   * Declared type expression (e.g. `number`, `Array<Point>`, `T | null`).
   * Fields without a declaration carry `unknown`.
   */
  readonly type: string;

  readonly visibility: Visibility;

  /**
   * `true` when the field cannot be reassigned after construction
   * (`@readonly` fields, getter-only accessors).
   */
  readonly isFinal: boolean;

  readonly hasGetter: boolean;
  readonly hasSetter: boolean;
};

export type ConstructorParameter = {
  readonly name: string;

  /**
   * `true` when the parameter declares a default value and may therefore be
   * left out of the generated constructor call.
   */
  readonly isOptional: boolean;
};

/**
 * Immutable snapshot of a class declaration taken once per generation pass.
 */
export type ClassModel = {
  readonly name: string;

  /**
   * Fields in declaration order; inherited fields come first.
   */
  readonly fields: readonly FieldDescriptor[];

  readonly constructorParameters: readonly ConstructorParameter[];
  readonly typeParameters: readonly string[];

  /**
   * Name of the superclass, or `null` when the class extends nothing.
   */
  readonly supertype: string | null;
};

/**
 * An enum-like constant object (`@enum`), reduced to its ordered values.
 */
export type EnumModel = {
  readonly name: string;
  readonly values: readonly (string | number)[];
};

/**
 * A class carrying serialization metadata.
 *
 * `annotation` and `fieldAnnotations` are the raw payloads handed over by the
 * metadata reader; they are validated when the configuration is merged.
 */
export type AnnotatedClass = {
  readonly kind: 'class';
  readonly model: ClassModel;
  readonly annotation: unknown;
  readonly fieldAnnotations: unknown;
};

export type AnnotatedEnum = {
  readonly kind: 'enum';
  readonly model: EnumModel;
};

export type AnnotatedElement = AnnotatedClass | AnnotatedEnum;

/**
 * One binding created by an import declaration of the unit.
 *
 * - `import { a as b } from './x.js'` -> `{ kind: 'named', imported: 'a', local: 'b' }`
 * - `import x from './x.js'`          -> `{ kind: 'default', imported: 'default', local: 'x' }`
 * - `import * as x from './x.js'`     -> `{ kind: 'namespace', imported: '*', local: 'x' }`
 */
export type ImportBinding = {
  readonly kind: 'named' | 'default' | 'namespace';
  readonly imported: string;
  readonly local: string;
  readonly source: string;
};

/**
 * One source file processed in a single generation invocation.
 */
export type CompilationUnit = {
  /**
   * Path of the source file; patch instructions target this path.
   */
  readonly path: string;

  /**
   * Source text snapshot every offset of this unit refers to.
   */
  readonly source: string;

  readonly elements: readonly AnnotatedElement[];

  /**
   * Top-level names the module exports. The companion module imports the
   * ones its generated code references.
   */
  readonly exportedNames: readonly string[];

  /**
   * Local name bound to the module's default export, when it is a named
   * class, function or identifier; `null` otherwise.
   */
  readonly defaultExportName: string | null;

  /**
   * Import bindings of the module. The companion module repeats the ones
   * its generated code references (nested classes declared elsewhere).
   */
  readonly importedBindings: readonly ImportBinding[];
};

/**
 * Supplies the semantic model of one file.
 *
 * The default implementation is `readUnit` (JavaScript modules parsed with
 * meriyah); any provider returning the same shape can be plugged in.
 */
export type ModelProvider = (path: string, source: string) => CompilationUnit;
