import type { Simplify } from './types-helper';

/**
 * Strategy applied to a field name when no explicit output key is configured.
 *
 * Example for the field `createdAt`:
 * - `'none'`           -> `createdAt`
 * - `'kebab'`          -> `created-at`
 * - `'snake'`          -> `created_at`
 * - `'pascal'`         -> `CreatedAt`
 * - `'screamingSnake'` -> `CREATED_AT`
 */
export type FieldRename = 'none' | 'kebab' | 'snake' | 'pascal' | 'screamingSnake';

/**
 * Generation switches shared by the global and the class scope.
 */
export type GenerationSwitches = {
  /**
   * Emit `<name>FromJson`.
   * @default true
   */
  createFactory: boolean;

  /**
   * Emit `<name>ToJson`.
   * @default true
   */
  createToJson: boolean;

  /**
   * Emit the `<name>FieldMap` constant (field name -> output key).
   * @default false
   */
  createFieldMap: boolean;

  /**
   * Emit the `<name>PerFieldToJson` map of per-field encoders.
   * @default false
   */
  createPerFieldToJson: boolean;

  /**
   * For classes with type parameters, take one `fromJson<T>` / `toJson<T>`
   * callback per parameter instead of passing values through untouched.
   * @default false
   */
  genericArgumentFactories: boolean;

  /**
   * Make the decode factory throw on keys no decoded field claims.
   * @default false
   */
  disallowUnrecognizedKeys: boolean;

  /**
   * Write `null` / `undefined` values during encoding. When `false`, such
   * entries are left out of the output. Also settable per field.
   * @default true
   */
  includeIfNull: boolean;

  /**
   * Only fields carrying a field-level override participate.
   * @default false
   */
  ignoreUnannotated: boolean;

  /**
   * @default 'none'
   */
  fieldRename: FieldRename;
};

/**
 * Field-level override as declared in the metadata (all entries optional).
 */
export type KeyConfig = {
  /**
   * Explicit output key; wins over `fieldRename`.
   */
  name?: string;

  /**
   * `true` forces decoding of a non-public field, `false` excludes the field
   * from decoding whatever its visibility.
   */
  includeFromJson?: boolean;

  /**
   * `true` forces the field into the encode set even when it does not take
   * part in decoding, `false` removes it from the encode set.
   */
  includeToJson?: boolean;

  includeIfNull?: boolean;

  /**
   * Static value used when the input lacks the key (or holds `null`).
   */
  defaultValue?: unknown;

  /**
   * Leave the key out of the encoded output when the value equals
   * `defaultValue`. Requires a primitive `defaultValue`.
   */
  omitIfDefault?: boolean;
};

/**
 * The merged configuration of one class. Computed once, frozen afterwards.
 */
export type ResolvedConfig = Simplify<
  Readonly<GenerationSwitches> & {
    /**
     * Validated field-level overrides keyed by field name.
     */
    readonly fields: ReadonlyMap<string, Readonly<KeyConfig>>;
  }
>;

/**
 * The effective settings of a single field.
 */
export type ResolvedKeyConfig = {
  readonly fieldName: string;

  /**
   * Final external name of the field.
   */
  readonly outputKey: string;

  readonly includeFromJson: boolean | undefined;
  readonly includeToJson: boolean | undefined;
  readonly includeIfNull: boolean;
  readonly hasDefault: boolean;
  readonly defaultValue: unknown;
  readonly omitIfDefault: boolean;

  /**
   * `true` when a field-level override exists for this field.
   */
  readonly annotated: boolean;
};
