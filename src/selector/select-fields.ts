import type { ClassModel, FieldDescriptor, ResolvedConfig } from '../types';

import { resolveKeyConfig } from '../config/merge';
import { DuplicateKeyError } from '../errors';

/**
 * Why a field does not take part in decoding.
 */
export type ExclusionKind =
  /**
   * `ignoreUnannotated` is set and the field has no override.
   */
  | 'unannotated'

  /**
   * Non-public field without `includeFromJson: true`.
   */
  | 'private'

  /**
   * Write-only accessor; nothing to read during encoding.
   */
  | 'setter-only'

  /**
   * Explicit `includeFromJson: false`.
   */
  | 'excluded-from-decode';

export type ExcludedField = {
  readonly field: FieldDescriptor;
  readonly kind: ExclusionKind;

  /**
   * Human-readable explanation; reused when a later stage needs the field.
   */
  readonly reason: string;
};

export type FieldSelection = {
  /**
   * Decode-eligible fields, in declaration order.
   */
  readonly usable: readonly FieldDescriptor[];

  readonly excluded: readonly ExcludedField[];
};

const EXCLUSION_REASONS: Record<ExclusionKind, string> = {
  unannotated: 'It is not annotated and ignoreUnannotated is set.',
  private: 'It is assigned to a private field.',
  'setter-only': 'Setter-only properties are not supported.',
  'excluded-from-decode': 'It is assigned to a field not meant to be used in fromJson.'
};

/**
 * Classifies one field. Returns `null` when the field is decode-eligible.
 *
 * Checks run in a fixed order; the first failing check names the reason.
 */
function classifyField(
  field: FieldDescriptor,
  config: ResolvedConfig
): ExclusionKind | null {
  const key = resolveKeyConfig(field.name, config);

  if (config.ignoreUnannotated && !key.annotated) return 'unannotated';
  if (field.visibility !== 'public' && key.includeFromJson !== true) return 'private';
  if (!field.hasGetter) return 'setter-only';
  if (key.includeFromJson === false) return 'excluded-from-decode';

  return null;
}

/**
 * Computes the decode-eligible field set of a class.
 *
 * Policy, in order:
 * 1. Fields without an override are dropped when `ignoreUnannotated` is set.
 * 2. Non-public fields are dropped unless `includeFromJson: true`.
 * 3. Write-only (getter-less) fields are always dropped.
 * 4. Fields with `includeFromJson: false` are dropped whatever their visibility.
 *
 * Every field ends up in exactly one of `usable` / `excluded`.
 */
export function selectFields(model: ClassModel, config: ResolvedConfig): FieldSelection {
  const usable: FieldDescriptor[] = [];
  const excluded: ExcludedField[] = [];

  for (const field of model.fields) {
    const kind = classifyField(field, config);

    if (kind === null) {
      usable.push(field);
    } else {
      excluded.push({ field, kind, reason: EXCLUSION_REASONS[kind] });
    }
  }

  return { usable, excluded };
}

/**
 * Indexes exclusion reasons by field name, for constructor binding errors.
 */
export function unavailableReasons(selection: FieldSelection): Map<string, string> {
  return new Map(selection.excluded.map(entry => [entry.field.name, entry.reason]));
}

/**
 * Computes the final encode field list.
 *
 * 1. Working set:
 *    - with a decode factory: the usable fields the factory consumed;
 *    - without: every usable field.
 * 2. Fields marked `includeToJson: true` are added back, even when they were
 *    excluded from decoding. Write-only fields stay out; there is nothing to
 *    read.
 * 3. Declaration order is restored (constructor binding order is discarded).
 * 4. Fields marked `includeToJson: false` are removed.
 * 5. Output keys are checked for collisions, after all pruning.
 *
 * @param usedByFactory - Names of the fields consumed by the decode factory,
 *                        or `undefined` when no factory is generated.
 * @throws {DuplicateKeyError} When two remaining fields share an output key.
 */
export function resolveEncodeFields(
  model: ClassModel,
  config: ResolvedConfig,
  usable: readonly FieldDescriptor[],
  usedByFactory: ReadonlySet<string> | undefined
): FieldDescriptor[] {
  const working = new Set(
    usedByFactory ? usable.filter(field => usedByFactory.has(field.name)) : usable
  );

  for (const field of model.fields) {
    if (field.hasGetter && resolveKeyConfig(field.name, config).includeToJson === true) {
      working.add(field);
    }
  }

  const encodeFields = model.fields.filter(
    field =>
      working.has(field) &&
      resolveKeyConfig(field.name, config).includeToJson !== false
  );

  const ownerByKey = new Map<string, string>();
  for (const field of encodeFields) {
    const { outputKey } = resolveKeyConfig(field.name, config);
    const owner = ownerByKey.get(outputKey);

    if (owner !== undefined) {
      throw new DuplicateKeyError(model.name, outputKey, owner, field.name);
    }
    ownerByKey.set(outputKey, field.name);
  }

  return encodeFields;
}
