import { z } from 'zod';

export const fieldRenameSchema = z.enum([
  'none',
  'kebab',
  'snake',
  'pascal',
  'screamingSnake'
]);

/**
 * Generation switches accepted at the global and the class scope.
 *
 * Every entry is optional: unset entries inherit from the next broader scope.
 * Unknown keys are rejected so typos surface as configuration errors instead
 * of being ignored.
 */
export const generationOptionsSchema = z
  .object({
    createFactory: z.boolean().optional(),
    createToJson: z.boolean().optional(),
    createFieldMap: z.boolean().optional(),
    createPerFieldToJson: z.boolean().optional(),
    genericArgumentFactories: z.boolean().optional(),
    disallowUnrecognizedKeys: z.boolean().optional(),
    includeIfNull: z.boolean().optional(),
    ignoreUnannotated: z.boolean().optional(),
    fieldRename: fieldRenameSchema.optional()
  })
  .strict();

/**
 * Field-level override.
 */
export const keyConfigSchema = z
  .object({
    name: z.string().min(1).optional(),
    includeFromJson: z.boolean().optional(),
    includeToJson: z.boolean().optional(),
    includeIfNull: z.boolean().optional(),
    defaultValue: z.unknown().optional(),
    omitIfDefault: z.boolean().optional()
  })
  .strict();

/**
 * Field overrides keyed by field name.
 */
export const fieldOverridesSchema = z.record(keyConfigSchema);

export type GenerationOptions = z.infer<typeof generationOptionsSchema>;
export type FieldOverrides = z.infer<typeof fieldOverridesSchema>;

/**
 * Data part of the pipeline options. Collaborators (file system, model
 * provider, converters, logger) are checked by the type system only.
 */
export const pipelineOptionsSchema = z.object({
  files: z.array(z.string().min(1)),
  companionSuffix: z
    .string()
    .min(1)
    .regex(/^[^/\\]+$/, 'must not contain path separators')
    .default('.g'),
  patchSources: z.boolean().default(true),
  logLevel: z.enum(['debug', 'info', 'warn', 'error', 'silent']).optional()
});

