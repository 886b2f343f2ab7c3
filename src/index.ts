export { runCodegen } from './pipeline/run';
export type { CodegenOptions, CodegenResult, UnitReport, UnitStatus } from './pipeline/run';
export { companionPath, COMPANION_HEADER } from './pipeline/companion';

export { readUnit, CLASS_ANNOTATION_PROPERTY, FIELD_ANNOTATIONS_PROPERTY } from './reader';

export { mergeConfig, resolveKeyConfig, DEFAULT_GENERATION_SWITCHES } from './config/merge';
export { renameField } from './config/field-rename';
export type { GenerationOptions, FieldOverrides } from './config/schema';

export { selectFields, resolveEncodeFields } from './selector/select-fields';
export type { ExcludedField, ExclusionKind, FieldSelection } from './selector/select-fields';

export { createTypeRegistry } from './emitter/type-registry';
export type { ConversionContext, TypeConverter, TypeRegistry } from './emitter/type-registry';
export { parseTypeReference } from './emitter/type-reference';
export type { TypeReference } from './emitter/type-reference';

export { composeUnit, defaultPasses } from './composer/compose';
export type { ComposedUnit } from './composer/compose';
export { createJsonClassPass } from './composer/class-pass';
export { createJsonEnumPass } from './composer/enum-pass';
export { createInPlacePass } from './composer/in-place-pass';
export { DiagnosticsCollector } from './composer/diagnostics';
export type { GenerationPass, GenerationPassKind, PassContext, PassResult } from './composer/pass';

export { applyPatches } from './patcher/apply-patches';
export type { ApplyPatchesOptions } from './patcher/apply-patches';
export { formatPatchSummary } from './patcher/report';

export { nodeFileSystem } from './file-system';
export type { FileSystem } from './file-system';

export { createScopedLogger, createNoOpLogger } from './logging';
export type { Logger, LogLevel } from './logging';

export * from './errors';
export type * from './types';
