import type { TypeRegistry } from '../emitter/type-registry';
import type { CompilationUnit, PatchInstruction } from '../types';
import type { DiagnosticsCollector } from './diagnostics';

/**
 * Shared inputs of every pass over one unit.
 */
export type PassContext = {
  /**
   * Raw global defaults; validated when merged into each class.
   */
  readonly defaults: unknown;

  readonly registry: TypeRegistry;
  readonly diagnostics: DiagnosticsCollector;

  /**
   * Module specifier the unit uses to import its companion (`./point.g.js`).
   */
  readonly companionSpecifier: string;
};

/**
 * Eagerly materialized output of one pass.
 */
export type PassResult = {
  readonly fragments: readonly string[];
  readonly patches: readonly PatchInstruction[];
};

type PassShape<Kind extends string> = {
  readonly kind: Kind;

  /**
   * Runs the pass over every element it recognizes.
   *
   * @throws Any element error; the composer aborts the unit.
   */
  run(unit: CompilationUnit, context: PassContext): PassResult;
};

/**
 * Encode/decode functions and helpers for annotated classes.
 */
export type JsonClassPass = PassShape<'json-class'>;

/**
 * Value tables for `@enum` constants.
 */
export type JsonEnumPass = PassShape<'json-enum'>;

/**
 * Delegating members and the companion import patched into the source.
 */
export type InPlacePass = PassShape<'in-place'>;

export type GenerationPass = JsonClassPass | JsonEnumPass | InPlacePass;

export type GenerationPassKind = GenerationPass['kind'];
