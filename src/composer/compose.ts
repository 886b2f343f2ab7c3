import type { FailFastUnitPolicy, FragmentDeduplicationPolicy } from '../architecture';
import type { CompilationUnit, Diagnostic, PatchInstruction } from '../types';
import type { GenerationPass, PassContext } from './pass';

import { createJsonClassPass } from './class-pass';
import { createJsonEnumPass } from './enum-pass';
import { createInPlacePass } from './in-place-pass';

export type ComposedUnit = {
  /**
   * Deduplicated fragments joined by a blank line; empty when no pass
   * contributed anything.
   */
  readonly output: string;

  readonly fragments: readonly string[];
  readonly patches: readonly PatchInstruction[];
  readonly diagnostics: readonly Diagnostic[];
};

/**
 * Default pass list. Enum tables come first so classes referring to an enum
 * find its table above them in the output.
 */
export function defaultPasses(options: { inPlace: boolean }): GenerationPass[] {
  const passes: GenerationPass[] = [createJsonEnumPass(), createJsonClassPass()];
  if (options.inPlace) passes.push(createInPlacePass());
  return passes;
}

/**
 * Runs the passes over one unit in order.
 *
 * Fragments are trimmed, empty ones dropped and exact duplicates collapsed
 * ({@link FragmentDeduplicationPolicy}). Patch instructions are concatenated
 * in pass order.
 *
 * Errors are not caught: the first element error aborts the unit
 * ({@link FailFastUnitPolicy}). Diagnostics reported before the abort stay
 * in `context.diagnostics`, which the caller owns.
 */
export function composeUnit(
  unit: CompilationUnit,
  passes: readonly GenerationPass[],
  context: PassContext
): ComposedUnit {
  const seen = new Set<string>();
  const fragments: string[] = [];
  const patches: PatchInstruction[] = [];

  for (const pass of passes) {
    const result = pass.run(unit, context);

    for (const fragment of result.fragments) {
      const text = fragment.trim();
      if (text === '' || seen.has(text)) continue;

      seen.add(text);
      fragments.push(text);
    }

    patches.push(...result.patches);
  }

  return {
    output: fragments.join('\n\n'),
    fragments,
    patches,
    diagnostics: context.diagnostics.diagnostics
  };
}
