/**
 * ARCHITECTURE INDEX (GROUPED)
 *
 * DEFINITION
 * 1. Configuration Layering
 *
 * POLICY
 * 2. Fragment Deduplication
 * 3. Fail-Fast Units
 * 4. Patch Ordering
 *
 * STRATEGY
 * 5. Single-Splice In-Place Rewriting
 * 6. In-Place Idempotency
 *
 * Recommended reading flow:
 * DEFINITION -> POLICY -> STRATEGY
 */

/**
 * HEADER TAXONOMY
 *
 * - POLICY:
 *   Non-negotiable rule (`must` / `must not`) and enforcement semantics.
 *
 * - STRATEGY:
 *   Chosen implementation approach used to satisfy policies.
 *
 * - DEFINITION:
 *   Formal meaning and scope of a term or boundary.
 */

/**
 * ARCHITECTURAL DEFINITION (1)
 * Configuration Layering
 *
 * ---
 *
 * Three scopes contribute settings, narrowest wins:
 *
 *   field override  >  class override  >  global defaults  >  built-in defaults
 *
 * - Unset entries (`undefined`) never shadow a broader scope.
 * - Every scope is validated before it takes part in the merge; a malformed
 *   payload is a `ConfigurationError` naming the element it came from.
 * - The merged `ResolvedConfig` is frozen. Downstream stages (selection,
 *   emission) read it and never write to it.
 */
export type ConfigurationLayering = never;

/**
 * ARCHITECTURAL POLICY (2)
 * Fragment Deduplication
 *
 * ---
 *
 * Several passes may contribute the same helper (e.g. the enum values table
 * requested by both the enum pass and a class using that enum).
 *
 * - Identity:  exact text equality after trimming surrounding whitespace.
 * - Ordering:  first-seen order across passes, then across elements.
 * - Joining:   fragments are separated by exactly one blank line.
 *
 * Consequence:
 * Any helper that may be emitted from two places must be produced by one shared
 * function so both copies are byte-identical.
 */
export type FragmentDeduplicationPolicy = never;

/**
 * ARCHITECTURAL POLICY (3)
 * Fail-Fast Units
 *
 * ---
 *
 * An error raised while generating any element aborts the whole unit; no
 * partial output of that unit is written and no patch instruction of that unit
 * reaches the patcher.
 *
 * - Scope:     one unit. Sibling units in the same run continue.
 * - Exception: `ClassNotFoundError` only cancels the in-place patch of that
 *              element; it is reported as an error diagnostic and the
 *              companion output of the unit is still produced.
 * - Rollback:  none. Files written by independently completed units stay.
 */
export type FailFastUnitPolicy = never;

/**
 * ARCHITECTURAL POLICY (4)
 * Patch Ordering
 *
 * ---
 *
 * All instructions targeting one file in one run form a single batch and are
 * applied in one read-modify-write cycle.
 *
 * Within a batch, instructions are applied from the highest `startOffset` to
 * the lowest. An edit at a later position never shifts the text in front of
 * it, so every offset captured from the original snapshot stays valid until it
 * is used.
 *
 *   snapshot:  aaaa[10]bbbb[50]cccc[90]dddd
 *   apply 90 -> apply 50 -> apply 10
 *
 * Ties (two insertions at the same offset) are applied in reverse batch order
 * so the inserted texts end up in batch order.
 *
 * Validation happens against the in-memory copy before each splice:
 * - `startOffset > endOffset`                 -> `PatchRangeError`
 * - `endOffset > text.length`                 -> `PatchRangeError`
 * - overlap with the previously applied range -> `PatchRangeError`
 *
 * The file is written only after the whole batch validated.
 */
export type PatchOrderingPolicy = never;

/**
 * ARCHITECTURAL STRATEGY (5)
 * Single-Splice In-Place Rewriting
 *
 * ---
 *
 * The in-place pass never rebuilds or mutates a syntax tree. It parses the
 * unit snapshot read-only, locates the class body, and emits:
 *
 * - one zero-width insertion in front of the closing brace of each class
 *   (the delegating `static fromJson` / `toJson` members), and
 * - one instruction adding or extending the import of the companion module.
 *
 * Rewriting a whole declaration, or inserting at an offset serialized from a
 * different snapshot, is not supported: two strategies on the same file would
 * patch twice.
 */
export type SingleSpliceStrategy = never;

/**
 * ARCHITECTURAL STRATEGY (6)
 * In-Place Idempotency
 *
 * ---
 *
 * Running the pipeline against already patched, unmodified sources must not
 * change any file.
 *
 * - Members: a class already declaring `static fromJson` (resp. `toJson`)
 *   receives no second declaration.
 * - Imports: an import of the companion module that already lists every
 *   needed name is left alone; a partial one is replaced by the full list.
 * - Companion files are only written when their content differs.
 * - The patcher reports a batch producing the original text as `unchanged`.
 */
export type InPlaceIdempotency = never;
