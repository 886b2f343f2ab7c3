export type DiagnosticSeverity = 'info' | 'warning' | 'error';

/**
 * Structured message surfaced to the invoking pipeline.
 */
export type Diagnostic = {
  readonly severity: DiagnosticSeverity;

  /**
   * Stable machine-readable identifier (e.g. `setter-only-field`).
   */
  readonly code: string;

  readonly message: string;

  /**
   * Originating element (`Point`, `Point.y`); `null` for unit-level messages.
   */
  readonly element: string | null;

  /**
   * Path of the unit the diagnostic belongs to.
   */
  readonly unit: string;
};
