import type { Diagnostic, DiagnosticSeverity } from '../types';

import { CodegenError, toError } from '../errors';

/**
 * Turns an error class name into a diagnostic code
 * (`DuplicateKeyError` -> `duplicate-key`).
 */
function errorCode(error: Error): string {
  if (!(error instanceof CodegenError)) return 'internal';

  return error.name
    .replace(/Error$/, '')
    .replace(/[A-Z]/g, (letter, offset: number) =>
      `${offset > 0 ? '-' : ''}${letter.toLowerCase()}`
    );
}

/**
 * Collects the diagnostics of one unit.
 *
 * One collector is created per unit and threaded through every pass; the
 * caller owns it, so messages reported before a fail-fast abort survive.
 */
export class DiagnosticsCollector {
  private readonly entries: Diagnostic[] = [];

  constructor(readonly unit: string) {}

  get diagnostics(): readonly Diagnostic[] {
    return this.entries;
  }

  report(
    severity: DiagnosticSeverity,
    code: string,
    message: string,
    element: string | null = null
  ): void {
    this.entries.push({ severity, code, message, element, unit: this.unit });
  }

  info(code: string, message: string, element: string | null = null): void {
    this.report('info', code, message, element);
  }

  warning(code: string, message: string, element: string | null = null): void {
    this.report('warning', code, message, element);
  }

  error(code: string, message: string, element: string | null = null): void {
    this.report('error', code, message, element);
  }

  /**
   * Reports anything thrown as an error diagnostic. Codegen errors keep their
   * element; others are reported as `internal`.
   */
  reportError(thrown: unknown): void {
    const error = toError(thrown);
    const element = error instanceof CodegenError ? error.element : null;
    this.error(errorCode(error), error.message, element);
  }

  hasErrors(): boolean {
    return this.entries.some(entry => entry.severity === 'error');
  }
}
