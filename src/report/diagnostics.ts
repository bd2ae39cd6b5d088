/**
 * Diagnostics (warnings) produced while rendering a report.
 *
 * A malformed document never aborts rendering; each degradation is recorded
 * here instead:
 * - `code`: stable identifier for programmatic handling.
 * - `message`: human-readable description.
 * - `line`: 0-based line index (when applicable).
 */
export type DiagnosticSeverity = 'error' | 'warning';

export type DiagnosticCode =
  | 'MISSING_IMAGE'
  | 'MALFORMED_TABLE'
  | 'EMPTY_COLUMN_GROUP'
  | 'MISSING_FIGURE'
  | 'PDF_NOT_RENDERED';

export interface Diagnostic {
  severity: DiagnosticSeverity;
  code: DiagnosticCode;
  message: string;
  line?: number; // 0-based
}

/**
 * Helper for building a warning diagnostic.
 */
export function warningDiagnostic(
  code: DiagnosticCode,
  message: string,
  line?: number
): Diagnostic {
  return { severity: 'warning', code, message, line };
}
