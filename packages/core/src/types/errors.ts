/**
 * Diagnostic codes for patterns that compile under a fallback policy.
 * @public
 */
export type PatternDiagnosticCode =
  | 'DANGLING_ESCAPE' // trailing \ with nothing to escape
  | 'ORPHAN_QUANTIFIER' // ?, * or + with nothing to repeat
  | 'LITERAL_ANCHOR' // ^ not at the start, $ not at the end

/**
 * A pattern diagnostic with location information.
 *
 * Diagnostics never stop compilation; they describe how a questionable
 * construct was interpreted.
 *
 * @public
 */
export interface PatternDiagnostic {
  /** Diagnostic classification code */
  readonly code: PatternDiagnosticCode

  /** Human-readable description */
  readonly message: string

  /** UTF-16 offset in the source where the construct starts */
  readonly position?: number

  /** Length of the construct in UTF-16 units */
  readonly length?: number
}
