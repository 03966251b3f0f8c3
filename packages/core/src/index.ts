/**
 * Restricted Regular Expression Library
 *
 * Compiles patterns built from literals, `.`, `\` escapes, `^`/`$` anchors and
 * the `?`/`*`/`+` quantifiers into a small NFA, and runs that NFA against
 * input strings.
 *
 * @packageDocumentation
 */

/**
 * Library version.
 * @public
 */
export const version = '0.1.0'

// =============================================================================
// Types
// =============================================================================

export type {
  // Token types
  PatternToken,
  TokenBase,
  StartAnchorToken,
  EndAnchorToken,
  LiteralToken,
  StrayAnchorToken,
  WildcardToken,
  QuantifierKind,
  QuantifierToken,
  DanglingEscapeToken,
  // Automaton types
  SymbolClass,
  EpsilonSymbol,
  LiteralSymbol,
  WildcardSymbol,
  StateTransitions,
  TransitionTable,
  Transition,
  CompiledAutomaton,
  // Diagnostic types
  PatternDiagnosticCode,
  PatternDiagnostic,
} from './types'

// =============================================================================
// Parsing
// =============================================================================

export { tokenizePattern } from './parse'
export { validatePattern, isValidPattern } from './parse'

// =============================================================================
// Compilation
// =============================================================================

export { compilePattern } from './compile'
export { listTransitions, describeAutomaton } from './compile'

// =============================================================================
// Matching
// =============================================================================

export { runAutomaton, stepAutomaton, epsilonClosure } from './match'
export { matchPattern, createMatcher } from './match'
