/**
 * Type definitions for the pattern language and its automata.
 * @packageDocumentation
 */

// Token types
export type {
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
} from './tokens'

// Automaton types
export type {
  SymbolClass,
  EpsilonSymbol,
  LiteralSymbol,
  WildcardSymbol,
  StateTransitions,
  TransitionTable,
  Transition,
  CompiledAutomaton,
} from './automaton'

// Diagnostic types
export type { PatternDiagnosticCode, PatternDiagnostic } from './errors'
