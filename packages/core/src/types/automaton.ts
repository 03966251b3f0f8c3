// =============================================================================
// SYMBOL CLASSES
// =============================================================================

/**
 * The label on an automaton edge.
 *
 * At most one edge leaves a state per symbol class, so nondeterminism comes
 * only from several states being active at once.
 *
 * @public
 */
export type SymbolClass = EpsilonSymbol | LiteralSymbol | WildcardSymbol

/**
 * Edge taken without consuming input.
 * @public
 */
export interface EpsilonSymbol {
  readonly type: 'epsilon'
}

/**
 * Edge taken when the current input character equals `char`.
 * @public
 */
export interface LiteralSymbol {
  readonly type: 'literal'
  /** A single Unicode scalar */
  readonly char: string
}

/**
 * Catch-all edge, taken only when no literal edge of the same state matches.
 * @public
 */
export interface WildcardSymbol {
  readonly type: 'wildcard'
}

// =============================================================================
// TRANSITION RELATION
// =============================================================================

/**
 * All edges leaving one state.
 * @public
 */
export interface StateTransitions {
  /** Literal edges keyed by character */
  readonly literals: ReadonlyMap<string, number>

  /** Target of the wildcard edge, if any */
  readonly wildcard?: number

  /** Target of the epsilon edge, if any */
  readonly epsilon?: number
}

/**
 * Transition relation keyed by source state.
 * States with no outgoing edges have no entry.
 * @public
 */
export type TransitionTable = ReadonlyMap<number, StateTransitions>

/**
 * A single edge, as enumerated by `listTransitions`.
 * @public
 */
export interface Transition {
  readonly from: number
  readonly symbol: SymbolClass
  readonly to: number
}

// =============================================================================
// COMPILED AUTOMATON
// =============================================================================

/**
 * A compiled pattern.
 *
 * Built once by `compilePattern` and never mutated; any number of runs may
 * share it.
 *
 * @public
 */
export interface CompiledAutomaton {
  /** Original source pattern */
  readonly source: string

  /** Transition relation */
  readonly transitions: TransitionTable

  /** Always 0 */
  readonly startState: number

  /** The state reached once the whole pattern has been consumed */
  readonly finalState: number

  /** Accepting states (the compiler always produces `{ finalState }`) */
  readonly acceptingStates: ReadonlySet<number>

  /** Number of states, `finalState + 1` */
  readonly stateCount: number

  /** Pattern began with `^`: no unmatched prefix is tolerated */
  readonly startAnchored: boolean

  /** Pattern ended with `$`: no trailing input is tolerated */
  readonly endAnchored: boolean
}
