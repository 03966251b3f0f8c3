/**
 * Pattern compiler - compiles pattern text to an automaton.
 * @packageDocumentation
 */

import type { CompiledAutomaton, PatternToken, QuantifierKind, SymbolClass } from '../types'
import { tokenizePattern } from '../parse/tokenizer'
import { TransitionBuilder } from './transition-builder'

const WILDCARD: SymbolClass = { type: 'wildcard' }
const EPSILON: SymbolClass = { type: 'epsilon' }
const DOLLAR: SymbolClass = { type: 'literal', char: '$' }

/**
 * The most recent edge a quantifier may rewrite.
 */
interface Atom {
  readonly from: number
  readonly to: number
  readonly symbol: SymbolClass
}

/**
 * Compiler state for a single left-to-right pass.
 */
interface CompilerState {
  readonly builder: TransitionBuilder

  /** The state reached so far; the next consuming token leaves from here */
  current: number

  startAnchored: boolean
  endAnchored: boolean

  /** Cleared by anything a quantifier cannot apply to */
  atom?: Atom
}

/**
 * Compile a pattern to an automaton.
 *
 * Anchors and quantifiers are written straight into the transition relation
 * as the tokens are read; there is no intermediate tree. Every string
 * compiles, including the empty pattern, which matches any input.
 *
 * @param pattern - Pattern source
 * @returns Compiled automaton ready for `runAutomaton`
 *
 * @public
 */
export function compilePattern(pattern: string): CompiledAutomaton {
  const state: CompilerState = {
    builder: new TransitionBuilder(),
    current: 0,
    startAnchored: false,
    endAnchored: false,
  }

  // Prefix loop goes in first so a leading `.` replaces it; `^` removes it
  state.builder.set(0, WILDCARD, 0)

  for (const token of tokenizePattern(pattern)) {
    compileToken(state, token)
  }

  const { builder, startAnchored, endAnchored } = state
  const finalState = state.current

  // A trailing `$` only withholds the loop that tolerates trailing input
  if (!endAnchored) {
    builder.set(finalState, WILDCARD, finalState)
  }

  return {
    source: pattern,
    transitions: builder.build(),
    startState: 0,
    finalState,
    acceptingStates: new Set([finalState]),
    stateCount: finalState + 1,
    startAnchored,
    endAnchored,
  }
}

function compileToken(state: CompilerState, token: PatternToken): void {
  switch (token.type) {
    case 'startAnchor':
      state.builder.delete(0, WILDCARD)
      state.startAnchored = true
      state.atom = undefined
      break

    case 'literal':
      state.atom = advance(state, { type: 'literal', char: token.char })
      break

    case 'wildcard':
      state.atom = advance(state, WILDCARD)
      break

    case 'strayAnchor':
      advance(state, DOLLAR)
      state.atom = undefined
      break

    case 'endAnchor':
      state.endAnchored = true
      state.atom = undefined
      break

    case 'quantifier':
      if (state.atom) {
        applyQuantifier(state.builder, token.kind, state.atom)
      }
      state.atom = undefined
      break

    case 'danglingEscape':
      break
  }
}

/**
 * Add a consuming edge from the current state to a fresh one.
 */
function advance(state: CompilerState, symbol: SymbolClass): Atom {
  const from = state.current
  const to = from + 1
  state.builder.set(from, symbol, to)
  state.current = to
  return { from, to, symbol }
}

/**
 * Rewrite the atom's edge for a quantifier. Quantifiers never add a state.
 */
function applyQuantifier(builder: TransitionBuilder, kind: QuantifierKind, atom: Atom): void {
  switch (kind) {
    case '?':
      builder.set(atom.from, EPSILON, atom.to)
      break

    case '*':
      builder.delete(atom.from, atom.symbol)
      builder.set(atom.from, EPSILON, atom.to)
      builder.set(atom.to, atom.symbol, atom.to)
      break

    case '+':
      builder.set(atom.to, atom.symbol, atom.to)
      break
  }
}
