/**
 * Transition builder - owns the relation while a pattern is compiled.
 * @packageDocumentation
 */

import type { SymbolClass, StateTransitions, TransitionTable, Transition, CompiledAutomaton } from '../types'

/**
 * Mutable edges of one state while under construction.
 */
interface MutableStateTransitions {
  literals: Map<string, number>
  wildcard?: number
  epsilon?: number
}

/**
 * Accumulates edges and hands back a read-only `TransitionTable`.
 *
 * Setting an edge that already exists for the same (state, symbol) pair
 * replaces its target.
 */
export class TransitionBuilder {
  private readonly states = new Map<number, MutableStateTransitions>()
  private built = false

  /**
   * Add or replace the edge `from --symbol--> to`.
   */
  set(from: number, symbol: SymbolClass, to: number): this {
    this.assertOpen()
    const state = this.stateFor(from)
    switch (symbol.type) {
      case 'literal':
        state.literals.set(symbol.char, to)
        break
      case 'wildcard':
        state.wildcard = to
        break
      case 'epsilon':
        state.epsilon = to
        break
    }
    return this
  }

  /**
   * Remove the edge leaving `from` on `symbol`, if there is one.
   */
  delete(from: number, symbol: SymbolClass): this {
    this.assertOpen()
    const state = this.states.get(from)
    if (!state) return this

    switch (symbol.type) {
      case 'literal':
        state.literals.delete(symbol.char)
        break
      case 'wildcard':
        state.wildcard = undefined
        break
      case 'epsilon':
        state.epsilon = undefined
        break
    }
    return this
  }

  /**
   * Freeze the relation. The builder cannot be edited afterwards.
   */
  build(): TransitionTable {
    this.assertOpen()
    this.built = true

    const table = new Map<number, StateTransitions>()
    for (const [id, state] of this.states) {
      if (state.literals.size === 0 && state.wildcard === undefined && state.epsilon === undefined) {
        continue
      }
      const frozen: MutableStateTransitions = { literals: new Map(state.literals) }
      if (state.wildcard !== undefined) frozen.wildcard = state.wildcard
      if (state.epsilon !== undefined) frozen.epsilon = state.epsilon
      table.set(id, frozen)
    }
    return table
  }

  private stateFor(id: number): MutableStateTransitions {
    let state = this.states.get(id)
    if (!state) {
      state = { literals: new Map() }
      this.states.set(id, state)
    }
    return state
  }

  private assertOpen(): void {
    if (this.built) {
      throw new Error('TransitionBuilder has already been built')
    }
  }
}

/**
 * Enumerate every edge of a compiled automaton.
 *
 * Edges are ordered by source state, then epsilon, literals (by code point),
 * wildcard.
 *
 * @param automaton - Compiled automaton
 * @returns All edges
 *
 * @public
 */
export function listTransitions(automaton: Pick<CompiledAutomaton, 'transitions'>): readonly Transition[] {
  const edges: Transition[] = []
  const ids = [...automaton.transitions.keys()].sort((a, b) => a - b)

  for (const from of ids) {
    const state = automaton.transitions.get(from)
    if (!state) continue

    if (state.epsilon !== undefined) {
      edges.push({ from, symbol: { type: 'epsilon' }, to: state.epsilon })
    }
    const chars = [...state.literals.keys()].sort(compareCodePoints)
    for (const char of chars) {
      const to = state.literals.get(char)
      if (to !== undefined) {
        edges.push({ from, symbol: { type: 'literal', char }, to })
      }
    }
    if (state.wildcard !== undefined) {
      edges.push({ from, symbol: { type: 'wildcard' }, to: state.wildcard })
    }
  }

  return edges
}

function compareCodePoints(a: string, b: string): number {
  return (a.codePointAt(0) ?? 0) - (b.codePointAt(0) ?? 0)
}

/**
 * Render a compiled automaton as text, one edge per line.
 *
 * ```
 * 0 --'a'--> 1
 * 1 --ε--> 2
 * 2 --.--> 2
 * accept: 2
 * ```
 *
 * @public
 */
export function describeAutomaton(automaton: CompiledAutomaton): string {
  const lines = listTransitions(automaton).map(
    (edge) => `${edge.from} --${formatSymbol(edge.symbol)}--> ${edge.to}`,
  )
  const accepting = [...automaton.acceptingStates].sort((a, b) => a - b)
  lines.push(`accept: ${accepting.join(', ')}`)
  return lines.join('\n')
}

function formatSymbol(symbol: SymbolClass): string {
  switch (symbol.type) {
    case 'epsilon':
      return 'ε'
    case 'wildcard':
      return '.'
    case 'literal':
      return `'${escapeChar(symbol.char)}'`
  }
}

/**
 * Escape a character for display inside single quotes.
 */
function escapeChar(char: string): string {
  if (char === "'") return "\\'"
  if (char === '"') return char
  return JSON.stringify(char).slice(1, -1)
}
