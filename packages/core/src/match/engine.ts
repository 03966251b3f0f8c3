/**
 * Automaton execution - set simulation over a compiled transition relation.
 * @packageDocumentation
 */

import type { CompiledAutomaton, TransitionTable } from '../types'

/**
 * Compute the epsilon closure of a set of states.
 *
 * Worklist traversal with a visited set, so it terminates even when
 * epsilon edges form a cycle.
 *
 * @param transitions - Transition relation
 * @param states - Seed states (always part of the result)
 * @returns Every state reachable from a seed through epsilon edges alone
 *
 * @public
 */
export function epsilonClosure(transitions: TransitionTable, states: Iterable<number>): Set<number> {
  const closure = new Set(states)
  const worklist = [...closure]

  let stateId = worklist.pop()
  while (stateId !== undefined) {
    const target = transitions.get(stateId)?.epsilon
    if (target !== undefined && !closure.has(target)) {
      closure.add(target)
      worklist.push(target)
    }
    stateId = worklist.pop()
  }

  return closure
}

/**
 * Advance a set of active states by one input character.
 *
 * Each active state follows its literal edge for `char` if it has one, and
 * its wildcard edge otherwise. The result is closed under epsilon edges and
 * is empty when no state could consume `char`.
 *
 * @param automaton - Compiled automaton
 * @param active - Currently active states
 * @param char - A single Unicode scalar
 * @returns The next active states
 *
 * @public
 */
export function stepAutomaton(
  automaton: Pick<CompiledAutomaton, 'transitions'>,
  active: Iterable<number>,
  char: string,
): Set<number> {
  const next = new Set<number>()

  for (const stateId of active) {
    const state = automaton.transitions.get(stateId)
    if (!state) continue

    // Literal first, wildcard only as a fallback for this state
    const target = state.literals.get(char) ?? state.wildcard
    if (target !== undefined) {
      next.add(target)
    }
  }

  return epsilonClosure(automaton.transitions, next)
}

/**
 * Run a compiled automaton against an input string.
 *
 * @param automaton - Compiled automaton
 * @param input - Input text, consumed one Unicode scalar at a time
 * @returns true if the automaton accepts the whole input
 *
 * @public
 */
export function runAutomaton(automaton: CompiledAutomaton, input: string): boolean {
  let active = epsilonClosure(automaton.transitions, [automaton.startState])

  for (const char of input) {
    active = stepAutomaton(automaton, active, char)

    if (active.size === 0) {
      return false // No live path - the rest of the input cannot help
    }
  }

  for (const stateId of active) {
    if (automaton.acceptingStates.has(stateId)) {
      return true
    }
  }

  return false
}
