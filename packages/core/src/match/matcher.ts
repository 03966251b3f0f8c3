/**
 * Pattern matching entry points.
 * @packageDocumentation
 */

import { compilePattern } from '../compile/compiler'
import { runAutomaton } from './engine'

/**
 * Test if an input matches a pattern.
 *
 * Compiles on every call; use `createMatcher` to test many inputs against
 * the same pattern.
 *
 * @param pattern - Pattern source
 * @param input - Input text
 * @returns true if the input matches
 *
 * @public
 */
export function matchPattern(pattern: string, input: string): boolean {
  return runAutomaton(compilePattern(pattern), input)
}

/**
 * Compile a pattern once and return a reusable predicate.
 *
 * @param pattern - Pattern source
 * @returns Predicate testing one input at a time
 *
 * @public
 */
export function createMatcher(pattern: string): (input: string) => boolean {
  const automaton = compilePattern(pattern)
  return (input) => runAutomaton(automaton, input)
}
