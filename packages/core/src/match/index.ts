/**
 * Automaton execution and matching.
 * @packageDocumentation
 */

export { epsilonClosure, stepAutomaton, runAutomaton } from './engine'

export { matchPattern, createMatcher } from './matcher'
