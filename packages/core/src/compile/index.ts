/**
 * Pattern compilation utilities.
 * @packageDocumentation
 */

export { compilePattern } from './compiler'
export { listTransitions, describeAutomaton } from './transition-builder'
