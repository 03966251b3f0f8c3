/**
 * Pattern tokenizing and validation.
 * @packageDocumentation
 */

export { tokenizePattern } from './tokenizer'
export { validatePattern, isValidPattern } from './validator'
