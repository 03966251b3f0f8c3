/**
 * Pattern validation - reports constructs compiled under a fallback policy.
 * @packageDocumentation
 */

import type { PatternToken, PatternDiagnostic } from '../types'
import { tokenizePattern } from './tokenizer'

/**
 * Validate a pattern.
 *
 * Reports:
 * - A trailing `\` with nothing to escape
 * - Quantifiers with nothing to repeat
 * - `^` or `$` away from the pattern edge, which match literally
 *
 * Compilation is unaffected; every pattern still compiles.
 *
 * @param pattern - Pattern source
 * @returns Diagnostics in source order (empty if the pattern is clean)
 *
 * @public
 */
export function validatePattern(pattern: string): readonly PatternDiagnostic[] {
  const diagnostics: PatternDiagnostic[] = []
  let repeatable = false

  for (const token of tokenizePattern(pattern)) {
    const diagnostic = checkToken(token, repeatable)
    if (diagnostic) {
      diagnostics.push(diagnostic)
    }
    repeatable = token.type === 'literal' || token.type === 'wildcard'
  }

  return diagnostics
}

/**
 * Check a single token given whether a quantifier could apply to its predecessor.
 */
function checkToken(token: PatternToken, repeatable: boolean): PatternDiagnostic | undefined {
  const location = { position: token.position, length: token.length }

  switch (token.type) {
    case 'danglingEscape':
      return {
        code: 'DANGLING_ESCAPE',
        message: 'Trailing \\ has nothing to escape and is ignored',
        ...location,
      }

    case 'quantifier':
      if (repeatable) return undefined
      return {
        code: 'ORPHAN_QUANTIFIER',
        message: `Quantifier ${token.kind} has nothing to repeat and is ignored`,
        ...location,
      }

    case 'strayAnchor':
      return {
        code: 'LITERAL_ANCHOR',
        message: '$ is only an anchor at the end of a pattern; matched literally',
        ...location,
      }

    case 'literal':
      if (token.char === '^' && !token.escaped) {
        return {
          code: 'LITERAL_ANCHOR',
          message: '^ is only an anchor at the start of a pattern; matched literally',
          ...location,
        }
      }
      return undefined

    default:
      return undefined
  }
}

/**
 * Check if a pattern has no diagnostics.
 *
 * @param pattern - Pattern source
 * @returns true if `validatePattern` reports nothing
 *
 * @public
 */
export function isValidPattern(pattern: string): boolean {
  return validatePattern(pattern).length === 0
}
