/**
 * Pattern tokenizer - splits pattern text into tokens.
 * @packageDocumentation
 */

import type { PatternToken, QuantifierKind } from '../types'

/**
 * Tokenizer state for tracking position and a pending escape.
 */
interface TokenizerState {
  /** UTF-16 offset of the next character */
  offset: number

  /** Offset of an unpaired `\`, if one is pending */
  escapeAt?: number
}

const QUANTIFIERS: ReadonlySet<string> = new Set<QuantifierKind>(['?', '*', '+'])

function isQuantifier(char: string): char is QuantifierKind {
  return QUANTIFIERS.has(char)
}

/**
 * Split a pattern into tokens.
 *
 * Characters are read one Unicode scalar at a time. Escape and anchor
 * positions are resolved here, so the compiler only ever sees a flat token
 * list. Never throws: every string tokenizes.
 *
 * @param source - The pattern string
 * @returns Tokens in source order
 *
 * @public
 */
export function tokenizePattern(source: string): readonly PatternToken[] {
  const tokens: PatternToken[] = []
  const state: TokenizerState = { offset: 0 }

  for (const char of source) {
    const position = state.offset
    state.offset += char.length
    const isLast = state.offset === source.length

    if (state.escapeAt !== undefined) {
      tokens.push({
        type: 'literal',
        char,
        escaped: true,
        position: state.escapeAt,
        length: position + char.length - state.escapeAt,
      })
      state.escapeAt = undefined
      continue
    }

    if (char === '\\') {
      state.escapeAt = position
      continue
    }

    if (char === '^' && position === 0) {
      tokens.push({ type: 'startAnchor', position, length: 1 })
    } else if (char === '$') {
      tokens.push(
        isLast
          ? { type: 'endAnchor', position, length: 1 }
          : { type: 'strayAnchor', char: '$', position, length: 1 },
      )
    } else if (char === '.') {
      tokens.push({ type: 'wildcard', position, length: 1 })
    } else if (isQuantifier(char)) {
      tokens.push({ type: 'quantifier', kind: char, position, length: 1 })
    } else {
      tokens.push({ type: 'literal', char, escaped: false, position, length: char.length })
    }
  }

  if (state.escapeAt !== undefined) {
    tokens.push({ type: 'danglingEscape', position: state.escapeAt, length: 1 })
  }

  return tokens
}
