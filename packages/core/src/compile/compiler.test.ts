import { describe, it, expect } from 'vitest'

import type { Transition } from '../types'
import { compilePattern } from './compiler'
import { listTransitions } from './transition-builder'

const lit = (from: number, char: string, to: number): Transition => ({
  from,
  symbol: { type: 'literal', char },
  to,
})
const any = (from: number, to: number): Transition => ({ from, symbol: { type: 'wildcard' }, to })
const eps = (from: number, to: number): Transition => ({ from, symbol: { type: 'epsilon' }, to })

function edges(pattern: string): readonly Transition[] {
  return listTransitions(compilePattern(pattern))
}

describe('compilePattern', () => {
  describe('empty pattern', () => {
    it('compiles to a single accepting state with a wildcard loop', () => {
      const automaton = compilePattern('')

      expect(listTransitions(automaton)).toEqual([any(0, 0)])
      expect(automaton.startState).toBe(0)
      expect(automaton.finalState).toBe(0)
      expect([...automaton.acceptingStates]).toEqual([0])
      expect(automaton.stateCount).toBe(1)
    })
  })

  describe('literals and wildcards', () => {
    it('chains one state per character and adds prefix and suffix loops', () => {
      const automaton = compilePattern('ab')

      expect(listTransitions(automaton)).toEqual([lit(0, 'a', 1), any(0, 0), lit(1, 'b', 2), any(2, 2)])
      expect([...automaton.acceptingStates]).toEqual([2])
      expect(automaton.source).toBe('ab')
    })

    it('compiles . to a wildcard edge', () => {
      expect(edges('^a.$')).toEqual([lit(0, 'a', 1), any(1, 2)])
    })

    it('compiles escaped characters to literal edges without a state for the backslash', () => {
      expect(edges('^a\\.\\\\$')).toEqual([lit(0, 'a', 1), lit(1, '.', 2), lit(2, '\\', 3)])
    })
  })

  describe('anchors', () => {
    it('drops both loops when fully anchored', () => {
      const automaton = compilePattern('^ab$')

      expect(listTransitions(automaton)).toEqual([lit(0, 'a', 1), lit(1, 'b', 2)])
      expect(automaton.finalState).toBe(2)
      expect(automaton.startAnchored).toBe(true)
      expect(automaton.endAnchored).toBe(true)
    })

    it('keeps the suffix loop when only start-anchored', () => {
      const automaton = compilePattern('^a')

      expect(listTransitions(automaton)).toEqual([lit(0, 'a', 1), any(1, 1)])
      expect(automaton.endAnchored).toBe(false)
    })

    it('keeps the prefix loop when only end-anchored', () => {
      expect(edges('a$')).toEqual([lit(0, 'a', 1), any(0, 0)])
    })

    it('compiles a $ before the end to a literal edge', () => {
      const automaton = compilePattern('^a$b$')

      expect(listTransitions(automaton)).toEqual([lit(0, 'a', 1), lit(1, '$', 2), lit(2, 'b', 3)])
      expect(automaton.finalState).toBe(3)
    })

    it('compiles ^$ to a lone accepting state', () => {
      const automaton = compilePattern('^$')

      expect(listTransitions(automaton)).toEqual([])
      expect([...automaton.acceptingStates]).toEqual([0])
    })
  })

  describe('quantifiers', () => {
    it('compiles ? to an epsilon bypass', () => {
      expect(edges('^a?b$')).toEqual([eps(0, 1), lit(0, 'a', 1), lit(1, 'b', 2)])
    })

    it('compiles * to an epsilon bypass plus a self-loop', () => {
      expect(edges('^a*b$')).toEqual([eps(0, 1), lit(1, 'a', 1), lit(1, 'b', 2)])
    })

    it('compiles + to a self-loop after the first occurrence', () => {
      expect(edges('^a+b$')).toEqual([lit(0, 'a', 1), lit(1, 'a', 1), lit(1, 'b', 2)])
    })

    it('quantifies a wildcard', () => {
      expect(edges('^.*$')).toEqual([eps(0, 1), any(1, 1)])
      expect(edges('^.+$')).toEqual([any(0, 1), any(1, 1)])
    })

    it('lets a leading wildcard replace the prefix loop', () => {
      expect(edges('.')).toEqual([any(0, 1), any(1, 1)])
      expect(edges('.b')).toEqual([any(0, 1), lit(1, 'b', 2), any(2, 2)])
      expect(edges('.+')).toEqual([any(0, 1), any(1, 1)])
      expect(edges('.?')).toEqual([eps(0, 1), any(0, 1), any(1, 1)])
      expect(edges('.*b')).toEqual([eps(0, 1), lit(1, 'b', 2), any(1, 1), any(2, 2)])
    })

    it('never adds a state for a quantifier', () => {
      expect(compilePattern('a?b*c+').finalState).toBe(3)
    })
  })

  describe('malformed patterns', () => {
    it('ignores a quantifier with nothing to repeat', () => {
      expect(edges('^*a$')).toEqual([lit(0, 'a', 1)])
      expect(edges('^a**')).toEqual([eps(0, 1), lit(1, 'a', 1), any(1, 1)])
    })

    it('ignores a quantifier after a literal $', () => {
      expect(edges('^$?a$')).toEqual([lit(0, '$', 1), lit(1, 'a', 2)])
    })

    it('ignores a dangling escape', () => {
      const automaton = compilePattern('^a\\')

      expect(listTransitions(automaton)).toEqual([lit(0, 'a', 1), any(1, 1)])
      expect(automaton.finalState).toBe(1)
    })
  })

  it('produces the same relation every time', () => {
    expect(edges('^a+.?b*c$')).toEqual(edges('^a+.?b*c$'))
  })
})
