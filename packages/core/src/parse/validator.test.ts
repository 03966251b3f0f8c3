import { describe, it, expect } from 'vitest'

import { validatePattern, isValidPattern } from './validator'

describe('validatePattern', () => {
  it('returns empty array for clean patterns', () => {
    const clean = ['', 'abcd', '^a.c$', 'a?b*c+', '.*', 'a\\$b', '\\^a', 'a\\\\']

    for (const src of clean) {
      expect(validatePattern(src), `Expected no diagnostics for ${src}`).toEqual([])
    }
  })

  it('detects a dangling escape', () => {
    expect(validatePattern('ab\\')).toEqual([
      {
        code: 'DANGLING_ESCAPE',
        message: 'Trailing \\ has nothing to escape and is ignored',
        position: 2,
        length: 1,
      },
    ])
  })

  it('detects a quantifier at the start', () => {
    expect(validatePattern('*a')).toEqual([
      {
        code: 'ORPHAN_QUANTIFIER',
        message: 'Quantifier * has nothing to repeat and is ignored',
        position: 0,
        length: 1,
      },
    ])
  })

  it('detects a quantifier after another quantifier', () => {
    const diagnostics = validatePattern('a*?')

    expect(diagnostics.map((d) => [d.code, d.position])).toEqual([['ORPHAN_QUANTIFIER', 2]])
  })

  it('detects a quantifier after a start anchor', () => {
    expect(validatePattern('^+').map((d) => [d.code, d.position])).toEqual([['ORPHAN_QUANTIFIER', 1]])
  })

  it('detects anchors that are matched literally', () => {
    expect(validatePattern('a$b')).toEqual([
      {
        code: 'LITERAL_ANCHOR',
        message: '$ is only an anchor at the end of a pattern; matched literally',
        position: 1,
        length: 1,
      },
    ])
    expect(validatePattern('a^').map((d) => [d.code, d.position])).toEqual([['LITERAL_ANCHOR', 1]])
  })

  it('reports diagnostics in source order', () => {
    expect(validatePattern('$?').map((d) => d.code)).toEqual(['LITERAL_ANCHOR', 'ORPHAN_QUANTIFIER'])
  })
})

describe('isValidPattern', () => {
  it('returns true for clean patterns', () => {
    expect(isValidPattern('^a+b?$')).toBe(true)
    expect(isValidPattern('')).toBe(true)
  })

  it('returns false for patterns with diagnostics', () => {
    expect(isValidPattern('a\\')).toBe(false)
    expect(isValidPattern('?')).toBe(false)
  })
})
