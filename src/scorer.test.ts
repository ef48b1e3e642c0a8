import { describe, expect, it } from 'vitest'
import { score, unscannable } from './scorer.js'
import type { SeverityTier, Violation } from './types.js'

const violation = (rule_id: string, severity: SeverityTier, weight: number): Violation => ({
  rule_id,
  start: 0,
  end: 1,
  line: 1,
  column: 1,
  weight,
  severity,
  snippet: 'x',
})

describe('score', () => {
  it('gives clean, parseable code a perfect score and accepts it', () => {
    const result = score('x = 1\n', [], true, 'python')

    expect(result.score).toBe(100)
    expect(result.verdict).toBe('accept')
    expect(result.reasons).toEqual([])
    expect(result.complexity).toEqual({ lines: 1, max_depth: 0, branches: 0 })
  })

  it('rejects any critical violation regardless of score', () => {
    const result = score('x', [violation('recursive_delete', 'critical', 1)], true)

    expect(result.score).toBe(99)
    expect(result.verdict).toBe('reject')
    expect(result.reasons).toEqual(['critical violation: recursive_delete'])
  })

  it('lists each critical rule once', () => {
    const result = score(
      'x',
      [violation('a', 'critical', 1), violation('a', 'critical', 1), violation('b', 'critical', 1)],
      true,
    )

    expect(result.reasons).toEqual(['critical violation: a, b'])
  })

  it('accepts minor violations above the accept threshold', () => {
    const result = score('x', [violation('file_write', 'low', 10), violation('secret', 'medium', 10)], true)

    expect(result.score).toBe(80)
    expect(result.verdict).toBe('accept')
  })

  it('warns on a high-severity violation even when the score is high', () => {
    const result = score('x', [violation('dynamic_eval', 'high', 5)], true)

    expect(result.score).toBe(95)
    expect(result.verdict).toBe('accept_with_warnings')
    expect(result.reasons).toEqual(['high-severity violation: dynamic_eval'])
  })

  it('warns between the two thresholds', () => {
    const result = score('x', [violation('secret', 'medium', 50)], true)

    expect(result.score).toBe(50)
    expect(result.verdict).toBe('accept_with_warnings')
    expect(result.reasons).toEqual(['score 50 is below 80'])
  })

  it('rejects below the warn threshold', () => {
    const result = score('x', [violation('secret', 'medium', 51)], true)

    expect(result.score).toBe(49)
    expect(result.verdict).toBe('reject')
    expect(result.reasons).toEqual(['score 49 is below 50'])
  })

  it('applies the syntax penalty and says why', () => {
    const result = score('x', [], false)

    expect(result.score).toBe(75)
    expect(result.verdict).toBe('accept_with_warnings')
    expect(result.reasons).toEqual(['score 75 is below 80', 'code does not parse'])
  })

  it('never goes below zero', () => {
    const result = score('x', [violation('a', 'medium', 90), violation('b', 'medium', 90)], false)

    expect(result.score).toBe(0)
    expect(result.verdict).toBe('reject')
  })

  it('returns a frozen result', () => {
    const result = score('x', [violation('a', 'low', 1)], true)

    expect(Object.isFrozen(result)).toBe(true)
    expect(Object.isFrozen(result.violations)).toBe(true)
    expect(Object.isFrozen(result.violations[0])).toBe(true)
    expect(Object.isFrozen(result.reasons)).toBe(true)
  })

  it('is deterministic', () => {
    const violations = [violation('a', 'high', 30), violation('b', 'low', 5)]

    expect(score('if x:\n  y()', violations, true, 'python')).toEqual(
      score('if x:\n  y()', violations, true, 'python'),
    )
  })
})

describe('unscannable', () => {
  it('rejects with score zero and the reason', () => {
    expect(unscannable('Scan exceeded its 5ms budget')).toEqual({
      score: 0,
      verdict: 'reject',
      violations: [],
      syntax_valid: false,
      reasons: ['unscannable: Scan exceeded its 5ms budget'],
      complexity: { lines: 0, max_depth: 0, branches: 0 },
    })
  })
})
