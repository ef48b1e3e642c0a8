import { measureComplexity } from './syntax-checker.js'
import type { ScoreResult, Verdict, Violation } from './types.js'

export const MAX_SCORE = 100
export const SYNTAX_PENALTY = 25
export const ACCEPT_THRESHOLD = 80
export const WARN_THRESHOLD = 50

/**
 * Score code from its violations and syntax validity.
 *
 * Verdict order:
 * 1. any critical violation → reject, whatever the score
 * 2. score ≥ 80 with no high-severity violation → accept
 * 3. score ≥ 50 → accept_with_warnings
 * 4. otherwise → reject
 *
 * Complexity metrics are reported alongside but never move the score.
 */
export function score(
  code: string,
  violations: readonly Violation[],
  syntaxValid: boolean,
  language?: string,
): ScoreResult {
  const penalty = violations.reduce((sum, v) => sum + v.weight, 0)
  const value = Math.max(0, MAX_SCORE - penalty - (syntaxValid ? 0 : SYNTAX_PENALTY))

  const critical = unique(violations.filter((v) => v.severity === 'critical').map((v) => v.rule_id))
  const high = unique(violations.filter((v) => v.severity === 'high').map((v) => v.rule_id))

  const reasons: string[] = []
  let verdict: Verdict

  if (critical.length > 0) {
    verdict = 'reject'
    reasons.push(`critical violation: ${critical.join(', ')}`)
  } else if (value >= ACCEPT_THRESHOLD && high.length === 0) {
    verdict = 'accept'
  } else if (value >= WARN_THRESHOLD) {
    verdict = 'accept_with_warnings'
    if (high.length > 0) {
      reasons.push(`high-severity violation: ${high.join(', ')}`)
    }
    if (value < ACCEPT_THRESHOLD) {
      reasons.push(`score ${value} is below ${ACCEPT_THRESHOLD}`)
    }
  } else {
    verdict = 'reject'
    reasons.push(`score ${value} is below ${WARN_THRESHOLD}`)
  }

  if (!syntaxValid) {
    reasons.push('code does not parse')
  }

  return freezeResult({
    score: value,
    verdict,
    violations: [...violations],
    syntax_valid: syntaxValid,
    reasons,
    complexity: measureComplexity(code, language),
  })
}

/**
 * REJECT result for code the sanitizer could not scan.
 */
export function unscannable(detail: string): ScoreResult {
  return freezeResult({
    score: 0,
    verdict: 'reject',
    violations: [],
    syntax_valid: false,
    reasons: [`unscannable: ${detail}`],
    complexity: { lines: 0, max_depth: 0, branches: 0 },
  })
}

function freezeResult(result: ScoreResult): ScoreResult {
  for (const violation of result.violations) {
    Object.freeze(violation)
  }
  Object.freeze(result.violations)
  Object.freeze(result.reasons)
  Object.freeze(result.complexity)
  return Object.freeze(result)
}

function unique(ids: string[]): string[] {
  return [...new Set(ids)]
}
