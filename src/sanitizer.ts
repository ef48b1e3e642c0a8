import { SanitizationError, errorMessage } from './errors.js'
import type { PatternRule, RegistrySnapshot, ScanResult, Violation } from './types.js'

export const MAX_MATCHES_PER_RULE = 10_000
export const DEFAULT_MAX_CODE_BYTES = 512 * 1024
export const DEFAULT_SCAN_BUDGET_MS = 2_000
const SNIPPET_LENGTH = 80

const HASH_COMMENT_LANGUAGES = new Set([
  'python',
  'py',
  'ruby',
  'rb',
  'shell',
  'sh',
  'bash',
  'zsh',
  'perl',
  'r',
  'yaml',
  'yml',
  'toml',
  'powershell',
  'ps1',
  'dockerfile',
  'makefile',
  'elixir',
  'julia',
])

export interface SanitizerOptions {
  maxCodeBytes?: number
  budgetMs?: number
  clock?: () => number
}

interface Span {
  start: number
  end: number
}

interface ClaimedSpan extends Span {
  ruleId: string
}

interface Replacement extends Span {
  text: string
}

/**
 * Screens code against a registry snapshot.
 *
 * Every match of every rule is reported against the original text. Rules with
 * action `strip` additionally replace their span in the returned copy with a
 * visible placeholder comment; the first rule in registry order to claim a span
 * keeps it.
 *
 * Holds no per-scan state, so the same instance serves concurrent requests.
 */
export class Sanitizer {
  private readonly maxCodeBytes: number
  private readonly budgetMs: number
  private readonly clock: () => number

  constructor(options: SanitizerOptions = {}) {
    this.maxCodeBytes = options.maxCodeBytes ?? DEFAULT_MAX_CODE_BYTES
    this.budgetMs = options.budgetMs ?? DEFAULT_SCAN_BUDGET_MS
    this.clock = options.clock ?? Date.now
  }

  scan(code: string, snapshot: RegistrySnapshot, language?: string): ScanResult {
    const size = Buffer.byteLength(code, 'utf-8')
    if (size > this.maxCodeBytes) {
      throw new SanitizationError(
        `Code is ${size} bytes, larger than the ${this.maxCodeBytes} byte scan limit`,
      )
    }

    const deadline = this.clock() + this.budgetMs
    const lineStarts = computeLineStarts(code)
    const violations: Violation[] = []
    const claimed: ClaimedSpan[] = []

    for (const rule of snapshot.rules) {
      for (const span of this.findMatches(rule, code, deadline)) {
        const { line, column } = locate(lineStarts, span.start)
        violations.push({
          rule_id: rule.id,
          start: span.start,
          end: span.end,
          line,
          column,
          weight: rule.weight,
          severity: rule.severity,
          snippet: code.slice(span.start, span.end).slice(0, SNIPPET_LENGTH),
        })

        if (rule.action === 'strip' && !claimed.some((c) => overlaps(c, span))) {
          claimed.push({ ...span, ruleId: rule.id })
        }
      }
    }

    return {
      registry_version: snapshot.version,
      violations,
      cleaned_code: applyStrips(code, claimed, language),
    }
  }

  private findMatches(rule: PatternRule, code: string, deadline: number): Span[] {
    const spans: Span[] = []
    const record = (start: number, end: number): void => {
      spans.push({ start, end })
      if (spans.length > MAX_MATCHES_PER_RULE) {
        throw new SanitizationError(
          `Rule '${rule.id}' matched more than ${MAX_MATCHES_PER_RULE} times`,
        )
      }
      if (this.clock() > deadline) {
        throw new SanitizationError(`Scan exceeded its ${this.budgetMs}ms budget at rule '${rule.id}'`)
      }
    }

    if (rule.matcher.kind === 'literal') {
      const needle = rule.matcher.value
      let index = code.indexOf(needle)
      while (index !== -1) {
        record(index, index + needle.length)
        index = code.indexOf(needle, index + needle.length)
      }
      return spans
    }

    let regex: RegExp
    try {
      // Fresh global instance per scan: lastIndex never leaks between calls
      regex = new RegExp(rule.matcher.pattern, `${rule.matcher.flags}g`)
    } catch (error) {
      throw new SanitizationError(`Rule '${rule.id}' could not be evaluated: ${errorMessage(error)}`, {
        cause: error,
      })
    }

    let match = regex.exec(code)
    while (match !== null) {
      if (match[0].length === 0) {
        regex.lastIndex++
      } else {
        record(match.index, match.index + match[0].length)
      }
      match = regex.exec(code)
    }
    return spans
  }
}

export function commentPlaceholder(ruleId: string, language?: string): string {
  const text = `SECURITY REMOVED: ${ruleId}`
  return usesHashComments(language) ? `# ${text}` : `/* ${text} */`
}

function usesHashComments(language?: string): boolean {
  return language !== undefined && HASH_COMMENT_LANGUAGES.has(language.toLowerCase())
}

function applyStrips(code: string, claimed: ClaimedSpan[], language?: string): string {
  if (claimed.length === 0) {
    return code
  }

  const ordered = [...claimed].sort((a, b) => a.start - b.start)
  const replacements = usesHashComments(language)
    ? wholeLineReplacements(code, ordered, language)
    : ordered.map((span) => ({
        start: span.start,
        end: span.end,
        // Keep the removed span's line breaks so later line numbers stay put
        text: commentPlaceholder(span.ruleId, language) + '\n'.repeat(countNewlines(code, span)),
      }))

  let output = ''
  let cursor = 0
  for (const replacement of replacements) {
    output += code.slice(cursor, replacement.start) + replacement.text
    cursor = replacement.end
  }
  return output + code.slice(cursor)
}

/**
 * A `#` comment runs to the end of its line, so the placeholder takes over
 * every line a stripped span touches, keeping the first line's indentation.
 * Spans that share a line collapse into one placeholder naming each rule.
 */
function wholeLineReplacements(code: string, ordered: ClaimedSpan[], language?: string): Replacement[] {
  const merged: Array<Span & { ruleIds: string[] }> = []

  for (const span of ordered) {
    const start = span.start === 0 ? 0 : code.lastIndexOf('\n', span.start - 1) + 1
    const lineEnd = code.indexOf('\n', span.end - 1)
    const end = lineEnd === -1 ? code.length : lineEnd

    const last = merged.length > 0 ? merged[merged.length - 1] : undefined
    if (last && start <= last.end) {
      last.end = Math.max(last.end, end)
      if (!last.ruleIds.includes(span.ruleId)) {
        last.ruleIds.push(span.ruleId)
      }
    } else {
      merged.push({ start, end, ruleIds: [span.ruleId] })
    }
  }

  return merged.map((span) => {
    const indent = /^[ \t]*/.exec(code.slice(span.start, span.end))?.[0] ?? ''
    return {
      start: span.start,
      end: span.end,
      text: indent + commentPlaceholder(span.ruleIds.join(', '), language) + '\n'.repeat(countNewlines(code, span)),
    }
  })
}

function countNewlines(code: string, span: Span): number {
  return code.slice(span.start, span.end).split('\n').length - 1
}

function overlaps(a: Span, b: Span): boolean {
  return a.start < b.end && b.start < a.end
}

function computeLineStarts(code: string): number[] {
  const starts = [0]
  for (let i = 0; i < code.length; i++) {
    if (code[i] === '\n') {
      starts.push(i + 1)
    }
  }
  return starts
}

function locate(lineStarts: number[], offset: number): { line: number; column: number } {
  let low = 0
  let high = lineStarts.length - 1
  while (low < high) {
    const mid = (low + high + 1) >> 1
    if (lineStarts[mid] <= offset) {
      low = mid
    } else {
      high = mid - 1
    }
  }
  return { line: low + 1, column: offset - lineStarts[low] + 1 }
}
