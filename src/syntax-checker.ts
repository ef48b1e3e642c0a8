import ts from 'typescript'
import type { ComplexityMetrics } from './types.js'

export interface SyntaxReport {
  valid: boolean
  errors: string[]
}

const SCRIPT_FILE_NAMES: Record<string, string> = {
  javascript: 'snippet.js',
  js: 'snippet.js',
  mjs: 'snippet.mjs',
  cjs: 'snippet.cjs',
  jsx: 'snippet.jsx',
  typescript: 'snippet.ts',
  ts: 'snippet.ts',
  tsx: 'snippet.tsx',
}

const HASH_COMMENT_LANGUAGES = new Set(['python', 'py', 'ruby', 'rb', 'shell', 'sh', 'bash', 'r', 'perl'])
const TRIPLE_QUOTE_LANGUAGES = new Set(['python', 'py'])
// Single quotes open lifetimes/labels here, not strings
const NO_SINGLE_QUOTE_STRINGS = new Set(['rust', 'rs'])

const OPENERS: Record<string, string> = { '(': ')', '[': ']', '{': '}' }
const CLOSERS = new Set([')', ']', '}'])
const BRANCH_PATTERN = /\b(?:if|elif|else\s+if|for|foreach|while|case|catch|except|when)\b|&&|\|\||\?\?/g

/**
 * Decide whether `code` parses as `language`.
 *
 * JavaScript and TypeScript go through the TypeScript parser. JSON goes through
 * JSON.parse. Anything else gets a delimiter-balance check that skips strings
 * and comments, which catches truncated model output but not every grammar error.
 */
export function checkSyntax(code: string, language: string): SyntaxReport {
  const lang = language.toLowerCase()

  const fileName = SCRIPT_FILE_NAMES[lang]
  if (fileName) {
    return checkScript(code, fileName)
  }

  if (lang === 'json') {
    try {
      JSON.parse(code)
      return { valid: true, errors: [] }
    } catch (error) {
      return { valid: false, errors: [error instanceof Error ? error.message : String(error)] }
    }
  }

  const errors = walkDelimiters(code, lang).errors
  return { valid: errors.length === 0, errors }
}

export function measureComplexity(code: string, language = ''): ComplexityMetrics {
  const lines = code.split('\n')
  const nonEmpty = lines.filter((line) => line.trim().length > 0)
  const lang = language.toLowerCase()

  let maxDepth = walkDelimiters(code, lang).maxDepth
  if (TRIPLE_QUOTE_LANGUAGES.has(lang)) {
    // Indentation carries nesting in Python
    for (const line of nonEmpty) {
      const indent = line.length - line.trimStart().length
      maxDepth = Math.max(maxDepth, Math.floor(indent / 4))
    }
  }

  return {
    lines: nonEmpty.length,
    max_depth: maxDepth,
    branches: code.match(BRANCH_PATTERN)?.length ?? 0,
  }
}

function checkScript(code: string, fileName: string): SyntaxReport {
  const output = ts.transpileModule(code, {
    fileName,
    reportDiagnostics: true,
    compilerOptions: {
      target: ts.ScriptTarget.ES2022,
      module: ts.ModuleKind.ESNext,
      jsx: ts.JsxEmit.Preserve,
      allowJs: true,
      noLib: true,
    },
  })

  const errors = (output.diagnostics ?? [])
    .filter((d) => d.category === ts.DiagnosticCategory.Error)
    .map((d) => {
      const message = ts.flattenDiagnosticMessageText(d.messageText, '\n')
      if (d.file && d.start !== undefined) {
        const { line, character } = d.file.getLineAndCharacterOfPosition(d.start)
        return `${line + 1}:${character + 1} ${message}`
      }
      return message
    })

  return { valid: errors.length === 0, errors }
}

interface DelimiterWalk {
  errors: string[]
  maxDepth: number
}

function walkDelimiters(code: string, lang: string): DelimiterWalk {
  const hashComments = HASH_COMMENT_LANGUAGES.has(lang)
  const tripleQuotes = TRIPLE_QUOTE_LANGUAGES.has(lang)
  const singleQuoteStrings = !NO_SINGLE_QUOTE_STRINGS.has(lang)

  const stack: Array<{ char: string; line: number }> = []
  const errors: string[] = []
  let maxDepth = 0
  let line = 1
  let i = 0

  while (i < code.length && errors.length === 0) {
    const char = code[i]
    const next = code[i + 1]

    if (char === '\n') {
      line++
      i++
      continue
    }

    // Comments
    if ((hashComments && char === '#') || (!hashComments && char === '/' && next === '/')) {
      while (i < code.length && code[i] !== '\n') i++
      continue
    }
    if (!hashComments && char === '/' && next === '*') {
      const end = code.indexOf('*/', i + 2)
      if (end === -1) {
        errors.push(`${line}: unterminated block comment`)
        break
      }
      line += countNewlines(code, i, end)
      i = end + 2
      continue
    }

    // Strings
    if (tripleQuotes && (char === '"' || char === "'") && code.startsWith(char.repeat(3), i)) {
      const quote = char.repeat(3)
      const end = code.indexOf(quote, i + 3)
      if (end === -1) {
        errors.push(`${line}: unterminated triple-quoted string`)
        break
      }
      line += countNewlines(code, i, end)
      i = end + 3
      continue
    }
    if (char === '"' || char === '`' || (char === "'" && singleQuoteStrings)) {
      const multiline = char === '`'
      let j = i + 1
      while (j < code.length && code[j] !== char) {
        if (code[j] === '\\') {
          j++
        } else if (code[j] === '\n' && !multiline) {
          break
        }
        j++
      }
      if (j >= code.length || code[j] !== char) {
        errors.push(`${line}: unterminated string`)
        break
      }
      line += countNewlines(code, i, j)
      i = j + 1
      continue
    }

    // Delimiters
    const closer = OPENERS[char]
    if (closer) {
      stack.push({ char, line })
      maxDepth = Math.max(maxDepth, stack.length)
    } else if (CLOSERS.has(char)) {
      const open = stack.pop()
      if (!open || OPENERS[open.char] !== char) {
        errors.push(`${line}: unexpected '${char}'`)
      }
    }
    i++
  }

  if (errors.length === 0 && stack.length > 0) {
    const open = stack[stack.length - 1]
    errors.push(`${open.line}: unclosed '${open.char}'`)
  }

  return { errors, maxDepth }
}

function countNewlines(code: string, from: number, to: number): number {
  let count = 0
  for (let k = from; k < to; k++) {
    if (code[k] === '\n') count++
  }
  return count
}
