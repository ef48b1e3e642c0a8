import { mkdirSync, writeFileSync } from 'node:fs'
import { readFile } from 'node:fs/promises'
import path from 'node:path'
import pLimit from 'p-limit'
import { SanitizationError } from './errors.js'
import type { Sanitizer } from './sanitizer.js'
import { score, unscannable } from './scorer.js'
import { checkSyntax } from './syntax-checker.js'
import type { FileVerdict, RegistrySnapshot, ScanSummary, ScoreResult } from './types.js'

const EXTENSION_LANGUAGES: Record<string, string> = {
  '.py': 'python',
  '.js': 'javascript',
  '.mjs': 'mjs',
  '.cjs': 'cjs',
  '.jsx': 'jsx',
  '.ts': 'typescript',
  '.mts': 'typescript',
  '.cts': 'typescript',
  '.tsx': 'tsx',
  '.json': 'json',
  '.sh': 'shell',
  '.bash': 'bash',
  '.rb': 'ruby',
  '.pl': 'perl',
  '.go': 'go',
  '.rs': 'rust',
  '.java': 'java',
  '.c': 'c',
  '.h': 'c',
  '.cpp': 'cpp',
  '.cs': 'csharp',
  '.php': 'php',
}

export type ScanProgressCallback = (completed: number, total: number, file: string) => void

interface ScanRunInput {
  files: string[]
  cwd: string
  snapshot: RegistrySnapshot
  sanitizer: Sanitizer
  concurrency: number
  language?: string // forces one language for every file
  fallbackLanguage: string
  onProgress?: ScanProgressCallback
}

export function languageForFile(filePath: string, fallback: string): string {
  return EXTENSION_LANGUAGES[path.extname(filePath).toLowerCase()] ?? fallback
}

/**
 * Screen files already on disk with the same sanitizer and scorer that gate
 * generated code. Exit code is 1 when any file is rejected.
 */
export async function runScan({
  files,
  cwd,
  snapshot,
  sanitizer,
  concurrency,
  language,
  fallbackLanguage,
  onProgress,
}: ScanRunInput): Promise<{ verdicts: FileVerdict[]; summary: ScanSummary; exitCode: number }> {
  const startTime = Date.now()
  const limit = pLimit(concurrency)
  let completed = 0

  const verdicts = await Promise.all(
    files.map((file) =>
      limit(async (): Promise<FileVerdict> => {
        const fileStart = Date.now()
        const content = await readFile(path.resolve(cwd, file), 'utf-8')
        const result = evaluate(content, snapshot, sanitizer, language ?? languageForFile(file, fallbackLanguage))
        completed++
        onProgress?.(completed, files.length, file)
        return { file, result, duration_ms: Date.now() - fileStart }
      }),
    ),
  )

  const summary: ScanSummary = {
    total_files: verdicts.length,
    accepted: verdicts.filter((v) => v.result.verdict === 'accept').length,
    warned: verdicts.filter((v) => v.result.verdict === 'accept_with_warnings').length,
    rejected: verdicts.filter((v) => v.result.verdict === 'reject').length,
    duration_ms: Date.now() - startTime,
  }

  return { verdicts, summary, exitCode: summary.rejected > 0 ? 1 : 0 }
}

function evaluate(
  content: string,
  snapshot: RegistrySnapshot,
  sanitizer: Sanitizer,
  language: string,
): ScoreResult {
  try {
    const { violations } = sanitizer.scan(content, snapshot, language)
    // Files on disk are judged as written, not as they would be after stripping
    return score(content, violations, checkSyntax(content, language).valid, language)
  } catch (error) {
    if (error instanceof SanitizationError) {
      return unscannable(error.message)
    }
    throw error
  }
}

export function writeScanReport(
  reportFile: string,
  payload: {
    registryVersion: number
    verdicts: FileVerdict[]
    summary: ScanSummary
    exitCode: number
  },
): string {
  const reportPath = path.resolve(reportFile)
  mkdirSync(path.dirname(reportPath), { recursive: true })
  writeFileSync(
    reportPath,
    JSON.stringify(
      {
        generated_at: new Date().toISOString(),
        registry_version: payload.registryVersion,
        exit_code: payload.exitCode,
        summary: payload.summary,
        files: payload.verdicts,
      },
      null,
      2,
    ),
    'utf-8',
  )
  return reportPath
}
