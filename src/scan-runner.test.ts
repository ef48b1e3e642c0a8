import { mkdtempSync, readFileSync, rmSync, writeFileSync } from 'node:fs'
import { tmpdir } from 'node:os'
import path from 'node:path'
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest'
import { PatternRegistry } from './pattern-registry.js'
import { Sanitizer } from './sanitizer.js'
import { languageForFile, runScan, writeScanReport } from './scan-runner.js'

const snapshot = PatternRegistry.fromDefinition({
  version: 7,
  rules: [
    {
      id: 'recursive_delete',
      regex: '\\brm\\s+-rf\\b',
      weight: 60,
      severity: 'critical',
      description: 'Deletes a directory tree',
    },
    {
      id: 'dynamic_eval',
      regex: '\\beval\\s*\\(',
      weight: 30,
      severity: 'high',
      action: 'strip',
      description: 'Evaluates a string as code',
    },
  ],
}).current()

describe('languageForFile', () => {
  it('maps known extensions', () => {
    expect(languageForFile('src/app.PY', 'ruby')).toBe('python')
    expect(languageForFile('index.tsx', 'ruby')).toBe('tsx')
  })

  it('falls back for unknown extensions', () => {
    expect(languageForFile('Makefile', 'shell')).toBe('shell')
  })
})

describe('runScan', () => {
  let tempDir: string

  beforeEach(() => {
    tempDir = mkdtempSync(path.join(tmpdir(), 'scan-runner-test-'))
    writeFileSync(path.join(tempDir, 'clean.py'), 'def add(a, b):\n    return a + b\n')
    writeFileSync(path.join(tempDir, 'cleanup.sh'), 'rm -rf "$BUILD_DIR"\n')
    writeFileSync(path.join(tempDir, 'calc.js'), 'const v = eval(input)\n')
  })

  afterEach(() => {
    rmSync(tempDir, { recursive: true, force: true })
  })

  it('scores every file and summarizes the verdicts', async () => {
    const onProgress = vi.fn()

    const { verdicts, summary, exitCode } = await runScan({
      files: ['clean.py', 'cleanup.sh', 'calc.js'],
      cwd: tempDir,
      snapshot,
      sanitizer: new Sanitizer(),
      concurrency: 2,
      fallbackLanguage: 'python',
      onProgress,
    })

    expect(verdicts.map((v) => [v.file, v.result.verdict, v.result.score])).toEqual([
      ['clean.py', 'accept', 100],
      ['cleanup.sh', 'reject', 40],
      ['calc.js', 'accept_with_warnings', 70],
    ])
    expect(summary).toMatchObject({ total_files: 3, accepted: 1, warned: 1, rejected: 1 })
    expect(exitCode).toBe(1)
    expect(onProgress).toHaveBeenCalledTimes(3)
  })

  it('judges files as written, before stripping', async () => {
    const { verdicts } = await runScan({
      files: ['calc.js'],
      cwd: tempDir,
      snapshot,
      sanitizer: new Sanitizer(),
      concurrency: 1,
      fallbackLanguage: 'python',
    })

    expect(verdicts[0].result.syntax_valid).toBe(true)
    expect(verdicts[0].result.violations.map((v) => v.snippet)).toEqual(['eval('])
  })

  it('exits 0 when nothing is rejected', async () => {
    const { exitCode } = await runScan({
      files: ['clean.py', 'calc.js'],
      cwd: tempDir,
      snapshot,
      sanitizer: new Sanitizer(),
      concurrency: 4,
      fallbackLanguage: 'python',
    })

    expect(exitCode).toBe(0)
  })

  it('rejects files too large to scan as unscannable', async () => {
    const { verdicts } = await runScan({
      files: ['clean.py'],
      cwd: tempDir,
      snapshot,
      sanitizer: new Sanitizer({ maxCodeBytes: 4 }),
      concurrency: 1,
      fallbackLanguage: 'python',
    })

    expect(verdicts[0].result.verdict).toBe('reject')
    expect(verdicts[0].result.reasons).toEqual([
      'unscannable: Code is 32 bytes, larger than the 4 byte scan limit',
    ])
  })
})

describe('writeScanReport', () => {
  let tempDir: string

  beforeEach(() => {
    tempDir = mkdtempSync(path.join(tmpdir(), 'scan-report-test-'))
  })

  afterEach(() => {
    rmSync(tempDir, { recursive: true, force: true })
  })

  it('writes the summary and per-file verdicts as JSON', () => {
    const reportFile = path.join(tempDir, 'reports', 'scan.json')
    const summary = { total_files: 0, accepted: 0, warned: 0, rejected: 0, duration_ms: 1 }

    const written = writeScanReport(reportFile, { registryVersion: 7, verdicts: [], summary, exitCode: 0 })

    expect(written).toBe(reportFile)
    const report: unknown = JSON.parse(readFileSync(reportFile, 'utf-8'))
    expect(report).toMatchObject({ registry_version: 7, exit_code: 0, summary, files: [] })
  })
})
