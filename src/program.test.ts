import { mkdtempSync, rmSync, writeFileSync } from 'node:fs'
import { tmpdir } from 'node:os'
import path from 'node:path'
import chalk from 'chalk'
import { type Mock, afterEach, beforeEach, describe, expect, it, vi } from 'vitest'
import type { GenerationGateway } from './gateway.js'
import { createProgram } from './program.js'
import { ResponseCache } from './response-cache.js'

const CLEAN_REPLY = '```python\ndef add(a, b):\n    return a + b\n```'

describe('CLI program', () => {
  let tempDir: string
  let log: Mock<(message: string) => void>
  let error: Mock<(message: string) => void>
  let setExitCode: Mock<(code: number) => void>
  let gateway: { generate: Mock<GenerationGateway['generate']> }

  const output = () => log.mock.calls.map(([line]) => line)
  const errors = () => error.mock.calls.map(([line]) => line)

  const run = async (args: string[], options: { withGateway?: boolean } = {}) => {
    const program = createProgram({
      version: '0.0.0-test',
      cwd: tempDir,
      log,
      error,
      setExitCode,
      gateway: options.withGateway === false ? undefined : gateway,
    })
    await program.parseAsync(['node', 'codeward', ...args])
  }

  beforeEach(() => {
    chalk.level = 0
    tempDir = mkdtempSync(path.join(tmpdir(), 'program-test-'))
    log = vi.fn<(message: string) => void>()
    error = vi.fn<(message: string) => void>()
    setExitCode = vi.fn<(code: number) => void>()
    gateway = { generate: vi.fn<GenerationGateway['generate']>() }
  })

  afterEach(() => {
    vi.unstubAllEnvs()
    rmSync(tempDir, { recursive: true, force: true })
  })

  describe('validate command', () => {
    it('prints the resolved configuration', async () => {
      writeFileSync(
        path.join(tempDir, '.codeward.yml'),
        'provider: openrouter\nmodel: haiku\nlanguage: ruby\ntimeout_ms: 30000\n',
      )

      await run(['validate'])

      expect(output()).toEqual([
        '✓ Configuration is valid',
        '  Provider: openrouter',
        '  Model: haiku',
        '  Language: ruby',
        '  Timeout: 30000ms',
        '  Registry: version 2, 21 rules',
      ])
      expect(setExitCode).not.toHaveBeenCalled()
    })

    it('reports an invalid config and exits 2', async () => {
      writeFileSync(path.join(tempDir, 'bad.yml'), 'provider: bedrock\n')

      await run(['validate', '--config', 'bad.yml'])

      expect(errors()).toEqual([
        'Configuration error: Config validation failed:\n  - /provider: must be equal to one of the allowed values, allowed values: openrouter, ollama, anthropic',
      ])
      expect(setExitCode).toHaveBeenCalledWith(2)
    })

    it('reports a missing explicit config file', async () => {
      await run(['validate', '--config', 'missing.yml'])

      expect(errors()[0]).toMatch(/^Configuration error: Cannot read config/)
      expect(setExitCode).toHaveBeenCalledWith(2)
    })
  })

  describe('generate command', () => {
    it('prints accepted code and exits 0', async () => {
      gateway.generate.mockResolvedValue(CLEAN_REPLY)

      await run(['generate', 'add', 'two', 'numbers'])

      expect(gateway.generate).toHaveBeenCalledWith(
        'add two numbers',
        'generate',
        expect.objectContaining({ language: 'python' }),
      )
      expect(output()).toEqual(['ACCEPT  score 100/100', '', 'def add(a, b):\n    return a + b'])
      expect(setExitCode).toHaveBeenCalledWith(0)
    })

    it('serves the second identical request from the cache', async () => {
      gateway.generate.mockResolvedValue(CLEAN_REPLY)

      await run(['generate', 'add two numbers'])
      log.mockClear()
      await run(['generate', 'Add two numbers'])

      expect(gateway.generate).toHaveBeenCalledTimes(1)
      expect(output()[0]).toBe('ACCEPT  score 100/100 (cached)')
    })

    it('prints no code for rejected output and exits 1', async () => {
      gateway.generate.mockResolvedValue('import shutil\nshutil.rmtree("/")')

      await run(['generate', 'wipe the disk'])

      expect(output()).toEqual([
        'REJECT  score 25/100',
        '    1:1  medium  blocked_import  import shutil',
        '    2:1  critical  recursive_delete  shutil.rmtree(',
        '    ⎿ critical violation: recursive_delete',
        '  No code returned.',
      ])
      expect(setExitCode).toHaveBeenCalledWith(1)
    })

    it('prints the outcome as JSON', async () => {
      gateway.generate.mockResolvedValue(CLEAN_REPLY)

      await run(['generate', 'add two numbers', '--json'])

      const printed: unknown = JSON.parse(output()[0])
      expect(printed).toMatchObject({
        code: 'def add(a, b):\n    return a + b',
        cache_hit: false,
        model: 'gemini-flash',
        state: 'CACHED',
        fingerprint: ResponseCache.fingerprint({ prompt: 'add two numbers', mode: 'generate' }, 2),
      })
    })

    it('prints state transitions and request stats with --verbose', async () => {
      gateway.generate.mockResolvedValue(CLEAN_REPLY)

      await run(['generate', 'add two numbers', '--verbose'])

      expect(errors().slice(0, 8)).toEqual([
        '  → RECEIVED',
        '  → CACHE_LOOKUP',
        '  → GENERATING',
        '  → SANITIZING',
        '  → SCORING',
        '  → DECIDED',
        '  → CACHED',
        'Requests: 1 total, 1 succeeded, 0 failed',
      ])
      expect(errors()[8]).toMatch(/^  0 cache hits, 0 rejected, \d+ms average$/)
      expect(errors()).toHaveLength(9)
    })

    it('prints the last error in the stats of a failed request', async () => {
      gateway.generate.mockRejectedValue(new Error('connection reset'))

      await run(['generate', 'add two numbers', '--verbose'])

      expect(errors().slice(-4)).toEqual([
        'Requests: 1 total, 0 succeeded, 1 failed',
        expect.stringMatching(/^  0 cache hits, 0 rejected, \d+ms average$/),
        '  last error: connection reset',
        'Error: connection reset',
      ])
    })

    it('requires the provider API key when no gateway is injected', async () => {
      vi.stubEnv('OPEN_ROUTER_KEY', '')

      await run(['generate', 'add two numbers'], { withGateway: false })

      expect(errors()).toEqual(['Error: OPEN_ROUTER_KEY environment variable is required'])
      expect(setExitCode).toHaveBeenCalledWith(2)
    })

    it('reports a generation failure and exits 2', async () => {
      gateway.generate.mockRejectedValue(new Error('connection reset'))

      await run(['generate', 'add two numbers'])

      expect(errors()).toEqual(['Error: connection reset'])
      expect(setExitCode).toHaveBeenCalledWith(2)
    })
  })

  describe('refactor command', () => {
    it('sends the file content in refactor mode with the language from its extension', async () => {
      writeFileSync(path.join(tempDir, 'legacy.js'), 'var x = 1\n')
      gateway.generate.mockResolvedValue('```javascript\nconst x = 1\n```')

      await run(['refactor', 'legacy.js'])

      expect(gateway.generate).toHaveBeenCalledWith(
        'var x = 1\n',
        'refactor',
        expect.objectContaining({ language: 'javascript' }),
      )
      expect(output()).toEqual(['ACCEPT  score 100/100', '', 'const x = 1'])
    })
  })

  describe('scan command', () => {
    it('scans explicit files and exits 1 when one is rejected', async () => {
      writeFileSync(path.join(tempDir, 'ok.py'), 'print("hi")\n')
      writeFileSync(path.join(tempDir, 'bad.sh'), 'sudo rm -rf /var/tmp\n')

      await run(['scan', 'ok.py', 'bad.sh'])

      expect(output()).toContain('  1 rejected, 0 with warnings, 1 accepted')
      expect(setExitCode).toHaveBeenCalledWith(1)
    })

    it('asks for input when given no files', async () => {
      await run(['scan'])

      expect(output()).toEqual(['No files to scan. Use --glob or specify explicit files.'])
      expect(setExitCode).toHaveBeenCalledWith(0)
    })
  })

  describe('registry command', () => {
    it('lists the bundled rules', async () => {
      await run(['registry'])

      expect(output()[0]).toBe('Registry version 2 (21 rules)')
      expect(output()).toHaveLength(22)
    })
  })

  describe('cache commands', () => {
    it('reports status, pins and clears entries', async () => {
      gateway.generate.mockResolvedValue(CLEAN_REPLY)
      await run(['generate', 'add two numbers'])
      const fingerprint = ResponseCache.fingerprint({ prompt: 'add two numbers', mode: 'generate' }, 2)
      log.mockClear()

      await run(['cache', 'pin', fingerprint])
      await run(['cache', 'status'])

      expect(output()[0]).toBe(`✓ Pinned ${fingerprint}`)
      expect(output()[1]).toBe('Cache entries: 1 (0 stale, 1 pinned)')

      log.mockClear()
      await run(['cache', 'clear'])
      await run(['cache', 'status'])

      expect(output()).toEqual(['✓ Cache cleared', 'Cache entries: 0 (0 stale, 0 pinned)', 'Cache size: 0.00 KB'])
    })

    it('fails to pin an unknown fingerprint', async () => {
      const fingerprint = 'a'.repeat(64)

      await run(['cache', 'pin', fingerprint])

      expect(errors()).toEqual([`Error: No cache entry for ${fingerprint}`])
      expect(setExitCode).toHaveBeenCalledWith(2)
    })
  })
})
