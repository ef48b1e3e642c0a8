import { mkdirSync, mkdtempSync, rmSync, writeFileSync } from 'node:fs'
import { tmpdir } from 'node:os'
import path from 'node:path'
import { afterEach, beforeEach, describe, expect, test, vi } from 'vitest'
import { FileResolver } from './file-resolver.js'

describe('FileResolver', () => {
  let tempDir: string
  let resolver: FileResolver

  beforeEach(() => {
    // Create a temporary directory for tests
    tempDir = mkdtempSync(path.join(tmpdir(), 'file-resolver-test-'))
    resolver = new FileResolver(tempDir)
  })

  afterEach(() => {
    // Clean up temporary directory
    rmSync(tempDir, { recursive: true, force: true })
  })

  describe('resolveExplicit', () => {
    test('returns existing files', () => {
      writeFileSync(path.join(tempDir, 'file1.py'), 'content')
      writeFileSync(path.join(tempDir, 'file2.py'), 'content')

      expect(resolver.resolveExplicit(['file1.py', 'file2.py'])).toEqual(['file1.py', 'file2.py'])
    })

    test('warns for missing files', () => {
      writeFileSync(path.join(tempDir, 'exists.py'), 'content')
      const warn = vi.fn<(message: string) => void>()
      resolver = new FileResolver(tempDir, warn)

      const result = resolver.resolveExplicit(['exists.py', 'missing.py'])

      expect(result).toEqual(['exists.py'])
      expect(warn).toHaveBeenCalledWith('Warning: File does not exist: missing.py')
    })

    test('handles absolute and relative paths', () => {
      writeFileSync(path.join(tempDir, 'script.sh'), 'content')

      expect(resolver.resolveExplicit(['script.sh'])).toEqual(['script.sh'])
      expect(resolver.resolveExplicit([path.join(tempDir, 'script.sh')])).toEqual(['script.sh'])
    })
  })

  describe('resolveAll', () => {
    test('returns sorted matches of every glob', async () => {
      mkdirSync(path.join(tempDir, 'src', 'nested'), { recursive: true })
      writeFileSync(path.join(tempDir, 'src', 'b.py'), 'content')
      writeFileSync(path.join(tempDir, 'src', 'nested', 'a.py'), 'content')
      writeFileSync(path.join(tempDir, 'src', 'c.js'), 'content')
      writeFileSync(path.join(tempDir, 'readme.md'), 'content')

      const result = await resolver.resolveAll(['src/**/*.py', 'src/**/*.js'])

      expect(result).toEqual(['src/b.py', 'src/c.js', 'src/nested/a.py'])
    })

    test('skips node_modules and the codeward directory', async () => {
      mkdirSync(path.join(tempDir, 'node_modules', 'pkg'), { recursive: true })
      mkdirSync(path.join(tempDir, '.codeward', 'cache'), { recursive: true })
      writeFileSync(path.join(tempDir, 'node_modules', 'pkg', 'index.js'), 'content')
      writeFileSync(path.join(tempDir, '.codeward', 'cache', 'x.js'), 'content')
      writeFileSync(path.join(tempDir, 'main.js'), 'content')

      expect(await resolver.resolveAll(['**/*.js'])).toEqual(['main.js'])
    })

    test('returns nothing for no globs', async () => {
      expect(await resolver.resolveAll([])).toEqual([])
    })
  })
})
