import { existsSync } from 'node:fs'
import path from 'node:path'
import fg from 'fast-glob'

/**
 * FileResolver resolves the files `codeward scan` reads:
 * - Explicit file paths provided by the user
 * - All files matching glob patterns
 */
export class FileResolver {
  constructor(
    private cwd: string = process.cwd(),
    private warn: (message: string) => void = console.warn,
  ) {}

  /**
   * Validates that explicit file paths exist.
   * Returns paths relative to cwd for existing files, warns for missing ones.
   */
  resolveExplicit(filePaths: string[]): string[] {
    const resolvedPaths: string[] = []

    for (const filePath of filePaths) {
      const absolutePath = path.isAbsolute(filePath) ? filePath : path.resolve(this.cwd, filePath)

      if (existsSync(absolutePath)) {
        resolvedPaths.push(path.relative(this.cwd, absolutePath))
      } else {
        this.warn(`Warning: File does not exist: ${filePath}`)
      }
    }

    return resolvedPaths
  }

  /**
   * Finds all files matching any of the provided glob patterns.
   * Returns a deduplicated, sorted list of relative file paths.
   */
  async resolveAll(globs: string[]): Promise<string[]> {
    if (globs.length === 0) {
      return []
    }

    try {
      const files = await fg(globs, {
        cwd: this.cwd,
        dot: false,
        ignore: ['**/node_modules/**', '.git/**', '.codeward/**'],
        onlyFiles: true,
        unique: true,
      })

      return files.map((filePath) => path.relative(this.cwd, path.resolve(this.cwd, filePath))).sort()
    } catch (error) {
      if (error instanceof Error) {
        throw new Error(`Failed to resolve glob patterns: ${error.message}`)
      }
      throw error
    }
  }
}
