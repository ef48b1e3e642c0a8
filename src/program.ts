import { readFileSync } from 'node:fs'
import path from 'node:path'
import { Command } from 'commander'
import { ConfigLoader } from './config-loader.js'
import { errorMessage } from './errors.js'
import { FileResolver } from './file-resolver.js'
import type { GenerationGateway } from './gateway.js'
import { Reporter } from './reporter.js'
import { createRuntime, loadRegistry } from './runtime.js'
import { ResponseCache } from './response-cache.js'
import { Sanitizer } from './sanitizer.js'
import { languageForFile, runScan, writeScanReport } from './scan-runner.js'
import type { CodewardConfig, Mode, RequestOptions } from './types.js'

export const DEFAULT_CONFIG_PATH = '.codeward.yml'

export interface ProgramDeps {
  version: string
  cwd?: string
  log?: (message: string) => void
  error?: (message: string) => void
  setExitCode?: (code: number) => void
  gateway?: GenerationGateway // replaces the configured provider
}

interface RequestCommandOptions {
  config: string
  language?: string
  force?: boolean
  json?: boolean
  verbose?: boolean
}

interface ScanCommandOptions {
  config: string
  glob?: string[]
  language?: string
  report?: string
}

const API_KEYS: Record<CodewardConfig['provider'], string | null> = {
  openrouter: 'OPEN_ROUTER_KEY',
  anthropic: 'ANTHROPIC_API_KEY',
  ollama: null,
}

/**
 * Build the commander program. Exit codes: 0 accepted, 1 rejected, 2 error.
 */
export function createProgram(deps: ProgramDeps): Command {
  const cwd = deps.cwd ?? process.cwd()
  const log = deps.log ?? console.log
  const error = deps.error ?? console.error
  const setExitCode =
    deps.setExitCode ??
    ((code: number) => {
      process.exitCode = code
    })
  const reporter = new Reporter(log)

  const loadConfig = (configPath: string): CodewardConfig => {
    const config = new ConfigLoader().load(path.resolve(cwd, configPath), {
      optional: configPath === DEFAULT_CONFIG_PATH,
    })
    return {
      ...config,
      cache_dir: path.resolve(cwd, config.cache_dir),
      registry: config.registry ? path.resolve(cwd, config.registry) : undefined,
    }
  }

  const fail = (prefix: string, err: unknown): void => {
    error(`${prefix}: ${errorMessage(err)}`)
    setExitCode(2)
  }

  const runRequest = async (
    prompt: string,
    mode: Mode,
    options: RequestCommandOptions,
    language?: string,
  ): Promise<void> => {
    const config = loadConfig(options.config)

    const keyName = API_KEYS[config.provider]
    if (!deps.gateway && keyName && !process.env[keyName]) {
      throw new Error(`${keyName} environment variable is required`)
    }

    const runtime = createRuntime(config, {
      gateway: deps.gateway,
      warn: error,
      onTransition: options.verbose ? (state) => error(`  → ${state}`) : undefined,
    })

    const requestOptions: RequestOptions = {
      language: options.language ?? language,
      force: options.force,
    }

    try {
      const outcome = await runtime.orchestrator.handle({ prompt, mode, options: requestOptions })
      if (options.json) {
        log(JSON.stringify(outcome, null, 2))
      } else {
        reporter.reportOutcome(outcome)
      }
      setExitCode(outcome.result.verdict === 'reject' ? 1 : 0)
    } finally {
      if (options.verbose) {
        new Reporter(error).reportStats(runtime.metrics.snapshot())
      }
      await runtime.shutdown()
    }
  }

  const program = new Command()

  program
    .name('codeward')
    .description('Generate code with an LLM, screen it for dangerous constructs and cache accepted results')
    .version(deps.version)

  // --- generate command ---
  program
    .command('generate')
    .description('Generate code for a request and screen it')
    .argument('<prompt...>', 'What the code should do')
    .option('--config <path>', 'Config file path', DEFAULT_CONFIG_PATH)
    .option('--language <name>', 'Target language (defaults to config)')
    .option('--force', 'Skip the cache lookup and regenerate')
    .option('--json', 'Print the outcome as JSON')
    .option('--verbose', 'Print request state transitions and request stats')
    .action(async (words: string[], options: RequestCommandOptions) => {
      try {
        await runRequest(words.join(' '), 'generate', options)
      } catch (err) {
        fail('Error', err)
      }
    })

  // --- refactor command ---
  program
    .command('refactor')
    .description('Refactor a file and screen the result')
    .argument('<file>', 'File to refactor')
    .option('--config <path>', 'Config file path', DEFAULT_CONFIG_PATH)
    .option('--language <name>', 'Target language (defaults to the file extension)')
    .option('--force', 'Skip the cache lookup and regenerate')
    .option('--json', 'Print the outcome as JSON')
    .option('--verbose', 'Print request state transitions and request stats')
    .action(async (file: string, options: RequestCommandOptions) => {
      try {
        const source = readFileSync(path.resolve(cwd, file), 'utf-8')
        const config = loadConfig(options.config)
        await runRequest(source, 'refactor', options, languageForFile(file, config.language))
      } catch (err) {
        fail('Error', err)
      }
    })

  // --- scan command ---
  program
    .command('scan')
    .description('Screen existing files against the pattern registry')
    .argument('[files...]', 'Explicit files to scan')
    .option('--glob <patterns...>', 'Scan every file matching these globs')
    .option('--config <path>', 'Config file path', DEFAULT_CONFIG_PATH)
    .option('--language <name>', 'Treat every file as this language')
    .option('--report <file>', 'Also write a JSON report')
    .action(async (files: string[], options: ScanCommandOptions) => {
      try {
        const config = loadConfig(options.config)
        const snapshot = loadRegistry(config).current()
        const resolver = new FileResolver(cwd, error)

        let filesToScan: string[]
        if (options.glob && options.glob.length > 0) {
          filesToScan = await resolver.resolveAll(options.glob)
        } else if (files.length > 0) {
          filesToScan = resolver.resolveExplicit(files)
        } else {
          log('No files to scan. Use --glob or specify explicit files.')
          setExitCode(0)
          return
        }

        const { verdicts, summary, exitCode } = await runScan({
          files: filesToScan,
          cwd,
          snapshot,
          sanitizer: new Sanitizer({
            maxCodeBytes: config.max_code_bytes,
            budgetMs: config.scan_budget_ms,
          }),
          concurrency: config.concurrency,
          language: options.language,
          fallbackLanguage: config.language,
        })

        reporter.reportScan(verdicts, summary)
        if (options.report) {
          const reportPath = writeScanReport(path.resolve(cwd, options.report), {
            registryVersion: snapshot.version,
            verdicts,
            summary,
            exitCode,
          })
          log(`Report written: ${reportPath}`)
        }
        setExitCode(exitCode)
      } catch (err) {
        fail('Error', err)
      }
    })

  // --- registry command ---
  program
    .command('registry')
    .description('Show the loaded pattern registry')
    .option('--config <path>', 'Config file path', DEFAULT_CONFIG_PATH)
    .action((options: { config: string }) => {
      try {
        reporter.reportRegistry(loadRegistry(loadConfig(options.config)).current())
      } catch (err) {
        fail('Error', err)
      }
    })

  // --- validate command ---
  program
    .command('validate')
    .description('Validate config file and pattern registry')
    .option('--config <path>', 'Config file path', DEFAULT_CONFIG_PATH)
    .action((options: { config: string }) => {
      try {
        const config = loadConfig(options.config)
        const snapshot = loadRegistry(config).current()

        log('✓ Configuration is valid')
        log(`  Provider: ${config.provider}`)
        log(`  Model: ${config.model}`)
        log(`  Language: ${config.language}`)
        log(`  Timeout: ${config.timeout_ms}ms`)
        log(`  Registry: version ${snapshot.version}, ${snapshot.rules.length} rules`)
      } catch (err) {
        fail('Configuration error', err)
      }
    })

  // --- cache commands ---
  const cacheCmd = program.command('cache').description('Manage cache')

  const openCache = (configPath: string): ResponseCache => {
    const config = loadConfig(configPath)
    return new ResponseCache({
      dir: config.cache_dir,
      registry: loadRegistry(config),
      ttlHours: config.cache_ttl_hours,
      warn: error,
    })
  }

  cacheCmd
    .command('status')
    .description('Show cache stats')
    .option('--config <path>', 'Config file path', DEFAULT_CONFIG_PATH)
    .action(async (options: { config: string }) => {
      try {
        const stats = await openCache(options.config).status()
        log(`Cache entries: ${stats.entries} (${stats.stale} stale, ${stats.pinned} pinned)`)
        log(`Cache size: ${(stats.sizeBytes / 1024).toFixed(2)} KB`)
      } catch (err) {
        fail('Error', err)
      }
    })

  cacheCmd
    .command('clear')
    .description('Clear cache')
    .option('--config <path>', 'Config file path', DEFAULT_CONFIG_PATH)
    .action(async (options: { config: string }) => {
      try {
        await openCache(options.config).clear()
        log('✓ Cache cleared')
      } catch (err) {
        fail('Error', err)
      }
    })

  cacheCmd
    .command('pin')
    .description('Protect a cache entry from being overwritten')
    .argument('<fingerprint>', 'Fingerprint printed by generate --json')
    .option('--config <path>', 'Config file path', DEFAULT_CONFIG_PATH)
    .action(async (fingerprint: string, options: { config: string }) => {
      try {
        if (await openCache(options.config).pin(fingerprint)) {
          log(`✓ Pinned ${fingerprint}`)
        } else {
          error(`Error: No cache entry for ${fingerprint}`)
          setExitCode(2)
        }
      } catch (err) {
        fail('Error', err)
      }
    })

  return program
}
