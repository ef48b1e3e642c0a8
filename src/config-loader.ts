import fs from 'node:fs'
import { Ajv, type ErrorObject } from 'ajv'
import YAML from 'yaml'
import schema from './config.schema.json' with { type: 'json' }
import { ConfigError, errorMessage } from './errors.js'
import { DEFAULT_MAX_CODE_BYTES, DEFAULT_SCAN_BUDGET_MS } from './sanitizer.js'
import type { CodewardConfig, OpenRouterModel, Provider } from './types.js'

const OPENROUTER_MODELS: Set<string> = new Set<OpenRouterModel>([
  'gemini-flash',
  'haiku',
  'sonnet',
  'opus',
])

const ANTHROPIC_MODELS: Set<string> = new Set(['haiku', 'sonnet', 'opus'])

type RawConfig = Partial<CodewardConfig>

export class ConfigLoader {
  private static ajvInstance: Ajv | null = null

  /**
   * Get cached AJV instance (lazy singleton)
   */
  private getAjv(): Ajv {
    if (!ConfigLoader.ajvInstance) {
      ConfigLoader.ajvInstance = new Ajv({ allErrors: true, verbose: true })
    }
    return ConfigLoader.ajvInstance
  }

  /**
   * Load and validate .codeward.yml. A missing file yields the defaults.
   */
  load(filePath: string, options: { optional?: boolean } = {}): CodewardConfig {
    let fileContent: string
    try {
      fileContent = fs.readFileSync(filePath, 'utf-8')
    } catch (error) {
      if (options.optional && isMissingFile(error)) {
        return this.parse({})
      }
      throw new ConfigError(`Cannot read config "${filePath}": ${errorMessage(error)}`, {
        cause: error,
      })
    }

    let rawConfig: unknown
    try {
      rawConfig = YAML.parse(fileContent) ?? {}
    } catch (error) {
      throw new ConfigError(`Config "${filePath}" is not valid YAML: ${errorMessage(error)}`, {
        cause: error,
      })
    }

    return this.parse(rawConfig)
  }

  /**
   * Validate a parsed config object and apply defaults.
   */
  parse(rawConfig: unknown): CodewardConfig {
    const validate = this.getAjv().compile<RawConfig>(schema)
    if (!validate(rawConfig)) {
      const errors = this.formatValidationErrors(validate.errors ?? [])
      throw new ConfigError(`Config validation failed:\n${errors}`)
    }

    const raw = rawConfig
    const provider: Provider = raw.provider ?? 'openrouter'

    // Require model when provider is ollama (no sensible default)
    if (provider === 'ollama' && !raw.model) {
      throw new ConfigError('Config validation failed:\n  - /model: is required when provider is ollama')
    }

    const config: CodewardConfig = {
      provider,
      provider_url:
        raw.provider_url ?? (provider === 'ollama' ? 'http://localhost:11434/v1' : undefined),
      model: raw.model ?? (provider === 'anthropic' ? 'sonnet' : 'gemini-flash'),
      language: raw.language ?? 'python',
      timeout_ms: raw.timeout_ms ?? 60_000,
      cache_dir: raw.cache_dir ?? '.codeward/cache',
      cache_ttl_hours: raw.cache_ttl_hours ?? 24,
      registry: raw.registry,
      concurrency: raw.concurrency ?? 4,
      max_code_bytes: raw.max_code_bytes ?? DEFAULT_MAX_CODE_BYTES,
      scan_budget_ms: raw.scan_budget_ms ?? DEFAULT_SCAN_BUDGET_MS,
    }

    if (provider === 'openrouter' && !OPENROUTER_MODELS.has(config.model)) {
      throw new ConfigError(
        `Unknown model '${config.model}' for openrouter provider. Allowed values: ${[...OPENROUTER_MODELS].join(', ')}`,
      )
    }
    if (provider === 'anthropic' && !ANTHROPIC_MODELS.has(config.model)) {
      throw new ConfigError(
        `Unknown model '${config.model}' for anthropic provider. Allowed values: ${[...ANTHROPIC_MODELS].join(', ')}`,
      )
    }

    return config
  }

  /**
   * Format AJV validation errors into readable messages
   */
  private formatValidationErrors(errors: ErrorObject[]): string {
    return errors
      .map((err) => {
        const path = err.instancePath || 'root'

        if (err.keyword === 'additionalProperties') {
          return `  - ${path}: unknown property '${String(err.params.additionalProperty)}'`
        }
        if (err.keyword === 'enum') {
          const allowed: unknown = err.params.allowedValues
          return `  - ${path}: ${err.message}, allowed values: ${Array.isArray(allowed) ? allowed.join(', ') : ''}`
        }

        return `  - ${path}: ${err.message}`
      })
      .join('\n')
  }
}

function isMissingFile(error: unknown): boolean {
  return !!error && typeof error === 'object' && 'code' in error && error.code === 'ENOENT'
}
