import fs from 'node:fs'
import { Ajv, type ErrorObject } from 'ajv'
import safeRegex from 'safe-regex2'
import YAML from 'yaml'
import { RegistryLoadError, errorMessage } from './errors.js'
import schema from './registry.schema.json' with { type: 'json' }
import type { Matcher, PatternRule, RegistrySnapshot, RuleAction, SeverityTier } from './types.js'

export const DEFAULT_REGISTRY_PATH = new URL('../rules/default-registry.yml', import.meta.url)

interface RawRule {
  id: string
  literal?: string
  regex?: string
  flags?: string
  weight: number
  severity: SeverityTier
  action?: RuleAction
  description: string
}

interface RawRegistry {
  version: number
  rules: RawRule[]
}

/**
 * Source of the registry snapshot requests are evaluated against.
 */
export interface RegistrySource {
  current(): RegistrySnapshot
}

/**
 * PatternRegistry holds one immutable snapshot of the forbidden-signature set.
 *
 * There is no mutation API. A new rule set is a new file with a higher
 * `version`, loaded into a new PatternRegistry.
 */
export class PatternRegistry implements RegistrySource {
  private static ajvInstance: Ajv | null = null

  private constructor(private readonly snapshot: RegistrySnapshot) {}

  current(): RegistrySnapshot {
    return this.snapshot
  }

  /**
   * Load and validate a registry YAML file.
   */
  static load(filePath: string | URL): PatternRegistry {
    let content: string
    try {
      content = fs.readFileSync(filePath, 'utf-8')
    } catch (error) {
      throw new RegistryLoadError(`Cannot read registry "${String(filePath)}": ${errorMessage(error)}`, {
        cause: error,
      })
    }

    let raw: unknown
    try {
      raw = YAML.parse(content)
    } catch (error) {
      throw new RegistryLoadError(`Registry "${String(filePath)}" is not valid YAML: ${errorMessage(error)}`, {
        cause: error,
      })
    }

    return PatternRegistry.fromDefinition(raw)
  }

  static fromDefinition(raw: unknown): PatternRegistry {
    const validate = PatternRegistry.getAjv().compile<RawRegistry>(schema)
    if (!validate(raw)) {
      throw new RegistryLoadError(
        `Registry validation failed:\n${formatValidationErrors(validate.errors ?? [])}`,
      )
    }

    const ids = new Set<string>()
    const duplicates: string[] = []
    const rules: PatternRule[] = []

    for (const rawRule of raw.rules) {
      if (ids.has(rawRule.id)) {
        duplicates.push(rawRule.id)
      }
      ids.add(rawRule.id)
      rules.push(toRule(rawRule))
    }

    if (duplicates.length > 0) {
      throw new RegistryLoadError(
        `Duplicate rule IDs found: ${duplicates.join(', ')}. Each rule must have a unique ID.`,
      )
    }

    return new PatternRegistry(
      Object.freeze({ version: raw.version, rules: Object.freeze(rules) }),
    )
  }

  private static getAjv(): Ajv {
    if (!PatternRegistry.ajvInstance) {
      PatternRegistry.ajvInstance = new Ajv({ allErrors: true })
    }
    return PatternRegistry.ajvInstance
  }
}

function toRule(raw: RawRule): PatternRule {
  return Object.freeze({
    id: raw.id,
    matcher: toMatcher(raw),
    weight: raw.weight,
    severity: raw.severity,
    action: raw.action ?? 'report',
    description: raw.description,
  })
}

function toMatcher(raw: RawRule): Matcher {
  if (raw.literal !== undefined) {
    if (raw.literal.length === 0) {
      throw new RegistryLoadError(`Rule '${raw.id}' has an empty matcher`)
    }
    return Object.freeze({ kind: 'literal', value: raw.literal })
  }

  const pattern = raw.regex ?? ''
  if (pattern.length === 0) {
    throw new RegistryLoadError(`Rule '${raw.id}' has an empty matcher`)
  }

  const flags = raw.flags ?? ''
  let compiled: RegExp
  try {
    compiled = new RegExp(pattern, flags)
  } catch (error) {
    throw new RegistryLoadError(`Rule '${raw.id}' has an invalid regex: ${errorMessage(error)}`, {
      cause: error,
    })
  }

  // A pattern that can match nothing would flag every position of every input
  if (compiled.test('')) {
    throw new RegistryLoadError(`Rule '${raw.id}' matches the empty string`)
  }

  // Nested quantifiers and long quantifier chains are refused
  if (!safeRegex(compiled)) {
    throw new RegistryLoadError(`Rule '${raw.id}' has a regex with catastrophic backtracking`)
  }

  return Object.freeze({ kind: 'regex', pattern, flags })
}

function formatValidationErrors(errors: ErrorObject[]): string {
  return errors
    .filter((err) => !err.schemaPath.includes('/oneOf/'))
    .map((err) => {
      const path = err.instancePath || 'root'
      if (err.keyword === 'required') {
        return `  - ${path}/${String(err.params.missingProperty)}: is required`
      }
      if (err.keyword === 'oneOf') {
        return `  - ${path}: must define exactly one of 'literal' or 'regex'`
      }
      if (err.keyword === 'enum') {
        const allowed: unknown = err.params.allowedValues
        return `  - ${path}: ${err.message}, allowed values: ${Array.isArray(allowed) ? allowed.join(', ') : ''}`
      }
      return `  - ${path}: ${err.message}`
    })
    .join('\n')
}
