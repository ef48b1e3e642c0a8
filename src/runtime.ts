import { AIGateway } from './ai-gateway.js'
import { AnthropicGateway } from './anthropic-gateway.js'
import type { GenerationGateway } from './gateway.js'
import { RequestMetrics } from './metrics.js'
import { Orchestrator, type TransitionCallback } from './orchestrator.js'
import { DEFAULT_REGISTRY_PATH, PatternRegistry } from './pattern-registry.js'
import { ResponseCache } from './response-cache.js'
import { Sanitizer } from './sanitizer.js'
import type { CodewardConfig } from './types.js'

export interface RuntimeOverrides {
  gateway?: GenerationGateway
  onTransition?: TransitionCallback
  warn?: (message: string) => void
}

export interface Runtime {
  config: CodewardConfig
  registry: PatternRegistry
  sanitizer: Sanitizer
  cache: ResponseCache
  orchestrator: Orchestrator
  metrics: RequestMetrics
  shutdown(): Promise<void>
}

export function createGateway(config: CodewardConfig): GenerationGateway {
  if (config.provider === 'anthropic') {
    return new AnthropicGateway(config.model)
  }
  return new AIGateway({
    provider: config.provider,
    providerUrl: config.provider_url,
    defaultModel: config.model,
  })
}

export function loadRegistry(config: CodewardConfig): PatternRegistry {
  return PatternRegistry.load(config.registry ?? DEFAULT_REGISTRY_PATH)
}

/**
 * Process-wide wiring. Loading the registry happens here and a
 * RegistryLoadError stops startup; `shutdown` waits for pending cache writes.
 */
export function createRuntime(config: CodewardConfig, overrides: RuntimeOverrides = {}): Runtime {
  const registry = loadRegistry(config)
  const sanitizer = new Sanitizer({
    maxCodeBytes: config.max_code_bytes,
    budgetMs: config.scan_budget_ms,
  })
  const cache = new ResponseCache({
    dir: config.cache_dir,
    registry,
    ttlHours: config.cache_ttl_hours,
    warn: overrides.warn,
  })
  const metrics = new RequestMetrics()
  const orchestrator = new Orchestrator({
    registry,
    cache,
    gateway: overrides.gateway ?? createGateway(config),
    sanitizer,
    timeoutMs: config.timeout_ms,
    defaultLanguage: config.language,
    defaultModel: config.model,
    metrics,
    onTransition: overrides.onTransition,
    warn: overrides.warn,
  })

  return {
    config,
    registry,
    sanitizer,
    cache,
    orchestrator,
    metrics,
    shutdown: () => cache.flush(),
  }
}
