import { GenerationError, GenerationTimeout, SanitizationError, errorMessage } from './errors.js'
import type { GenerationGateway } from './gateway.js'
import { RequestMetrics } from './metrics.js'
import type { RegistrySource } from './pattern-registry.js'
import { extractCode } from './prompt-builder.js'
import { ResponseCache } from './response-cache.js'
import type { Sanitizer } from './sanitizer.js'
import { score, unscannable } from './scorer.js'
import { checkSyntax } from './syntax-checker.js'
import type { CodeRequest, Outcome, PutOutcome, RequestState, ScanResult } from './types.js'

export type TransitionCallback = (state: RequestState, fingerprint: string) => void

interface OrchestratorDeps {
  registry: RegistrySource
  cache: ResponseCache
  gateway: GenerationGateway
  sanitizer: Sanitizer
  timeoutMs: number
  defaultLanguage: string
  defaultModel: string
  metrics?: RequestMetrics
  onTransition?: TransitionCallback
  warn?: (message: string) => void
}

/**
 * Drives one request through
 * RECEIVED → CACHE_LOOKUP → (CACHE_HIT_VALID | GENERATING) → SANITIZING →
 * SCORING → DECIDED → (CACHED | DONE).
 *
 * Rejected code is never returned and never cached.
 */
export class Orchestrator {
  readonly metrics: RequestMetrics

  constructor(private deps: OrchestratorDeps) {
    this.metrics = deps.metrics ?? new RequestMetrics()
  }

  async handle(request: CodeRequest): Promise<Outcome> {
    const startedAt = this.metrics.begin()
    try {
      const outcome = await this.process(request)
      this.metrics.recordSuccess(outcome, startedAt)
      return outcome
    } catch (error) {
      this.metrics.recordFailure(errorMessage(error), startedAt)
      throw error
    }
  }

  private async process(request: CodeRequest): Promise<Outcome> {
    const snapshot = this.deps.registry.current()
    const fingerprint = ResponseCache.fingerprint(request, snapshot.version)
    const model = request.options?.model ?? this.deps.defaultModel
    const transition = (state: RequestState) => this.deps.onTransition?.(state, fingerprint)

    transition('RECEIVED')

    if (!request.options?.force) {
      transition('CACHE_LOOKUP')
      const entry = await this.deps.cache.get(fingerprint)
      // A rejected record is never served, whoever wrote it
      if (entry && entry.result.verdict !== 'reject') {
        transition('CACHE_HIT_VALID')
        return {
          code: entry.code,
          result: entry.result,
          cache_hit: true,
          fingerprint,
          model: entry.model,
          state: 'CACHE_HIT_VALID',
        }
      }
    }

    transition('GENERATING')
    const reply = await this.generate(request)
    const extracted = extractCode(reply)
    const language = request.options?.language ?? extracted.language ?? this.deps.defaultLanguage

    transition('SANITIZING')
    let scan: ScanResult
    try {
      scan = this.deps.sanitizer.scan(extracted.code, snapshot, language)
    } catch (error) {
      if (!(error instanceof SanitizationError)) {
        throw error
      }
      transition('DECIDED')
      transition('DONE')
      return { code: null, result: unscannable(error.message), cache_hit: false, fingerprint, model, state: 'DONE' }
    }

    transition('SCORING')
    const syntax = checkSyntax(scan.cleaned_code, language)
    const result = score(scan.cleaned_code, scan.violations, syntax.valid, language)

    transition('DECIDED')
    if (result.verdict === 'reject') {
      transition('DONE')
      return { code: null, result, cache_hit: false, fingerprint, model, state: 'DONE' }
    }

    const code = scan.cleaned_code
    let written: PutOutcome
    try {
      written = await this.deps.cache.put(fingerprint, {
        fingerprint,
        registry_version: snapshot.version,
        mode: request.mode,
        model,
        code,
        result,
        created_at: new Date().toISOString(),
        pinned: false,
      })
    } catch (error) {
      const message = errorMessage(error)
      ;(this.deps.warn ?? console.warn)(`Warning: ${message}`)
      transition('DONE')
      return { code, result, cache_hit: false, fingerprint, model, state: 'DONE', cache_error: message }
    }

    // Pinned record left as it was
    if (written === 'pinned') {
      transition('DONE')
      return { code, result, cache_hit: false, fingerprint, model, state: 'DONE' }
    }

    transition('CACHED')
    return { code, result, cache_hit: false, fingerprint, model, state: 'CACHED' }
  }

  /**
   * Single gateway call bounded by the configured timeout. The race covers
   * gateways that ignore the abort signal.
   */
  private async generate(request: CodeRequest): Promise<string> {
    const controller = new AbortController()
    let timer: NodeJS.Timeout | undefined

    const timeout = new Promise<never>((_, reject) => {
      timer = setTimeout(() => {
        controller.abort()
        reject(new GenerationTimeout(this.deps.timeoutMs))
      }, this.deps.timeoutMs)
    })

    let call: Promise<string> | undefined
    try {
      call = this.deps.gateway.generate(request.prompt, request.mode, {
        signal: controller.signal,
        language: request.options?.language ?? this.deps.defaultLanguage,
        model: request.options?.model,
      })
      return await Promise.race([call, timeout])
    } catch (error) {
      if (error instanceof GenerationTimeout || controller.signal.aborted) {
        throw new GenerationTimeout(this.deps.timeoutMs)
      }
      if (error instanceof GenerationError) {
        throw error
      }
      throw new GenerationError(errorMessage(error), { cause: error })
    } finally {
      clearTimeout(timer)
      // The losing promise may still settle later
      call?.catch(() => undefined)
    }
  }
}
