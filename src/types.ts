// --- Config Types ---

export type OpenRouterModel = 'gemini-flash' | 'haiku' | 'sonnet' | 'opus'
export type Provider = 'openrouter' | 'ollama' | 'anthropic'
export type Model = OpenRouterModel | (string & {})

export interface CodewardConfig {
  provider: Provider
  provider_url?: string
  model: Model
  language: string
  timeout_ms: number
  cache_dir: string
  cache_ttl_hours: number // 0 disables expiry
  registry?: string // path to a registry YAML; bundled default when absent
  concurrency: number
  max_code_bytes: number
  scan_budget_ms: number
}

// --- Registry Types ---

export type SeverityTier = 'low' | 'medium' | 'high' | 'critical'
export type RuleAction = 'report' | 'strip'

export type Matcher =
  | { readonly kind: 'literal'; readonly value: string }
  | { readonly kind: 'regex'; readonly pattern: string; readonly flags: string }

export interface PatternRule {
  readonly id: string // unique, snake_case
  readonly matcher: Matcher
  readonly weight: number // positive integer
  readonly severity: SeverityTier
  readonly action: RuleAction
  readonly description: string
}

export interface RegistrySnapshot {
  readonly version: number
  readonly rules: readonly PatternRule[]
}

// --- Evaluation Types ---

export interface Violation {
  rule_id: string
  start: number // offset into the original text
  end: number
  line: number // 1-based
  column: number // 1-based
  weight: number
  severity: SeverityTier
  snippet: string
}

export interface ScanResult {
  registry_version: number
  violations: Violation[]
  cleaned_code: string
}

export type Verdict = 'accept' | 'accept_with_warnings' | 'reject'

export interface ComplexityMetrics {
  lines: number
  max_depth: number
  branches: number
}

export interface ScoreResult {
  readonly score: number
  readonly verdict: Verdict
  readonly violations: readonly Violation[]
  readonly syntax_valid: boolean
  readonly reasons: readonly string[]
  readonly complexity: ComplexityMetrics
}

// --- Request Types ---

export type Mode = 'generate' | 'refactor'

export interface RequestOptions {
  language?: string
  force?: boolean // skip the cache lookup and resanitize
  model?: Model
}

export interface CodeRequest {
  prompt: string
  mode: Mode
  options?: RequestOptions
}

export type RequestState =
  | 'RECEIVED'
  | 'CACHE_LOOKUP'
  | 'CACHE_HIT_VALID'
  | 'GENERATING'
  | 'SANITIZING'
  | 'SCORING'
  | 'DECIDED'
  | 'CACHED'
  | 'DONE'

export interface Outcome {
  code: string | null // null whenever the verdict is reject
  result: ScoreResult
  cache_hit: boolean
  fingerprint: string
  model: string // alias that produced the code; the cached entry's model on a hit
  state: Extract<RequestState, 'CACHE_HIT_VALID' | 'CACHED' | 'DONE'>
  cache_error?: string
}

// --- Cache Types ---

export interface CacheEntry {
  fingerprint: string
  registry_version: number
  mode: Mode
  model: string
  code: string
  result: ScoreResult
  created_at: string // ISO 8601
  pinned: boolean
}

// Record file: <cache_dir>/<fingerprint>.json
export interface CacheRecord {
  format_version: 1
  entry: CacheEntry
}

export type PutOutcome = 'written' | 'pinned'

// --- Scan Types ---

export interface FileVerdict {
  file: string
  result: ScoreResult
  duration_ms: number
}

export interface ScanSummary {
  total_files: number
  accepted: number
  warned: number
  rejected: number
  duration_ms: number
}
