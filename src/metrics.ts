import type { Outcome } from './types.js'

export interface RequestStats {
  total_requests: number
  successful_requests: number
  failed_requests: number
  cache_hits: number
  rejected: number
  average_response_ms: number
  last_error: string | null
}

/**
 * Per-process request counters. A request counts as successful when it ends
 * with an outcome, rejected or not, and as failed when it ends with an error.
 */
export class RequestMetrics {
  private total = 0
  private succeeded = 0
  private failed = 0
  private cacheHits = 0
  private rejected = 0
  private totalDurationMs = 0
  private lastError: string | null = null

  constructor(private readonly now: () => number = Date.now) {}

  /**
   * Count a new request and return its start time.
   */
  begin(): number {
    this.total++
    return this.now()
  }

  recordSuccess(outcome: Outcome, startedAt: number): void {
    this.succeeded++
    this.totalDurationMs += this.now() - startedAt
    if (outcome.cache_hit) {
      this.cacheHits++
    }
    if (outcome.result.verdict === 'reject') {
      this.rejected++
    }
  }

  recordFailure(message: string, startedAt: number): void {
    this.failed++
    this.totalDurationMs += this.now() - startedAt
    this.lastError = message
  }

  snapshot(): RequestStats {
    const finished = this.succeeded + this.failed
    return {
      total_requests: this.total,
      successful_requests: this.succeeded,
      failed_requests: this.failed,
      cache_hits: this.cacheHits,
      rejected: this.rejected,
      average_response_ms: finished === 0 ? 0 : Math.round(this.totalDurationMs / finished),
      last_error: this.lastError,
    }
  }
}
