import chalk from 'chalk'
import type { RequestStats } from './metrics.js'
import type {
  FileVerdict,
  Outcome,
  RegistrySnapshot,
  ScanSummary,
  ScoreResult,
  SeverityTier,
  Verdict,
  Violation,
} from './types.js'

function severityLabel(severity: SeverityTier): string {
  switch (severity) {
    case 'critical':
      return chalk.red.bold(severity)
    case 'high':
      return chalk.red(severity)
    case 'medium':
      return chalk.yellow(severity)
    case 'low':
      return chalk.dim(severity)
  }
}

export class Reporter {
  constructor(private log: (message: string) => void = console.log) {}

  reportOutcome(outcome: Outcome): void {
    const origin = outcome.cache_hit ? chalk.dim(' (cached)') : ''
    this.log(`${this.formatVerdict(outcome.result.verdict)}  score ${outcome.result.score}/100${origin}`)
    this.reportFindings(outcome.result)

    if (outcome.cache_error) {
      this.log(chalk.yellow(`  cache not updated: ${outcome.cache_error}`))
    }

    if (outcome.code !== null) {
      this.log('')
      this.log(outcome.code)
    } else {
      this.log(chalk.dim('  No code returned.'))
    }
  }

  reportStats(stats: RequestStats): void {
    this.log(
      `Requests: ${stats.total_requests} total, ${stats.successful_requests} succeeded, ${stats.failed_requests} failed`,
    )
    this.log(
      chalk.dim(`  ${stats.cache_hits} cache hits, ${stats.rejected} rejected, ${stats.average_response_ms}ms average`),
    )
    if (stats.last_error) {
      this.log(chalk.red(`  last error: ${stats.last_error}`))
    }
  }

  reportScan(verdicts: FileVerdict[], summary: ScanSummary): void {
    for (const { file, result } of verdicts) {
      if (result.verdict === 'accept' && result.violations.length === 0) {
        continue
      }
      this.log(chalk.white.bold(`  ${file}`) + `  ${this.formatVerdict(result.verdict)} ${result.score}`)
      this.reportFindings(result)
    }

    if (summary.rejected === 0 && summary.warned === 0) {
      this.log(chalk.green('All files accepted'))
    } else {
      this.log('')
      this.log(
        `  ${summary.rejected} rejected, ${summary.warned} with warnings, ${summary.accepted} accepted`,
      )
    }
    const files = `${summary.total_files} ${summary.total_files === 1 ? 'file' : 'files'} scanned`
    this.log(chalk.dim(`  ${files}, ${(summary.duration_ms / 1000).toFixed(1)}s`))
  }

  reportRegistry(snapshot: RegistrySnapshot): void {
    this.log(`Registry version ${snapshot.version} (${snapshot.rules.length} rules)`)
    for (const rule of snapshot.rules) {
      const action = rule.action === 'strip' ? chalk.cyan(' strip') : ''
      this.log(
        `  ${rule.id}  ${severityLabel(rule.severity)}  -${rule.weight}${action}  ${chalk.dim(rule.description)}`,
      )
    }
  }

  private reportFindings(result: ScoreResult): void {
    for (const violation of result.violations) {
      this.log(`    ${this.formatViolation(violation)}`)
    }
    for (const reason of result.reasons) {
      this.log(chalk.dim(`    ⎿ ${reason}`))
    }
  }

  private formatViolation(violation: Violation): string {
    const location = chalk.dim(`${violation.line}:${violation.column}`)
    return `${location}  ${severityLabel(violation.severity)}  ${violation.rule_id}  ${chalk.dim(violation.snippet)}`
  }

  private formatVerdict(verdict: Verdict): string {
    switch (verdict) {
      case 'accept':
        return chalk.green('ACCEPT')
      case 'accept_with_warnings':
        return chalk.yellow('ACCEPT_WITH_WARNINGS')
      case 'reject':
        return chalk.red('REJECT')
    }
  }
}
