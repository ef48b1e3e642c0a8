export type ErrorCode =
  | 'REGISTRY_LOAD'
  | 'GENERATION'
  | 'GENERATION_TIMEOUT'
  | 'SANITIZATION'
  | 'CACHE_IO'
  | 'CONFIG'

export class CodewardError extends Error {
  constructor(
    readonly code: ErrorCode,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(message, options)
    this.name = new.target.name
  }
}

/**
 * The registry definition is unreadable or malformed. Fatal at startup.
 */
export class RegistryLoadError extends CodewardError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('REGISTRY_LOAD', message, options)
  }
}

export class GenerationError extends CodewardError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('GENERATION', message, options)
  }
}

export class GenerationTimeout extends CodewardError {
  constructor(readonly timeoutMs: number) {
    super('GENERATION_TIMEOUT', `Generation did not finish within ${timeoutMs}ms`)
  }
}

/**
 * The code could not be scanned at all. The orchestrator turns this into a
 * REJECT with reason "unscannable".
 */
export class SanitizationError extends CodewardError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('SANITIZATION', message, options)
  }
}

export class CacheIOError extends CodewardError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('CACHE_IO', message, options)
  }
}

export class ConfigError extends CodewardError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('CONFIG', message, options)
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : 'Unknown error occurred'
}
