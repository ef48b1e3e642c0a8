import type { Mode, Model } from './types.js'

export interface GenerateOptions {
  signal: AbortSignal
  language: string
  model?: Model
}

/**
 * Anything that turns a prompt into candidate code. Implementations make a
 * single attempt and report every failure as a GenerationError.
 */
export interface GenerationGateway {
  generate(prompt: string, mode: Mode, options: GenerateOptions): Promise<string>
}
