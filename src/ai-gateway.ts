import { createOpenAICompatible } from '@ai-sdk/openai-compatible'
import { createOpenRouter } from '@openrouter/ai-sdk-provider'
import { generateText, type LanguageModel } from 'ai'
import { GenerationError, errorMessage } from './errors.js'
import type { GenerateOptions, GenerationGateway } from './gateway.js'
import { buildSystemPrompt, buildUserPrompt } from './prompt-builder.js'
import type { Mode, Model, OpenRouterModel } from './types.js'

const DEFAULT_OLLAMA_URL = 'http://localhost:11434/v1'

const MODEL_MAP: Record<OpenRouterModel, string> = {
  'gemini-flash': 'google/gemini-2.5-flash',
  haiku: 'anthropic/claude-haiku-4.5',
  sonnet: 'anthropic/claude-sonnet-4.5',
  opus: 'anthropic/claude-opus-4.6',
}

function isOpenRouterModel(model: string): model is OpenRouterModel {
  return Object.hasOwn(MODEL_MAP, model)
}

interface AIGatewayOptions {
  provider: 'openrouter' | 'ollama'
  providerUrl?: string
  defaultModel: Model
}

/**
 * Gateway over the AI SDK: OpenRouter, or Ollama through its OpenAI-compatible
 * endpoint. One attempt per call.
 */
export class AIGateway implements GenerationGateway {
  private provider: 'openrouter' | 'ollama'
  private providerUrl?: string
  private defaultModel: Model

  constructor(options: AIGatewayOptions) {
    this.provider = options.provider
    this.providerUrl = options.providerUrl
    this.defaultModel = options.defaultModel
  }

  private resolveModel(modelName: Model): LanguageModel {
    if (this.provider === 'ollama') {
      const ollama = createOpenAICompatible({
        name: 'ollama',
        baseURL: this.providerUrl ?? DEFAULT_OLLAMA_URL,
      })
      return ollama(modelName)
    }

    const modelId = isOpenRouterModel(modelName) ? MODEL_MAP[modelName] : modelName
    return createOpenRouter({ apiKey: process.env.OPEN_ROUTER_KEY })(modelId)
  }

  async generate(prompt: string, mode: Mode, options: GenerateOptions): Promise<string> {
    const model = this.resolveModel(options.model ?? this.defaultModel)

    let text: string
    try {
      const response = await generateText({
        model,
        system: buildSystemPrompt(options.language),
        prompt: buildUserPrompt(prompt, mode),
        temperature: 0,
        maxOutputTokens: 4096,
        maxRetries: 0,
        abortSignal: options.signal,
      })
      text = response.text
    } catch (error) {
      throw new GenerationError(this.describeFailure(error), { cause: error })
    }

    if (!text.trim()) {
      throw new GenerationError('AI returned no content')
    }
    return text
  }

  private describeFailure(error: unknown): string {
    const message = errorMessage(error)

    if (
      this.provider === 'openrouter' &&
      (message.includes('401') || /unauthorized/i.test(message) || /api key/i.test(message))
    ) {
      return 'OPEN_ROUTER_KEY is invalid or missing'
    }

    if (
      this.provider === 'ollama' &&
      (message.includes('ECONNREFUSED') || message.includes('fetch failed'))
    ) {
      return `Cannot connect to Ollama at ${this.providerUrl ?? DEFAULT_OLLAMA_URL}. Is Ollama running?`
    }

    return `API error: ${message}`
  }
}
