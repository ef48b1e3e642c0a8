import Anthropic from '@anthropic-ai/sdk'
import { GenerationError, errorMessage } from './errors.js'
import type { GenerateOptions, GenerationGateway } from './gateway.js'
import { buildSystemPrompt, buildUserPrompt } from './prompt-builder.js'
import type { Mode, Model } from './types.js'

const MODEL_MAP: Record<string, string> = {
  haiku: 'claude-haiku-4-5-20251001',
  sonnet: 'claude-sonnet-4-5-20250929',
  opus: 'claude-opus-4-6',
}

export class AnthropicGateway implements GenerationGateway {
  private client: Anthropic

  constructor(
    private defaultModel: Model,
    client?: Anthropic,
  ) {
    this.client = client ?? new Anthropic()
  }

  async generate(prompt: string, mode: Mode, options: GenerateOptions): Promise<string> {
    const model = options.model ?? this.defaultModel
    const modelId = MODEL_MAP[model] ?? model

    let text: string
    try {
      const response = await this.client.messages.create(
        {
          model: modelId,
          max_tokens: 4096,
          temperature: 0,
          system: buildSystemPrompt(options.language),
          messages: [{ role: 'user', content: buildUserPrompt(prompt, mode) }],
        },
        { signal: options.signal, maxRetries: 0 },
      )
      text = response.content
        .flatMap((block) => (block.type === 'text' ? [block.text] : []))
        .join('')
    } catch (error) {
      if (
        error instanceof Anthropic.AuthenticationError ||
        (error instanceof Error && error.message.includes('401'))
      ) {
        throw new GenerationError('ANTHROPIC_API_KEY is invalid or missing', { cause: error })
      }
      throw new GenerationError(`API error: ${errorMessage(error)}`, { cause: error })
    }

    if (!text.trim()) {
      throw new GenerationError('AI returned no content')
    }
    return text
  }
}
