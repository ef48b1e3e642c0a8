import type { Mode } from './types.js'

const FENCE_PATTERN = /```([\w+#-]*)[^\n]*\n([\s\S]*?)```/

export function buildSystemPrompt(language: string): string {
  return `You are a careful software engineer. Write ${language} code for the user's request.
- Reply with exactly one fenced code block tagged "${language}" and nothing else.
- Do not evaluate strings as code, spawn shells or subprocesses, widen file permissions, or delete files recursively.
- Never hard-code credentials; read them from the environment.`
}

export function buildUserPrompt(prompt: string, mode: Mode): string {
  if (mode === 'refactor') {
    return `Refactor the following code for better readability and security compliance:

${prompt}`
  }
  return prompt
}

export interface ExtractedCode {
  code: string
  language?: string
}

/**
 * Pull the first fenced block out of a model reply. A reply without a fence is
 * taken as code in its entirety.
 */
export function extractCode(reply: string): ExtractedCode {
  const match = FENCE_PATTERN.exec(reply)
  if (!match) {
    return { code: reply.trim() }
  }
  const language = match[1].toLowerCase()
  return { code: match[2].replace(/\n$/, ''), language: language || undefined }
}
