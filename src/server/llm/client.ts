import { createOpenAI } from '@ai-sdk/openai'
import { createAnthropic } from '@ai-sdk/anthropic'
import { createGoogleGenerativeAI } from '@ai-sdk/google'
import { generateText, type LanguageModel } from 'ai'
import type { TextGenerator } from '@/server/dialogue/ResponseGenerator'

// Internal state
let model: LanguageModel | null = null

/**
 * Parse model string
 * "openai/chat/gpt-4o-mini" → { provider: "openai", subType: "chat", model: "gpt-4o-mini" }
 * "google/gemini-2.0-flash" → { provider: "google", model: "gemini-2.0-flash" }
 */
function parseModelString(str: string): { provider: string; subType?: string; model: string } {
  const parts = str.split('/')
  if (parts.length === 3) {
    return { provider: parts[0], subType: parts[1], model: parts[2] }
  }
  if (parts.length === 2) {
    return { provider: parts[0], model: parts[1] }
  }
  throw new Error(`Invalid model string: ${str}`)
}

/**
 * Create LanguageModel from provider, subType, and modelId
 * Uses LLM_API_KEY and optional LLM_BASE_URL for all providers
 */
function createLanguageModel(
  provider: string,
  subType: string | undefined,
  modelId: string
): LanguageModel {
  const apiKey = process.env.LLM_API_KEY
  if (!apiKey) {
    throw new Error('LLM_API_KEY not set')
  }

  const baseURL = process.env.LLM_BASE_URL

  switch (provider) {
    case 'openai': {
      const openai = createOpenAI({ apiKey, baseURL })
      if (subType === 'chat') {
        return openai.chat(modelId)
      }
      return openai(modelId)
    }
    case 'anthropic': {
      const anthropic = createAnthropic({ apiKey, baseURL })
      return anthropic(modelId)
    }
    case 'gemini':
    case 'google': {
      const google = createGoogleGenerativeAI({ apiKey, baseURL })
      return google(modelId)
    }
    default:
      throw new Error(`Unknown provider: ${provider}`)
  }
}

/**
 * Initialize LLM client (reads from environment variables)
 */
export function initializeLLMClient(): void {
  const llmModel = process.env.LLM_MODEL
  if (!llmModel) {
    console.warn('[LLM] LLM_MODEL not set, live dialogue disabled')
    return
  }

  try {
    const parsed = parseModelString(llmModel)
    model = createLanguageModel(parsed.provider, parsed.subType, parsed.model)
    const baseURL = process.env.LLM_BASE_URL
    console.log(`[LLM] Client initialized: ${llmModel}${baseURL ? ` (baseURL: ${baseURL})` : ''}`)
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error)
    console.error(`[LLM] Failed to initialize (${llmModel}): ${message}`)
  }
}

/**
 * Check if LLM is available
 */
export function isLLMAvailable(): boolean {
  return model !== null
}

/**
 * Generate text
 */
export async function llmGenerateText(
  prompt: string,
  options?: { system?: string; abortSignal?: AbortSignal }
): Promise<string> {
  if (!model) {
    throw new Error('LLM client not initialized')
  }

  const result = await generateText({
    model,
    prompt,
    system: options?.system,
    abortSignal: options?.abortSignal,
    maxRetries: 0,
  })

  return result.text
}

/**
 * TextGenerator backed by the shared client
 */
export function createLLMTextGenerator(): TextGenerator {
  return {
    generate: (prompt, options) => llmGenerateText(prompt, options),
  }
}
