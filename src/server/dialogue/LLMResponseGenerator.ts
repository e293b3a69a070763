import type { DialogueConfig } from '@/types'
import type { ResponseGenerator, DialogueReply, DialogueRequest, TextGenerator } from './ResponseGenerator'
import { MockResponseGenerator } from './MockResponseGenerator'
import { buildDialoguePrompt, buildSystemInstruction, sanitizeReply } from './promptBuilder'
import { getLLMErrorHandler, type LLMErrorHandler } from '@/server/llm/errorHandler'
import { GenerationError } from '@/lib/errors'
import { withTimeout } from '@/lib/timeout'

/**
 * Live dialogue through an external text generator.
 * Any failure (timeout, error, empty output) falls back to the mock reply.
 */
export class LLMResponseGenerator implements ResponseGenerator {
  readonly mode = 'live' as const
  private generator: TextGenerator
  private fallback: MockResponseGenerator
  private config: Pick<DialogueConfig, 'timeoutMs' | 'maxSentences'>
  private errorHandler: LLMErrorHandler

  constructor(
    generator: TextGenerator,
    config: Pick<DialogueConfig, 'timeoutMs' | 'maxSentences'>,
    options: { fallback?: MockResponseGenerator; errorHandler?: LLMErrorHandler } = {}
  ) {
    this.generator = generator
    this.config = config
    this.fallback = options.fallback ?? new MockResponseGenerator()
    this.errorHandler = options.errorHandler ?? getLLMErrorHandler()
  }

  async respond(request: DialogueRequest): Promise<DialogueReply> {
    const { npc } = request

    if (this.errorHandler.isDegraded()) {
      console.log(`[LLMResponseGenerator] Degraded, using mock reply for ${npc.displayName}`)
      return this.fallback.respond(request)
    }

    const prompt = buildDialoguePrompt(request)
    const system = buildSystemInstruction(this.config.maxSentences)

    try {
      const raw = await withTimeout(
        (abortSignal) => this.generator.generate(prompt, { system, abortSignal }),
        this.config.timeoutMs
      )
      const text = sanitizeReply(raw, npc)
      if (!text) {
        throw new GenerationError('LLM returned an empty reply')
      }

      this.errorHandler.resetFailureCount()
      return { text, source: 'live' }
    } catch (error) {
      await this.errorHandler.handleError(error, { npcId: npc.id })
      console.warn(`[LLMResponseGenerator] Falling back to mock reply for ${npc.displayName}`)
      return this.fallback.respond(request)
    }
  }
}
