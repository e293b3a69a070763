import type { Evidence, MemoryExchange, NPC, TimelineEntry } from '@/types'

/**
 * Capability consumed by live dialogue: prompt in, text out.
 * May reject (service error) or hang (bounded by the caller's timeout).
 */
export interface TextGenerator {
  generate(prompt: string, options?: { system?: string; abortSignal?: AbortSignal }): Promise<string>
}

export interface DialogueContext {
  locationName: string
  evidence: Evidence[]
  memory: MemoryExchange[]      // prior exchanges with this NPC, oldest first
  recentTimeline: TimelineEntry[]
}

export interface DialogueRequest {
  npc: NPC
  question: string | null       // null means the player only greeted the NPC
  playerText: string
  context: DialogueContext
}

export interface DialogueReply {
  text: string
  source: 'live' | 'mock'
}

/**
 * ResponseGenerator interface
 *
 * Produces an NPC reply for a dialogue action. Implementations never reject
 * for generation problems: a reply is always returned.
 */
export interface ResponseGenerator {
  readonly mode: 'live' | 'mock'
  respond(request: DialogueRequest): Promise<DialogueReply>
}
