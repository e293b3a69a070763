import type { ResponseGenerator, DialogueReply, DialogueRequest } from './ResponseGenerator'
import { normalizeText, pickStable } from '@/lib/text'

const DEFAULT_TOPIC = 'that'

/**
 * Phrase after "about" in a question, without trailing punctuation.
 * "ask draco about the broken wand?" → "the broken wand"
 */
export function extractTopic(question: string): string {
  const match = question.match(/\babout\s+(.+)$/i)
  if (!match) return DEFAULT_TOPIC
  const topic = match[1].replace(/[\s.!?]+$/, '').trim()
  return topic || DEFAULT_TOPIC
}

/**
 * Deterministic replies from the NPC's canned lines.
 * Same NPC and question always yield the same text.
 */
export class MockResponseGenerator implements ResponseGenerator {
  readonly mode = 'mock' as const

  async respond(request: DialogueRequest): Promise<DialogueReply> {
    return { text: this.compose(request), source: 'mock' }
  }

  compose(request: Pick<DialogueRequest, 'npc' | 'question'>): string {
    const { npc, question } = request

    if (question === null) {
      return pickStable(npc.mock.greetings, `${npc.id}:greeting`)
    }

    const line = pickStable(npc.mock.replies, `${npc.id}:${normalizeText(question)}`)
    return line.replace(/\{topic\}/g, extractTopic(question))
  }
}
