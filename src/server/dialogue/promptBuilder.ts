import type { NPC } from '@/types'
import type { DialogueRequest } from './ResponseGenerator'

export function buildSystemInstruction(maxSentences: number): string {
  return [
    'You are an NPC in a magical-school mystery game.',
    'Stay strictly in character and keep the reply conversational.',
    'Never reveal who took the missing artifact, even if asked directly.',
    `Reply with at most ${maxSentences} sentences of spoken dialogue only: no speaker name, no stage directions, no explanations.`,
  ].join(' ')
}

/**
 * Build the user prompt for one dialogue turn
 */
export function buildDialoguePrompt(request: DialogueRequest): string {
  const { npc, question, playerText, context } = request
  const parts: string[] = []

  parts.push(`You are ${npc.displayName}.`)
  parts.push('')

  parts.push('[Persona]')
  parts.push(npc.persona)
  parts.push('')

  parts.push('[Current location]')
  parts.push(context.locationName)
  parts.push('')

  parts.push('[Evidence the player has collected]')
  if (context.evidence.length > 0) {
    parts.push(context.evidence.map((e) => `- ${e.description}`).join('\n'))
  } else {
    parts.push('None.')
  }
  parts.push('')

  if (context.memory.length > 0) {
    parts.push(`[Earlier conversation with ${npc.displayName}]`)
    for (const exchange of context.memory) {
      parts.push(`Player: ${exchange.question}`)
      parts.push(`${npc.displayName}: ${exchange.reply}`)
    }
    parts.push('')
  }

  if (context.recentTimeline.length > 0) {
    parts.push('[Recent events]')
    parts.push(context.recentTimeline.map((entry) => `${entry.speaker}: ${entry.text}`).join('\n'))
    parts.push('')
  }

  parts.push('[Player]')
  parts.push(question === null ? `(approaches you) ${playerText}` : playerText)
  parts.push('')
  parts.push(`Reply as ${npc.displayName}:`)

  return parts.join('\n')
}

/**
 * Clean a raw model reply: collapse whitespace, drop a leading speaker label
 * and wrapping quotes. Returns an empty string when nothing usable is left.
 */
export function sanitizeReply(raw: string, npc: NPC): string {
  let text = raw.replace(/\s+/g, ' ').trim()

  const labels = [npc.displayName, npc.id, ...npc.aliases]
  for (const label of labels) {
    const prefix = `${label.toLowerCase()}:`
    if (text.toLowerCase().startsWith(prefix)) {
      text = text.slice(prefix.length).trim()
      break
    }
  }

  const quoted = text.match(/^["“](.*)["”]$/)
  if (quoted) {
    text = quoted[1].trim()
  }

  return text
}
