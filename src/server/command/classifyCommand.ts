import type { Action } from '@/types'
import type { WorldCatalog } from '@/server/world/WorldCatalog'
import { normalizeText } from '@/lib/text'

const MOVE_VERBS = ['go to', 'travel to', 'head to']
const INSPECT_VERBS = ['inspect', 'examine']
const DIALOGUE_VERBS = ['talk to', 'speak with', 'ask']

/**
 * Match a leading verb on the raw text (case-insensitive, whole words) and
 * return the remainder in its original casing, or null when the verb is absent.
 */
function stripVerb(raw: string, verbs: string[]): { verb: string; rest: string } | null {
  for (const verb of verbs) {
    const pattern = new RegExp(`^${verb.replace(/ /g, '\\s+')}(?:\\s+|$)`, 'i')
    const match = raw.match(pattern)
    if (match) {
      return { verb, rest: raw.slice(match[0].length).trim() }
    }
  }
  return null
}

function trimPunctuation(text: string): string {
  return text.replace(/^[\s"'“”]+|[\s"'“”.!?]+$/g, '')
}

/**
 * Classify free-text player input.
 *
 * Priority: movement > inspection > dialogue > unknown. Matching is
 * keyword based on normalized text; echoed phrases keep the player's casing.
 */
export function classifyCommand(rawText: string, catalog: WorldCatalog): Action {
  const raw = rawText.trim()

  // 1. Movement
  const move = stripVerb(raw, MOVE_VERBS)
  if (move && move.rest) {
    const attempted = trimPunctuation(move.rest)
    const location = catalog.findLocation(attempted)
    if (location) {
      return { type: 'move', raw, locationId: location.id }
    }
    return { type: 'unknown', raw, reason: 'unknown_destination', attempted }
  }

  // 2. Inspection
  const inspect = stripVerb(raw, INSPECT_VERBS)
  if (inspect && inspect.rest) {
    return { type: 'inspect', raw, target: trimPunctuation(inspect.rest) }
  }

  // 3. Dialogue (explicit verb, or an NPC named anywhere)
  const dialogue = stripVerb(raw, DIALOGUE_VERBS)
  if (dialogue) {
    const rest = dialogue.rest
    // The NPC named right after the verb is the one addressed
    const npc = catalog.findNPCAddressed(rest) ?? catalog.findNPCMentioned(rest)
    if (!npc) {
      return { type: 'dialogue', raw, npcId: null, target: trimPunctuation(rest), question: null }
    }
    const question = !normalizeText(rest) || catalog.isNPCName(npc, rest) ? null : rest
    return { type: 'dialogue', raw, npcId: npc.id, target: npc.displayName, question }
  }
  const npc = catalog.findNPCMentioned(raw)
  if (npc) {
    return { type: 'dialogue', raw, npcId: npc.id, target: npc.displayName, question: raw }
  }

  // 4. Fallback
  return { type: 'unknown', raw, reason: 'unrecognized' }
}
