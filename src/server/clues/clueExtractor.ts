import type { ClueId, ClueRule, ClueSource, Evidence } from '@/types'
import type { WorldCatalog } from '@/server/world/WorldCatalog'

/**
 * Clue ids whose rule matches the source and whose keywords appear in the text.
 * Case-insensitive substring match; result is unique and in rule order.
 */
export function extractClues(source: ClueSource, text: string, rules: readonly ClueRule[]): ClueId[] {
  const haystack = text.toLowerCase()
  const found: ClueId[] = []

  for (const rule of rules) {
    if (rule.source.kind !== source.kind || rule.source.id !== source.id) continue
    if (found.includes(rule.clueId)) continue
    if (rule.keywords.some((keyword) => haystack.includes(keyword.toLowerCase()))) {
      found.push(rule.clueId)
    }
  }

  return found
}

export interface RecordResult {
  evidence: Evidence[]
  added: Evidence[]
}

/**
 * Add clues not already present. Recording a known clue is a no-op, so the
 * evidence list stays unique by id. Unknown ids are skipped with a warning.
 */
export function recordClues(evidence: Evidence[], clueIds: ClueId[], catalog: WorldCatalog): RecordResult {
  const known = new Set(evidence.map((e) => e.id))
  const added: Evidence[] = []

  for (const id of clueIds) {
    if (known.has(id)) continue
    const clue = catalog.getClue(id)
    if (!clue) {
      console.warn(`[ClueExtractor] Unknown clue id: ${id}`)
      continue
    }
    known.add(id)
    added.push({ id: clue.id, description: clue.description })
  }

  return { evidence: added.length > 0 ? [...evidence, ...added] : evidence, added }
}
