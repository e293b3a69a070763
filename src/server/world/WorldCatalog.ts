import type { ClueDefinition, ClueId, ClueRule, InspectableObject, Location, NPC, WorldData } from '@/types'
import { containsPhrase, normalizeText, stripArticle } from '@/lib/text'

interface NameEntry<T> {
  names: string[]               // normalized, longest first
  value: T
}

function namesFor(id: string, displayName: string, aliases: string[]): string[] {
  const names = new Set<string>()
  for (const name of [id, displayName, ...aliases]) {
    const normalized = normalizeText(name)
    if (normalized) {
      names.add(normalized)
      names.add(stripArticle(normalized))
    }
  }
  return [...names].sort((a, b) => b.length - a.length)
}

/**
 * Read-only lookup tables over the static world.
 * Built once from WorldData and injected into the session engine.
 */
export class WorldCatalog {
  readonly title: string
  readonly startLocationId: string
  readonly introduction: string

  private locations: Map<string, Location> = new Map()
  private npcs: Map<string, NPC> = new Map()
  private clues: Map<ClueId, ClueDefinition> = new Map()
  private rules: ClueRule[]
  private locationNames: NameEntry<Location>[] = []
  private npcNames: NameEntry<NPC>[] = []

  constructor(world: WorldData) {
    this.title = world.title
    this.startLocationId = world.startLocationId
    this.introduction = world.introduction
    this.rules = [...world.clueRules]

    for (const location of world.locations) {
      this.locations.set(location.id, location)
      this.locationNames.push({ names: namesFor(location.id, location.displayName, location.aliases), value: location })
    }
    for (const npc of world.npcs) {
      this.npcs.set(npc.id, npc)
      this.npcNames.push({ names: namesFor(npc.id, npc.displayName, npc.aliases), value: npc })
    }
    for (const clue of world.clues) {
      this.clues.set(clue.id, clue)
    }
  }

  // ===========================================================================
  // Locations
  // ===========================================================================

  hasLocation(id: string): boolean {
    return this.locations.has(id)
  }

  getLocation(id: string): Location | undefined {
    return this.locations.get(id)
  }

  getStartLocation(): Location {
    const location = this.locations.get(this.startLocationId)
    if (!location) {
      throw new Error(`Start location missing from catalog: ${this.startLocationId}`)
    }
    return location
  }

  /**
   * Exact match of a destination phrase against ids, display names and aliases.
   * A leading article is ignored; there is no partial matching.
   */
  findLocation(phrase: string): Location | undefined {
    const normalized = normalizeText(phrase)
    if (!normalized) return undefined
    const candidates = [normalized, stripArticle(normalized)]
    const entry = this.locationNames.find((e) => e.names.some((name) => candidates.includes(name)))
    return entry?.value
  }

  /**
   * Scripted object in a location, matched by name or alias
   */
  findObject(locationId: string, phrase: string): InspectableObject | undefined {
    const location = this.locations.get(locationId)
    if (!location) return undefined
    const normalized = stripArticle(normalizeText(phrase))
    return location.objects.find((obj) =>
      [obj.name, ...obj.aliases].some((name) => stripArticle(normalizeText(name)) === normalized)
    )
  }

  // ===========================================================================
  // NPCs
  // ===========================================================================

  getNPC(id: string): NPC | undefined {
    return this.npcs.get(id)
  }

  listNPCs(): NPC[] {
    return [...this.npcs.values()]
  }

  /**
   * First NPC whose id, display name or alias appears as whole words in the text.
   * Longer names are tried first so "draco malfoy" beats a shorter overlap.
   */
  findNPCMentioned(text: string): NPC | undefined {
    const normalized = normalizeText(text)
    let best: { npc: NPC; length: number } | undefined
    for (const entry of this.npcNames) {
      const name = entry.names.find((n) => containsPhrase(normalized, n))
      if (name && (!best || name.length > best.length)) {
        best = { npc: entry.value, length: name.length }
      }
    }
    return best?.npc
  }

  /**
   * NPC whose name opens the phrase, as whole words ("draco about evelyn" → draco).
   * The longest matching name wins; a leading article is ignored.
   */
  findNPCAddressed(phrase: string): NPC | undefined {
    const normalized = stripArticle(normalizeText(phrase))
    let best: { npc: NPC; length: number } | undefined
    for (const entry of this.npcNames) {
      const name = entry.names.find((n) => normalized === n || normalized.startsWith(`${n} `))
      if (name && (!best || name.length > best.length)) {
        best = { npc: entry.value, length: name.length }
      }
    }
    return best?.npc
  }

  /**
   * True when the phrase is nothing more than one of the NPC's names
   */
  isNPCName(npc: NPC, phrase: string): boolean {
    const normalized = stripArticle(normalizeText(phrase))
    const entry = this.npcNames.find((e) => e.value.id === npc.id)
    return entry?.names.includes(normalized) ?? false
  }

  // ===========================================================================
  // Clues
  // ===========================================================================

  getClue(id: ClueId): ClueDefinition | undefined {
    return this.clues.get(id)
  }

  getClueRules(): readonly ClueRule[] {
    return this.rules
  }
}
