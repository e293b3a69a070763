// Avatar categories understood by the presentation layer
export const AVATAR_TYPES = ['purple', 'blue', 'brown', 'green'] as const
export type AvatarType = (typeof AVATAR_TYPES)[number]

export const FALLBACK_AVATAR: AvatarType = 'blue'
export const NARRATOR_AVATAR: AvatarType = 'brown'
export const PLAYER_AVATAR: AvatarType = 'blue'

export type ClueId = string

export interface InspectableObject {
  name: string
  aliases: string[]
  description: string
  revisitDescription?: string   // shown once the object's clue is already recorded
  clueId?: ClueId               // awarded on first inspection regardless of text
}

export interface Location {
  id: string                    // normalized lowercase key
  displayName: string
  aliases: string[]
  description: string           // arrival text
  objects: InspectableObject[]
}

export interface MockLines {
  greetings: string[]
  replies: string[]             // may contain a {topic} placeholder
}

export interface NPC {
  id: string                    // normalized lowercase key
  displayName: string
  avatar: AvatarType
  aliases: string[]
  persona: string
  mock: MockLines
}

export interface ClueDefinition {
  id: ClueId
  description: string
}

export type ClueSource =
  | { kind: 'npc'; id: string }
  | { kind: 'location'; id: string }

export interface ClueRule {
  clueId: ClueId
  source: ClueSource
  keywords: string[]
}

export interface WorldData {
  title: string
  startLocationId: string
  introduction: string
  locations: Location[]
  npcs: NPC[]
  clues: ClueDefinition[]
  clueRules: ClueRule[]
}
