import type { AvatarType, ClueId } from './world'

export interface TimelineEntry {
  speaker: string
  text: string
  avatarType: AvatarType
}

export interface Evidence {
  id: ClueId
  description: string
}

export interface MemoryExchange {
  question: string
  reply: string
}

export interface NPCMemory {
  exchanges: MemoryExchange[]   // oldest first, bounded FIFO
}

export interface SessionState {
  id: string
  locationId: string
  cluesFound: number            // always equal to evidence.length
  evidence: Evidence[]          // unique by id, discovery order
  timeline: TimelineEntry[]     // append-only
  npcMemories: Record<string, NPCMemory>
  createdAt: number
  lastActiveAt: number
}
