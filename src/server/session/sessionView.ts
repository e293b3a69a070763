import type { MessageView, NPCView, SessionState, SessionStateView, TimelineEntry } from '@/types'
import type { WorldCatalog } from '@/server/world/WorldCatalog'

export function toMessageView(entry: TimelineEntry): MessageView {
  return { speaker: entry.speaker, text: entry.text, avatar_type: entry.avatarType }
}

export function toSessionStateView(state: SessionState, catalog: WorldCatalog): SessionStateView {
  const npcs: Record<string, NPCView> = {}
  for (const npc of catalog.listNPCs()) {
    npcs[npc.id] = { display: npc.displayName, avatar: npc.avatar }
  }

  return {
    location: catalog.getLocation(state.locationId)?.displayName ?? state.locationId,
    clues_found: state.cluesFound,
    timeline: state.timeline.map(toMessageView),
    evidence: state.evidence.map((e) => e.id),
    npcs,
  }
}
