import type { AvatarType } from './world'

// Wire shapes handed to the transport layer

export interface MessageView {
  speaker: string
  text: string
  avatar_type: AvatarType
}

export interface NPCView {
  display: string
  avatar: AvatarType
}

export interface SessionStateView {
  location: string              // display name
  clues_found: number
  timeline: MessageView[]
  evidence: string[]            // clue identifiers
  npcs: Record<string, NPCView>
}

export interface StartSessionResult {
  session_id: string
  state: SessionStateView
}

export interface ApplyActionResult {
  reply: MessageView[]
  state: SessionStateView
}
