import type { AvatarType, TimelineEntry } from '@/types'
import { NARRATOR_AVATAR, PLAYER_AVATAR } from '@/types'

export const NARRATOR_NAME = 'Narrator'
export const PLAYER_NAME = 'You'

export function entry(speaker: string, text: string, avatarType: AvatarType): TimelineEntry {
  return { speaker, text, avatarType }
}

export function narrator(text: string): TimelineEntry {
  return entry(NARRATOR_NAME, text, NARRATOR_AVATAR)
}

export function player(text: string): TimelineEntry {
  return entry(PLAYER_NAME, text, PLAYER_AVATAR)
}

export const narration = {
  opening: (introduction: string, arrival: string) => `${introduction} ${arrival}`.trim(),
  alreadyHere: (locationName: string) => `You are already in ${locationName}.`,
  unknownDestination: (attempted: string) =>
    `You can't seem to find a path to '${attempted}'. Try one of the castle's known locations.`,
  nothingNotable: (target: string) =>
    `You carefully inspect the **${target}**. You find nothing out of the ordinary, but you feel like you should be looking for something else...`,
  noSuchPerson: () => 'There is no one by that name here.',
  clarification: () =>
    "You try to execute the action, but it doesn't seem to have a clear effect. Try 'go to [location]', 'inspect [item]', or 'talk to [NPC]'.",
}
