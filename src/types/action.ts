export type Action =
  | { type: 'move'; raw: string; locationId: string }
  | { type: 'inspect'; raw: string; target: string }
  | {
      type: 'dialogue'
      raw: string
      npcId: string | null      // null when an explicit verb named no known NPC
      target: string            // attempted name, original casing
      question: string | null   // null means a greeting
    }
  | {
      type: 'unknown'
      raw: string
      reason: 'unrecognized' | 'unknown_destination'
      attempted?: string
    }
