import { randomUUID } from 'crypto'
import type {
  Action,
  ApplyActionResult,
  DialogueConfig,
  Evidence,
  NPCMemory,
  SessionState,
  SessionStateView,
  StartSessionResult,
  TimelineEntry,
} from '@/types'
import type { WorldCatalog } from '@/server/world/WorldCatalog'
import type { ResponseGenerator } from '@/server/dialogue/ResponseGenerator'
import type { SessionStore } from './SessionStore'
import { classifyCommand } from '@/server/command/classifyCommand'
import { extractClues, recordClues } from '@/server/clues/clueExtractor'
import { recentExchanges, rememberExchange } from '@/server/dialogue/npcMemory'
import { KeyedQueue } from '@/lib/keyedQueue'
import { SessionNotFoundError } from '@/lib/errors'
import { assertValidState, assertValidTransition } from './invariants'
import { entry, narration, narrator, player } from './narration'
import { toMessageView, toSessionStateView } from './sessionView'

export type SessionEngineConfig = Pick<DialogueConfig, 'maxMemoryEntries' | 'promptMemoryEntries' | 'historyEntries'>

const DEFAULT_ENGINE_CONFIG: SessionEngineConfig = {
  maxMemoryEntries: 8,
  promptMemoryEntries: 4,
  historyEntries: 5,
}

export interface SessionEngineOptions {
  catalog: WorldCatalog
  store: SessionStore
  responder: ResponseGenerator
  config?: Partial<SessionEngineConfig>
  now?: () => number
  createId?: () => string
}

/**
 * Changes produced by resolving one action. Fields left undefined keep
 * their previous value.
 */
interface Outcome {
  entries: TimelineEntry[]
  locationId?: string
  evidence?: Evidence[]
  npcMemories?: Record<string, NPCMemory>
}

/**
 * Orchestrates one session turn: classify → resolve → check → save.
 * Turns for the same session are queued; different sessions run independently.
 */
export class SessionEngine {
  private catalog: WorldCatalog
  private store: SessionStore
  private responder: ResponseGenerator
  private config: SessionEngineConfig
  private now: () => number
  private createId: () => string
  private queue: KeyedQueue = new KeyedQueue()

  constructor(options: SessionEngineOptions) {
    this.catalog = options.catalog
    this.store = options.store
    this.responder = options.responder
    this.config = { ...DEFAULT_ENGINE_CONFIG, ...options.config }
    this.now = options.now ?? Date.now
    this.createId = options.createId ?? randomUUID
  }

  getDialogueMode(): 'live' | 'mock' {
    return this.responder.mode
  }

  getCatalog(): WorldCatalog {
    return this.catalog
  }

  // ===========================================================================
  // Public operations
  // ===========================================================================

  async startSession(): Promise<StartSessionResult> {
    const start = this.catalog.getStartLocation()
    const timestamp = this.now()

    const state: SessionState = {
      id: this.createId(),
      locationId: start.id,
      cluesFound: 0,
      evidence: [],
      timeline: [narrator(narration.opening(this.catalog.introduction, start.description))],
      npcMemories: {},
      createdAt: timestamp,
      lastActiveAt: timestamp,
    }

    assertValidState(state, this.catalog)
    // Sessions with a turn in flight are not evicted to make room
    await this.store.create(state, { isBusy: (id) => this.queue.isBusy(id) })
    console.log(`[SessionEngine] Session started: ${state.id} at ${start.displayName}`)

    return { session_id: state.id, state: toSessionStateView(state, this.catalog) }
  }

  async applyAction(sessionId: string, text: string): Promise<ApplyActionResult> {
    return this.queue.run(sessionId, () => this.runTurn(sessionId, text))
  }

  async getState(sessionId: string): Promise<SessionStateView> {
    const state = await this.store.load(sessionId)
    if (!state) {
      throw new SessionNotFoundError(sessionId)
    }
    return toSessionStateView(state, this.catalog)
  }

  // ===========================================================================
  // Turn processing
  // ===========================================================================

  private async runTurn(sessionId: string, text: string): Promise<ApplyActionResult> {
    const previous = await this.store.load(sessionId)
    if (!previous) {
      throw new SessionNotFoundError(sessionId)
    }

    const action = classifyCommand(text, this.catalog)
    const echoed = action.raw ? [player(action.raw)] : []
    const timelineSoFar = [...previous.timeline, ...echoed]

    const outcome = await this.resolve(action, previous)

    const evidence = outcome.evidence ?? previous.evidence
    const next: SessionState = {
      ...previous,
      locationId: outcome.locationId ?? previous.locationId,
      evidence,
      cluesFound: evidence.length,
      timeline: [...timelineSoFar, ...outcome.entries],
      npcMemories: outcome.npcMemories ?? previous.npcMemories,
      lastActiveAt: this.now(),
    }

    assertValidTransition(previous, next, this.catalog)
    await this.store.save(next)

    console.log(
      `[SessionEngine] ${sessionId} ${action.type}: +${outcome.entries.length} entries, clues ${next.cluesFound}`
    )

    return {
      reply: outcome.entries.map(toMessageView),
      state: toSessionStateView(next, this.catalog),
    }
  }

  private async resolve(action: Action, state: SessionState): Promise<Outcome> {
    switch (action.type) {
      case 'move':
        return this.resolveMove(action.locationId, state)
      case 'inspect':
        return this.resolveInspect(action.target, state)
      case 'dialogue':
        return this.resolveDialogue(action, state)
      case 'unknown':
        if (action.reason === 'unknown_destination') {
          return { entries: [narrator(narration.unknownDestination(action.attempted ?? action.raw))] }
        }
        return { entries: [narrator(narration.clarification())] }
    }
  }

  private resolveMove(locationId: string, state: SessionState): Outcome {
    const location = this.catalog.getLocation(locationId)
    if (!location) {
      return { entries: [narrator(narration.unknownDestination(locationId))] }
    }
    if (location.id === state.locationId) {
      return { entries: [narrator(narration.alreadyHere(location.displayName))] }
    }
    return { entries: [narrator(location.description)], locationId: location.id }
  }

  private resolveInspect(target: string, state: SessionState): Outcome {
    const object = this.catalog.findObject(state.locationId, target)
    if (!object) {
      // Generic text echoes the player's words, so keyword rules never run on it
      return { entries: [narrator(narration.nothingNotable(target.replace(/^(the|a|an)\s+/i, '')))] }
    }

    const alreadyFound = object.clueId !== undefined && state.evidence.some((e) => e.id === object.clueId)
    const text = alreadyFound && object.revisitDescription ? object.revisitDescription : object.description
    const clueIds = object.clueId ? [object.clueId] : []

    clueIds.push(...extractClues({ kind: 'location', id: state.locationId }, text, this.catalog.getClueRules()))
    const { evidence, added } = recordClues(state.evidence, clueIds, this.catalog)
    if (added.length > 0) {
      console.log(`[SessionEngine] ${state.id} found clue(s): ${added.map((e) => e.id).join(', ')}`)
    }

    return { entries: [narrator(text)], evidence }
  }

  private async resolveDialogue(action: Extract<Action, { type: 'dialogue' }>, state: SessionState): Promise<Outcome> {
    const npc = action.npcId ? this.catalog.getNPC(action.npcId) : undefined
    if (!npc) {
      return { entries: [narrator(narration.noSuchPerson())] }
    }

    const location = this.catalog.getLocation(state.locationId)
    const memory = state.npcMemories[npc.id]

    const reply = await this.responder.respond({
      npc,
      question: action.question,
      playerText: action.raw,
      context: {
        locationName: location?.displayName ?? state.locationId,
        evidence: state.evidence,
        memory: recentExchanges(memory, this.config.promptMemoryEntries),
        // The player's current line goes in the prompt separately
        recentTimeline: this.config.historyEntries > 0 ? state.timeline.slice(-this.config.historyEntries) : [],
      },
    })

    const clueIds = extractClues({ kind: 'npc', id: npc.id }, reply.text, this.catalog.getClueRules())
    const { evidence, added } = recordClues(state.evidence, clueIds, this.catalog)
    if (added.length > 0) {
      console.log(`[SessionEngine] ${state.id} learned clue(s) from ${npc.displayName}: ${added.map((e) => e.id).join(', ')}`)
    }

    const npcMemories = {
      ...state.npcMemories,
      [npc.id]: rememberExchange(
        memory,
        { question: action.question ?? action.raw, reply: reply.text },
        this.config.maxMemoryEntries
      ),
    }

    return {
      entries: [entry(npc.displayName, reply.text, npc.avatar)],
      evidence,
      npcMemories,
    }
  }
}
