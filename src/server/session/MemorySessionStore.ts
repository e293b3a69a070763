import type { SessionState, SessionConfig } from '@/types'
import type { CreateSessionOptions, SessionStore } from './SessionStore'
import { SessionNotFoundError } from '@/lib/errors'

function cloneState(state: SessionState): SessionState {
  return structuredClone(state)
}

/**
 * In-memory implementation of SessionStore.
 * Data is not persisted across restarts. Holds at most `maxSessions`;
 * sessions idle for longer than `idleTimeoutMs` are dropped on access.
 */
export class MemorySessionStore implements SessionStore {
  private sessions: Map<string, SessionState> = new Map()
  private config: SessionConfig
  private now: () => number

  constructor(config: SessionConfig, now: () => number = Date.now) {
    this.config = config
    this.now = now
  }

  async create(state: SessionState, options: CreateSessionOptions = {}): Promise<void> {
    const isBusy = options.isBusy ?? (() => false)
    this.sweepExpired(isBusy)
    while (this.sessions.size >= this.config.maxSessions) {
      if (!this.evictLeastRecentlyActive(isBusy)) {
        console.warn(`[SessionStore] All ${this.sessions.size} session(s) busy, exceeding limit ${this.config.maxSessions}`)
        break
      }
    }
    this.sessions.set(state.id, cloneState(state))
  }

  async load(id: string): Promise<SessionState | null> {
    this.sweepExpired()
    const state = this.sessions.get(id)
    if (!state) return null
    return cloneState(state)
  }

  async save(state: SessionState): Promise<void> {
    if (!this.sessions.has(state.id)) {
      throw new SessionNotFoundError(state.id)
    }
    this.sessions.set(state.id, cloneState(state))
  }

  /**
   * Drop sessions idle past the timeout. Returns the number removed.
   */
  sweepExpired(isBusy: (id: string) => boolean = () => false): number {
    const cutoff = this.now() - this.config.idleTimeoutMs
    let removed = 0
    for (const [id, state] of this.sessions) {
      if (state.lastActiveAt < cutoff && !isBusy(id)) {
        this.sessions.delete(id)
        removed++
      }
    }
    if (removed > 0) {
      console.log(`[SessionStore] Expired ${removed} idle session(s)`)
    }
    return removed
  }

  private evictLeastRecentlyActive(isBusy: (id: string) => boolean): boolean {
    let oldest: SessionState | null = null
    for (const state of this.sessions.values()) {
      if (isBusy(state.id)) continue
      if (!oldest || state.lastActiveAt < oldest.lastActiveAt) {
        oldest = state
      }
    }
    if (!oldest) return false
    this.sessions.delete(oldest.id)
    console.log(`[SessionStore] Evicted session ${oldest.id} (limit ${this.config.maxSessions})`)
    return true
  }
}
