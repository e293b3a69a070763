import type { SessionState } from '@/types'

export interface CreateSessionOptions {
  /** Sessions for which this returns true are never evicted to make room */
  isBusy?: (id: string) => boolean
}

/**
 * Storage for live sessions.
 * Implementations hand out copies: mutating a loaded state has no effect
 * until it is saved.
 */
export interface SessionStore {
  /**
   * Insert a new session, evicting as needed to stay under the ceiling
   */
  create(state: SessionState, options?: CreateSessionOptions): Promise<void>

  /**
   * Load a session; null if unknown or expired
   */
  load(id: string): Promise<SessionState | null>

  /**
   * Replace an existing session. Throws SessionNotFoundError if it is gone.
   */
  save(state: SessionState): Promise<void>
}
