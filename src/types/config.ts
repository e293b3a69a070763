export interface DialogueConfig {
  /** Upper bound for one live generation call */
  timeoutMs: number
  maxSentences: number
  /** Exchanges kept per NPC per session */
  maxMemoryEntries: number
  /** Exchanges injected into a prompt */
  promptMemoryEntries: number
  /** Recent timeline entries injected into a prompt */
  historyEntries: number
}

export interface SessionConfig {
  maxSessions: number
  idleTimeoutMs: number
}

export interface ErrorConfig {
  /** Switch live dialogue to mock after a critical error (default: true) */
  degradeOnCriticalError?: boolean
  /** Consecutive failures before degrading (default: 3) */
  maxConsecutiveFailures?: number
  /** How long live dialogue stays degraded (default: 60000ms) */
  degradeCooldownMs?: number
  /** Webhook timeout (default: 10000ms) */
  webhookTimeoutMs?: number
}

export interface EngineConfig {
  dialogue: DialogueConfig
  sessions: SessionConfig
  error: ErrorConfig
}

export type DialogueMode = 'live' | 'mock'
