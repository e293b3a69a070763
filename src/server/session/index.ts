export { SessionEngine } from './SessionEngine'
export type { SessionEngineOptions, SessionEngineConfig } from './SessionEngine'
export type { SessionStore, CreateSessionOptions } from './SessionStore'
export { MemorySessionStore } from './MemorySessionStore'
export {
  createSessionEngine,
  createResponseGenerator,
  resolveDialogueMode,
  ensureEngineInitialized,
  getSessionEngine,
  setSessionEngine,
  resetSessionEngine,
} from './engineFactory'
export { toSessionStateView, toMessageView } from './sessionView'
