import type { DialogueMode, EngineConfig, WorldData } from '@/types'
import { SessionEngine } from './SessionEngine'
import { MemorySessionStore } from './MemorySessionStore'
import { WorldCatalog } from '@/server/world/WorldCatalog'
import {
  LLMResponseGenerator,
  MockResponseGenerator,
  type ResponseGenerator,
  type TextGenerator,
} from '@/server/dialogue'
import { loadEngineConfig, loadWorldData } from '@/server/data/dataLoader'
import {
  createLLMTextGenerator,
  getLLMErrorHandler,
  initializeLLMClient,
  initializeLLMErrorHandler,
  isLLMAvailable,
} from '@/server/llm'

export interface CreateEngineOptions {
  world: WorldData
  config: EngineConfig
  mode: DialogueMode
  generator?: TextGenerator     // required for live mode
}

/**
 * Read DIALOGUE_MODE; anything but "mock" asks for live dialogue
 */
export function resolveDialogueMode(value: string | undefined = process.env.DIALOGUE_MODE): DialogueMode {
  return value?.trim().toLowerCase() === 'mock' ? 'mock' : 'live'
}

export function createResponseGenerator(
  mode: DialogueMode,
  config: EngineConfig,
  generator?: TextGenerator
): ResponseGenerator {
  if (mode === 'live' && generator) {
    return new LLMResponseGenerator(generator, config.dialogue, { errorHandler: getLLMErrorHandler() })
  }
  if (mode === 'live') {
    console.warn('[EngineFactory] No text generator available, using mock dialogue')
  }
  return new MockResponseGenerator()
}

export function createSessionEngine(options: CreateEngineOptions): SessionEngine {
  const { world, config, mode, generator } = options
  return new SessionEngine({
    catalog: new WorldCatalog(world),
    store: new MemorySessionStore(config.sessions),
    responder: createResponseGenerator(mode, config, generator),
    config: config.dialogue,
  })
}

// Singleton instance for the process
let globalEngine: SessionEngine | null = null

export function getSessionEngine(): SessionEngine {
  if (!globalEngine) {
    throw new Error('Session engine not initialized. Call ensureEngineInitialized() first.')
  }
  return globalEngine
}

export function setSessionEngine(engine: SessionEngine): void {
  globalEngine = engine
}

// Shared promise to prevent parallel initialization
let initializingPromise: Promise<SessionEngine> | null = null

/**
 * Build the process-wide engine from data files and environment.
 * Safe to call multiple times; initialization runs once.
 */
export async function ensureEngineInitialized(logPrefix: string = '[Engine]'): Promise<SessionEngine> {
  if (globalEngine) {
    return globalEngine
  }
  if (initializingPromise) {
    return initializingPromise
  }

  initializingPromise = (async () => {
    try {
      console.log(`${logPrefix} Initializing session engine...`)
      const [world, config] = await Promise.all([loadWorldData(), loadEngineConfig()])

      initializeLLMErrorHandler(config.error)

      let mode = resolveDialogueMode()
      if (mode === 'live') {
        initializeLLMClient()
        if (!isLLMAvailable()) {
          console.warn(`${logPrefix} LLM unavailable, running in mock mode`)
          mode = 'mock'
        }
      }

      const engine = createSessionEngine({
        world,
        config,
        mode,
        generator: mode === 'live' ? createLLMTextGenerator() : undefined,
      })
      globalEngine = engine
      console.log(`${logPrefix} Session engine ready (dialogue: ${engine.getDialogueMode()})`)
      return engine
    } finally {
      initializingPromise = null
    }
  })()

  return initializingPromise
}

export function resetSessionEngine(): void {
  globalEngine = null
  initializingPromise = null
}
