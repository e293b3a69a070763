import type { MemoryExchange, NPCMemory } from '@/types'

/**
 * Append an exchange, dropping the oldest beyond `maxEntries`
 */
export function rememberExchange(memory: NPCMemory | undefined, exchange: MemoryExchange, maxEntries: number): NPCMemory {
  const exchanges = [...(memory?.exchanges ?? []), exchange]
  const overflow = Math.max(0, exchanges.length - maxEntries)
  return { exchanges: exchanges.slice(overflow) }
}

/**
 * Most recent `count` exchanges, oldest first
 */
export function recentExchanges(memory: NPCMemory | undefined, count: number): MemoryExchange[] {
  if (!memory || count <= 0) return []
  return memory.exchanges.slice(-count)
}
