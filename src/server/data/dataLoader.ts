import { promises as fs } from 'fs'
import path from 'path'
import { z } from 'zod'
import type { EngineConfig, NPC, WorldData } from '@/types'
import { AVATAR_TYPES, FALLBACK_AVATAR, type AvatarType } from '@/types'
import { ConfigLoadError } from '@/lib/errors'
import { normalizeText } from '@/lib/text'

// Data files live at <project root>/data
function getDataPath(): string {
  return path.join(process.cwd(), 'data')
}

// =============================================================================
// Zod schemas
// =============================================================================

const InspectableObjectSchema = z.object({
  name: z.string().min(1),
  aliases: z.array(z.string()).default([]),
  description: z.string().min(1),
  revisitDescription: z.string().optional(),
  clueId: z.string().optional(),
})

const LocationSchema = z.object({
  id: z.string().min(1),
  displayName: z.string().min(1),
  aliases: z.array(z.string()).default([]),
  description: z.string().min(1),
  objects: z.array(InspectableObjectSchema).default([]),
})

const NPCSchema = z.object({
  id: z.string().min(1),
  displayName: z.string().min(1),
  avatar: z.string(),
  aliases: z.array(z.string()).default([]),
  persona: z.string().min(1),
  mock: z.object({
    greetings: z.array(z.string().min(1)).min(1),
    replies: z.array(z.string().min(1)).min(1),
  }),
})

const ClueRuleSchema = z.object({
  clueId: z.string().min(1),
  source: z.discriminatedUnion('kind', [
    z.object({ kind: z.literal('npc'), id: z.string().min(1) }),
    z.object({ kind: z.literal('location'), id: z.string().min(1) }),
  ]),
  keywords: z.array(z.string().min(1)).min(1),
})

const WorldDataSchema = z.object({
  title: z.string(),
  startLocationId: z.string().min(1),
  introduction: z.string(),
  locations: z.array(LocationSchema).min(1),
  npcs: z.array(NPCSchema),
  clues: z.array(z.object({ id: z.string().min(1), description: z.string().min(1) })),
  clueRules: z.array(ClueRuleSchema).default([]),
})

const EngineConfigSchema = z.object({
  dialogue: z
    .object({
      timeoutMs: z.number().int().positive().default(15000),
      maxSentences: z.number().int().positive().default(3),
      maxMemoryEntries: z.number().int().nonnegative().default(8),
      promptMemoryEntries: z.number().int().nonnegative().default(4),
      historyEntries: z.number().int().nonnegative().default(5),
    })
    .default({}),
  sessions: z
    .object({
      maxSessions: z.number().int().positive().default(500),
      idleTimeoutMs: z.number().int().positive().default(60 * 60 * 1000),
    })
    .default({}),
  error: z
    .object({
      degradeOnCriticalError: z.boolean().optional(),
      maxConsecutiveFailures: z.number().int().positive().optional(),
      degradeCooldownMs: z.number().int().nonnegative().optional(),
      webhookTimeoutMs: z.number().int().positive().optional(),
    })
    .default({}),
})

export const DEFAULT_ENGINE_CONFIG: EngineConfig = EngineConfigSchema.parse({})

// =============================================================================
// Parsing
// =============================================================================

function isAvatarType(value: string): value is AvatarType {
  return AVATAR_TYPES.some((type) => type === value)
}

export function resolveAvatarType(value: string, ownerId?: string): AvatarType {
  if (isAvatarType(value)) return value
  console.warn(`[DataLoader] Unknown avatar "${value}"${ownerId ? ` for "${ownerId}"` : ''}, using "${FALLBACK_AVATAR}"`)
  return FALLBACK_AVATAR
}

function formatIssues(error: z.ZodError): string {
  return error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`).join('; ')
}

/**
 * Collect cross-reference problems the schema cannot express
 */
export function validateWorldData(world: WorldData): string[] {
  const errors: string[] = []
  const locationIds = new Set<string>()
  const npcIds = new Set<string>()
  const clueIds = new Set(world.clues.map((c) => c.id))

  for (const location of world.locations) {
    if (locationIds.has(location.id)) {
      errors.push(`Duplicate location id: ${location.id}`)
    }
    locationIds.add(location.id)
    for (const obj of location.objects) {
      if (obj.clueId && !clueIds.has(obj.clueId)) {
        errors.push(`Object "${obj.name}" in "${location.id}" references unknown clue: ${obj.clueId}`)
      }
    }
  }

  for (const npc of world.npcs) {
    if (npcIds.has(npc.id)) {
      errors.push(`Duplicate NPC id: ${npc.id}`)
    }
    npcIds.add(npc.id)
  }

  if (!locationIds.has(world.startLocationId)) {
    errors.push(`Start location not found: ${world.startLocationId}`)
  }

  for (const rule of world.clueRules) {
    if (!clueIds.has(rule.clueId)) {
      errors.push(`Clue rule references unknown clue: ${rule.clueId}`)
    }
    const known = rule.source.kind === 'npc' ? npcIds : locationIds
    if (!known.has(rule.source.id)) {
      errors.push(`Clue rule "${rule.clueId}" references unknown ${rule.source.kind}: ${rule.source.id}`)
    }
  }

  return errors
}

/**
 * Validate raw JSON into WorldData. Ids are normalized and unknown avatars
 * replaced by the fallback.
 */
export function parseWorldData(raw: unknown): WorldData {
  const result = WorldDataSchema.safeParse(raw)
  if (!result.success) {
    throw new ConfigLoadError(`Invalid world data: ${formatIssues(result.error)}`)
  }

  const data = result.data
  const npcs: NPC[] = data.npcs.map((npc) => ({
    ...npc,
    id: normalizeText(npc.id),
    avatar: resolveAvatarType(npc.avatar, npc.id),
  }))

  const world: WorldData = {
    ...data,
    startLocationId: normalizeText(data.startLocationId),
    locations: data.locations.map((location) => ({ ...location, id: normalizeText(location.id) })),
    npcs,
    clueRules: data.clueRules.map((rule) => ({
      ...rule,
      source: { ...rule.source, id: normalizeText(rule.source.id) },
    })),
  }

  const errors = validateWorldData(world)
  if (errors.length > 0) {
    throw new ConfigLoadError(`Invalid world data: ${errors.join('; ')}`)
  }
  return world
}

export function parseEngineConfig(raw: unknown): EngineConfig {
  const result = EngineConfigSchema.safeParse(raw)
  if (!result.success) {
    throw new ConfigLoadError(`Invalid engine config: ${formatIssues(result.error)}`)
  }
  return result.data
}

async function readJson(filePath: string): Promise<unknown> {
  let content: string
  try {
    content = await fs.readFile(filePath, 'utf-8')
  } catch (error) {
    throw new ConfigLoadError(`Failed to read ${filePath}`, error instanceof Error ? error : undefined)
  }
  try {
    return JSON.parse(content)
  } catch (error) {
    throw new ConfigLoadError(`Failed to parse ${filePath}`, error instanceof Error ? error : undefined)
  }
}

// Load world catalog data
export async function loadWorldData(filePath: string = path.join(getDataPath(), 'world.json')): Promise<WorldData> {
  const world = parseWorldData(await readJson(filePath))
  console.log(`[DataLoader] Loaded "${world.title}": ${world.locations.length} locations, ${world.npcs.length} NPCs, ${world.clues.length} clues`)
  return world
}

// Load engine tunables; a missing file means defaults
export async function loadEngineConfig(
  filePath: string = path.join(getDataPath(), 'engine-config.json')
): Promise<EngineConfig> {
  try {
    await fs.access(filePath)
  } catch {
    console.warn(`[DataLoader] ${filePath} not found, using default engine config`)
    return DEFAULT_ENGINE_CONFIG
  }
  return parseEngineConfig(await readJson(filePath))
}
