import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest'
import path from 'path'
import { promises as fs } from 'fs'
import os from 'os'
import worldJson from '../../../data/world.json'
import {
  parseWorldData,
  parseEngineConfig,
  validateWorldData,
  resolveAvatarType,
  loadWorldData,
  loadEngineConfig,
  DEFAULT_ENGINE_CONFIG,
} from './dataLoader'
import { ConfigLoadError } from '@/lib/errors'

function minimalWorld(overrides: Record<string, unknown> = {}) {
  return {
    title: 'Test',
    startLocationId: 'Hall',
    introduction: 'Hello.',
    locations: [{ id: 'Hall', displayName: 'The Hall', description: 'A hall.' }],
    npcs: [
      {
        id: 'Owl',
        displayName: 'The Owl',
        avatar: 'purple',
        persona: 'Wise.',
        mock: { greetings: ['Hoo.'], replies: ['Hoo hoo.'] },
      },
    ],
    clues: [],
    ...overrides,
  }
}

describe('dataLoader', () => {
  beforeEach(() => {
    vi.spyOn(console, 'log').mockImplementation(() => {})
    vi.spyOn(console, 'warn').mockImplementation(() => {})
  })

  afterEach(() => {
    vi.restoreAllMocks()
  })

  describe('parseWorldData', () => {
    it('should accept the bundled world file', () => {
      const world = parseWorldData(worldJson)
      expect(world.startLocationId).toBe('great hall')
      expect(world.locations.map((l) => l.id)).toEqual(['great hall', 'library', 'courtyard', "dumbledore's office"])
      expect(world.npcs.map((n) => n.id)).toEqual(['professor dumbledore', 'draco', 'evelyn'])
    })

    it('should normalize ids and fill defaults', () => {
      const world = parseWorldData(minimalWorld())
      expect(world.startLocationId).toBe('hall')
      expect(world.locations[0]).toEqual({
        id: 'hall',
        displayName: 'The Hall',
        aliases: [],
        description: 'A hall.',
        objects: [],
      })
      expect(world.npcs[0].id).toBe('owl')
      expect(world.npcs[0].aliases).toEqual([])
      expect(world.clueRules).toEqual([])
    })

    it('should replace an unknown avatar with the fallback', () => {
      const world = parseWorldData(
        minimalWorld({
          npcs: [
            {
              id: 'ghost',
              displayName: 'Ghost',
              avatar: 'silver',
              persona: 'Spooky.',
              mock: { greetings: ['Boo.'], replies: ['Boo!'] },
            },
          ],
        })
      )
      expect(world.npcs[0].avatar).toBe('blue')
    })

    it('should reject schema errors with the failing path', () => {
      expect(() => parseWorldData({ ...minimalWorld(), locations: [] })).toThrow(ConfigLoadError)
      expect(() => parseWorldData({ ...minimalWorld(), title: 42 })).toThrow(/title/)
    })

    it('should reject a missing start location', () => {
      expect(() => parseWorldData(minimalWorld({ startLocationId: 'cellar' }))).toThrow(
        'Start location not found: cellar'
      )
    })
  })

  describe('validateWorldData', () => {
    it('should report duplicate NPC ids and dangling clue references', () => {
      const world = parseWorldData(minimalWorld())
      const errors = validateWorldData({
        ...world,
        npcs: [world.npcs[0], world.npcs[0]],
        clueRules: [{ clueId: 'ghost-clue', source: { kind: 'npc', id: 'nobody' }, keywords: ['x'] }],
      })
      expect(errors).toEqual([
        'Duplicate NPC id: owl',
        'Clue rule references unknown clue: ghost-clue',
        'Clue rule "ghost-clue" references unknown npc: nobody',
      ])
    })
  })

  describe('resolveAvatarType', () => {
    it('should keep known avatars', () => {
      expect(resolveAvatarType('green')).toBe('green')
    })

    it('should fall back and warn for unknown avatars', () => {
      expect(resolveAvatarType('gold', 'npc-1')).toBe('blue')
      expect(console.warn).toHaveBeenCalledWith(expect.stringContaining('Unknown avatar "gold" for "npc-1"'))
    })
  })

  describe('parseEngineConfig', () => {
    it('should fill defaults for missing sections', () => {
      const config = parseEngineConfig({ dialogue: { timeoutMs: 500 } })
      expect(config.dialogue).toEqual({
        timeoutMs: 500,
        maxSentences: 3,
        maxMemoryEntries: 8,
        promptMemoryEntries: 4,
        historyEntries: 5,
      })
      expect(config.sessions).toEqual(DEFAULT_ENGINE_CONFIG.sessions)
    })

    it('should reject invalid values', () => {
      expect(() => parseEngineConfig({ sessions: { maxSessions: 0 } })).toThrow(ConfigLoadError)
    })
  })

  describe('file loading', () => {
    let dir: string

    beforeEach(async () => {
      dir = await fs.mkdtemp(path.join(os.tmpdir(), 'mystery-data-'))
    })

    afterEach(async () => {
      await fs.rm(dir, { recursive: true, force: true })
    })

    it('should load a world file from disk', async () => {
      const file = path.join(dir, 'world.json')
      await fs.writeFile(file, JSON.stringify(minimalWorld()))
      const world = await loadWorldData(file)
      expect(world.title).toBe('Test')
    })

    it('should wrap malformed JSON in ConfigLoadError', async () => {
      const file = path.join(dir, 'world.json')
      await fs.writeFile(file, '{ not json')
      await expect(loadWorldData(file)).rejects.toThrow(`Failed to parse ${file}`)
    })

    it('should use defaults when the engine config file is missing', async () => {
      const config = await loadEngineConfig(path.join(dir, 'missing.json'))
      expect(config).toEqual(DEFAULT_ENGINE_CONFIG)
    })

    it('should load the bundled engine config', async () => {
      const config = await loadEngineConfig()
      expect(config.dialogue.timeoutMs).toBe(15000)
      expect(config.error.maxConsecutiveFailures).toBe(3)
    })
  })
})
