import { describe, it, expect } from 'vitest'
import type { NPC } from '@/types'
import type { DialogueRequest } from './ResponseGenerator'
import { MockResponseGenerator, extractTopic } from './MockResponseGenerator'
import { stableHash } from '@/lib/text'

function createTestNPC(overrides: Partial<NPC> = {}): NPC {
  return {
    id: 'draco',
    displayName: 'Draco Malfoy',
    avatar: 'green',
    aliases: ['malfoy'],
    persona: 'Sly and arrogant.',
    mock: {
      greetings: ['What do you want?'],
      replies: ['Nothing to say about {topic}.', 'Ask someone else about {topic}.', 'I was busy.'],
    },
    ...overrides,
  }
}

function createRequest(question: string | null, npc: NPC = createTestNPC()): DialogueRequest {
  return {
    npc,
    question,
    playerText: question ?? 'talk to draco',
    context: { locationName: 'The Library', evidence: [], memory: [], recentTimeline: [] },
  }
}

describe('extractTopic', () => {
  it('should take the phrase after "about"', () => {
    expect(extractTopic('draco about the broken wand?')).toBe('the broken wand')
  })

  it('should default to "that"', () => {
    expect(extractTopic('where were you?')).toBe('that')
    expect(extractTopic('what about ?')).toBe('that')
  })
})

describe('MockResponseGenerator', () => {
  const generator = new MockResponseGenerator()

  it('should report mock mode and source', async () => {
    expect(generator.mode).toBe('mock')
    const reply = await generator.respond(createRequest('where were you?'))
    expect(reply.source).toBe('mock')
  })

  it('should greet with a greeting line', async () => {
    const reply = await generator.respond(createRequest(null))
    expect(reply.text).toBe('What do you want?')
  })

  it('should return the same text for the same question', async () => {
    const first = await generator.respond(createRequest('Where were you last night?'))
    const second = await generator.respond(createRequest('Where were you last night?'))
    expect(second.text).toBe(first.text)
  })

  it('should select the reply by stable hash of npc and normalized question', () => {
    const npc = createTestNPC()
    const question = 'draco about the map'
    const index = stableHash('draco:draco about the map') % npc.mock.replies.length
    const expected = npc.mock.replies[index].replace('{topic}', 'the map')
    expect(generator.compose({ npc, question })).toBe(expected)
  })

  it('should substitute the topic in every placeholder', () => {
    const npc = createTestNPC({ mock: { greetings: ['Hi.'], replies: ['{topic}? {topic}!'] } })
    expect(generator.compose({ npc, question: 'about the cufflink' })).toBe('the cufflink? the cufflink!')
  })
})
