import { config } from 'dotenv'
config({ path: '.env.local' })
config()

import { createInterface } from 'readline/promises'
import { stdin as input, stdout as output } from 'process'
import { ensureEngineInitialized } from '../src/server/session'
import type { MessageView } from '../src/types'

function print(messages: MessageView[]): void {
  for (const m of messages) {
    console.log(`\n${m.speaker}: ${m.text}`)
  }
}

async function main() {
  const engine = await ensureEngineInitialized('[Play]')
  const { session_id, state } = await engine.startSession()
  print(state.timeline)

  const rl = createInterface({ input, output })
  try {
    while (true) {
      const line = (await rl.question('\n> ')).trim()
      if (line === 'quit' || line === 'exit') break
      if (!line) continue

      const result = await engine.applyAction(session_id, line)
      print(result.reply)
      console.log(`\n[${result.state.location} | clues: ${result.state.clues_found}]`)
    }
  } finally {
    rl.close()
  }
}

main().catch((error) => {
  console.error(error)
  process.exitCode = 1
})
