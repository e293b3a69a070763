export type {
  ResponseGenerator,
  TextGenerator,
  DialogueContext,
  DialogueRequest,
  DialogueReply,
} from './ResponseGenerator'
export { MockResponseGenerator, extractTopic } from './MockResponseGenerator'
export { LLMResponseGenerator } from './LLMResponseGenerator'
export { buildDialoguePrompt, buildSystemInstruction, sanitizeReply } from './promptBuilder'
export { rememberExchange, recentExchanges } from './npcMemory'
