export {
  initializeLLMClient,
  isLLMAvailable,
  llmGenerateText,
  createLLMTextGenerator,
} from './client'

export {
  initializeLLMErrorHandler,
  getLLMErrorHandler,
  resetLLMErrorHandler,
  LLMErrorHandler,
} from './errorHandler'

export type { LLMError, LLMErrorCode, LLMErrorSeverity } from './errorHandler'
