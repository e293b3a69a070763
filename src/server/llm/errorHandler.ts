import type { ErrorConfig } from '@/types/config'

// Error type definitions
export type LLMErrorCode =
  | 'LLM_NOT_INITIALIZED'
  | 'LLM_API_ERROR'
  | 'LLM_RATE_LIMIT'
  | 'LLM_TIMEOUT'
  | 'LLM_INVALID_RESPONSE'
  | 'LLM_NETWORK_ERROR'
  | 'LLM_UNKNOWN_ERROR'

export type LLMErrorSeverity = 'warning' | 'error' | 'critical'

export interface LLMError {
  code: LLMErrorCode
  message: string
  severity: LLMErrorSeverity
  cause?: Error
  context?: Record<string, unknown>
  timestamp: number
}

// Default configuration
const DEFAULT_ERROR_CONFIG: Required<ErrorConfig> = {
  degradeOnCriticalError: true,
  maxConsecutiveFailures: 3,
  degradeCooldownMs: 60000,
  webhookTimeoutMs: 10000,
}

// Error patterns mapped to their classification
const ERROR_PATTERNS: Array<{
  keywords: string[]
  code: LLMErrorCode
  severity: LLMErrorSeverity
}> = [
  {
    keywords: ['rate limit', '429', 'too many requests'],
    code: 'LLM_RATE_LIMIT',
    severity: 'warning',
  },
  {
    keywords: ['timeout', 'timed out', 'etimedout', 'aborted'],
    code: 'LLM_TIMEOUT',
    severity: 'error',
  },
  {
    keywords: ['network', 'econnrefused', 'enotfound', 'fetch failed'],
    code: 'LLM_NETWORK_ERROR',
    severity: 'error',
  },
  {
    keywords: ['not initialized', 'not configured'],
    code: 'LLM_NOT_INITIALIZED',
    severity: 'critical',
  },
  {
    keywords: ['invalid', 'parse', 'empty'],
    code: 'LLM_INVALID_RESPONSE',
    severity: 'warning',
  },
  {
    keywords: ['401', '403', 'unauthorized', 'forbidden', 'quota'],
    code: 'LLM_API_ERROR',
    severity: 'critical',
  },
]

/**
 * Tracks live generation failures. After a critical error, or too many
 * failures in a row, live dialogue is degraded to mock for a cooldown period.
 */
export class LLMErrorHandler {
  private config: Required<ErrorConfig>
  private consecutiveFailures: number = 0
  private degradedUntil: number = 0
  private now: () => number

  constructor(config?: ErrorConfig, now: () => number = Date.now) {
    this.config = { ...DEFAULT_ERROR_CONFIG, ...config }
    this.now = now
  }

  /**
   * Handle an error from a generation call
   */
  async handleError(error: unknown, context?: Record<string, unknown>): Promise<LLMError> {
    const llmError = this.normalizeError(error, context)
    this.consecutiveFailures++

    console.error(`[LLMErrorHandler] Error (${llmError.code}): ${llmError.message}`, {
      severity: llmError.severity,
      consecutiveFailures: this.consecutiveFailures,
      context: llmError.context,
    })

    const shouldDegrade = this.shouldDegrade(llmError)

    // Send webhook notification (non-blocking)
    this.sendWebhookNotification(llmError, shouldDegrade).catch((webhookError) => {
      console.error('[LLMErrorHandler] Webhook notification failed:', webhookError)
    })

    if (shouldDegrade) {
      this.degradedUntil = this.now() + this.config.degradeCooldownMs
      console.warn(`[LLMErrorHandler] Live dialogue degraded to mock for ${this.config.degradeCooldownMs}ms`)
    }

    return llmError
  }

  /**
   * Reset failure count (call on successful operation)
   */
  resetFailureCount(): void {
    if (this.consecutiveFailures > 0) {
      console.log(`[LLMErrorHandler] Failure count reset (was ${this.consecutiveFailures})`)
      this.consecutiveFailures = 0
    }
  }

  /**
   * Get current consecutive failure count
   */
  getConsecutiveFailures(): number {
    return this.consecutiveFailures
  }

  /**
   * True while live calls should be skipped
   */
  isDegraded(): boolean {
    return this.now() < this.degradedUntil
  }

  /**
   * Normalize various error types to LLMError
   */
  private normalizeError(error: unknown, context?: Record<string, unknown>): LLMError {
    const timestamp = this.now()
    const message = error instanceof Error ? error.message : String(error)
    const cause = error instanceof Error ? error : undefined

    const classification = this.classifyError(message)

    return {
      code: classification.code,
      message,
      severity: classification.severity,
      cause,
      context,
      timestamp,
    }
  }

  /**
   * Classify error message into code and severity
   */
  private classifyError(message: string): { code: LLMErrorCode; severity: LLMErrorSeverity } {
    const lowerMessage = message.toLowerCase()

    for (const pattern of ERROR_PATTERNS) {
      if (pattern.keywords.some((keyword) => lowerMessage.includes(keyword))) {
        return { code: pattern.code, severity: pattern.severity }
      }
    }

    // Default classification for unknown errors
    return { code: 'LLM_UNKNOWN_ERROR', severity: 'error' }
  }

  private shouldDegrade(error: LLMError): boolean {
    if (!this.config.degradeOnCriticalError) {
      return false
    }

    return (
      error.severity === 'critical' ||
      this.consecutiveFailures >= this.config.maxConsecutiveFailures
    )
  }

  /**
   * Send webhook notification
   */
  private async sendWebhookNotification(error: LLMError, willDegrade: boolean): Promise<void> {
    const webhookUrl = process.env.ERROR_WEBHOOK_URL
    if (!webhookUrl) {
      return
    }

    const payload = {
      type: 'llm_error',
      timestamp: new Date(error.timestamp).toISOString(),
      error: {
        code: error.code,
        message: error.message,
        severity: error.severity,
      },
      dialogue: {
        willDegrade,
        consecutiveFailures: this.consecutiveFailures,
      },
      // Slack-compatible text field
      text: `[${error.severity.toUpperCase()}] LLM Error: ${error.code}\n${error.message}${willDegrade ? '\nLive dialogue switched to mock replies.' : ''}`,
    }

    const controller = new AbortController()
    const timeoutId = setTimeout(() => controller.abort(), this.config.webhookTimeoutMs)

    try {
      const response = await fetch(webhookUrl, {
        method: 'POST',
        headers: {
          'Content-Type': 'application/json',
        },
        body: JSON.stringify(payload),
        signal: controller.signal,
      })

      if (!response.ok) {
        console.warn(`[LLMErrorHandler] Webhook returned ${response.status}`)
      } else {
        console.log('[LLMErrorHandler] Webhook notification sent')
      }
    } catch (err) {
      if (err instanceof Error && err.name === 'AbortError') {
        console.warn('[LLMErrorHandler] Webhook request timed out')
      } else {
        throw err
      }
    } finally {
      clearTimeout(timeoutId)
    }
  }
}

// Singleton instance
let errorHandler: LLMErrorHandler | null = null

/**
 * Initialize the LLM error handler
 */
export function initializeLLMErrorHandler(config?: ErrorConfig): void {
  errorHandler = new LLMErrorHandler(config)
  console.log('[LLMErrorHandler] Initialized')
}

/**
 * Get the LLM error handler instance
 */
export function getLLMErrorHandler(): LLMErrorHandler {
  if (!errorHandler) {
    // Auto-initialize with defaults if not explicitly initialized
    errorHandler = new LLMErrorHandler()
    console.log('[LLMErrorHandler] Auto-initialized with defaults')
  }
  return errorHandler
}

/**
 * Reset the error handler (for testing)
 */
export function resetLLMErrorHandler(): void {
  errorHandler = null
}
