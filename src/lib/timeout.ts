import { GenerationTimeoutError } from './errors'

/**
 * Run `task` with an AbortSignal that fires after `timeoutMs`. The returned
 * promise rejects with GenerationTimeoutError at the deadline even if the task
 * ignores the signal.
 */
export async function withTimeout<T>(
  task: (signal: AbortSignal) => Promise<T>,
  timeoutMs: number
): Promise<T> {
  const controller = new AbortController()
  let timeoutId: ReturnType<typeof setTimeout> | undefined

  const deadline = new Promise<never>((_, reject) => {
    timeoutId = setTimeout(() => {
      controller.abort()
      reject(new GenerationTimeoutError(timeoutMs))
    }, timeoutMs)
  })

  try {
    return await Promise.race([task(controller.signal), deadline])
  } finally {
    clearTimeout(timeoutId)
  }
}
