import { describe, it, expect, vi, afterEach } from 'vitest'
import { withTimeout } from './timeout'
import { GenerationTimeoutError } from './errors'

describe('withTimeout', () => {
  afterEach(() => {
    vi.useRealTimers()
  })

  it('should resolve with the task result before the deadline', async () => {
    await expect(withTimeout(async () => 'done', 1000)).resolves.toBe('done')
  })

  it('should reject with GenerationTimeoutError and abort the signal', async () => {
    vi.useFakeTimers()
    let captured: AbortSignal | undefined
    const pending = withTimeout((signal) => {
      captured = signal
      return new Promise<string>(() => {})
    }, 500)

    const assertion = expect(pending).rejects.toBeInstanceOf(GenerationTimeoutError)
    await vi.advanceTimersByTimeAsync(500)
    await assertion
    expect(captured?.aborted).toBe(true)
  })

  it('should pass task errors through', async () => {
    await expect(
      withTimeout(async () => {
        throw new Error('service down')
      }, 1000)
    ).rejects.toThrow('service down')
  })
})
