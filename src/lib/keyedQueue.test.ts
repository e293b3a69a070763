import { describe, it, expect } from 'vitest'
import { KeyedQueue } from './keyedQueue'

function deferred<T>() {
  let resolve: (value: T) => void = () => {}
  const promise = new Promise<T>((r) => {
    resolve = r
  })
  return { promise, resolve }
}

describe('KeyedQueue', () => {
  it('should run tasks for the same key one at a time, in order', async () => {
    const queue = new KeyedQueue()
    const events: string[] = []
    const gate = deferred<void>()

    const first = queue.run('s1', async () => {
      events.push('first:start')
      await gate.promise
      events.push('first:end')
      return 1
    })
    const second = queue.run('s1', async () => {
      events.push('second:start')
      return 2
    })

    await Promise.resolve()
    await Promise.resolve()
    expect(events).toEqual(['first:start'])

    gate.resolve()
    expect(await first).toBe(1)
    expect(await second).toBe(2)
    expect(events).toEqual(['first:start', 'first:end', 'second:start'])
  })

  it('should not block other keys', async () => {
    const queue = new KeyedQueue()
    const gate = deferred<void>()

    const slow = queue.run('a', async () => {
      await gate.promise
      return 'a'
    })
    const fast = await queue.run('b', async () => 'b')

    expect(fast).toBe('b')
    gate.resolve()
    expect(await slow).toBe('a')
  })

  it('should keep going after a failed task', async () => {
    const queue = new KeyedQueue()
    const failed = queue.run('s1', async () => {
      throw new Error('boom')
    })
    const next = queue.run('s1', async () => 'ok')

    await expect(failed).rejects.toThrow('boom')
    expect(await next).toBe('ok')
  })

  it('should report a key as busy while a task is pending', async () => {
    const queue = new KeyedQueue()
    let release: () => void = () => {}
    const pending = queue.run('s1', () => new Promise<void>((resolve) => {
      release = resolve
    }))

    expect(queue.isBusy('s1')).toBe(true)
    expect(queue.isBusy('s2')).toBe(false)

    release()
    await pending
  })

  it('should forget idle keys', async () => {
    const queue = new KeyedQueue()
    await queue.run('s1', async () => undefined)
    await new Promise((resolve) => setTimeout(resolve, 0))
    expect(queue.isBusy('s1')).toBe(false)
  })
})
