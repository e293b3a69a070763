/**
 * Runs tasks one at a time per key. Tasks for different keys do not wait on
 * each other. A failed task does not block the ones queued behind it.
 */
export class KeyedQueue {
  private tails: Map<string, Promise<unknown>> = new Map()

  run<T>(key: string, task: () => Promise<T>): Promise<T> {
    const previous = this.tails.get(key) ?? Promise.resolve()
    const result = previous.then(task, task)
    // Keep the chain alive regardless of outcome; callers observe `result`
    const tail = result.then(
      () => undefined,
      () => undefined
    )
    this.tails.set(key, tail)
    void tail.then(() => {
      if (this.tails.get(key) === tail) {
        this.tails.delete(key)
      }
    })
    return result
  }

  isBusy(key: string): boolean {
    return this.tails.has(key)
  }
}
