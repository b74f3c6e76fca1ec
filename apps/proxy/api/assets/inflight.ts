/**
 * Shares one in-progress task between concurrent callers of the same key.
 * The entry is dropped once the task settles, so a failed fill is retried by
 * the next request rather than remembered.
 */
export class InflightTasks<T> {
  private pending = new Map<string, Promise<T>>()

  run(key: string, task: () => Promise<T>): Promise<T> {
    const existing = this.pending.get(key)
    if (existing) return existing

    const promise = task().finally(() => {
      this.pending.delete(key)
    })
    this.pending.set(key, promise)
    return promise
  }

  has(key: string): boolean {
    return this.pending.has(key)
  }

  get size(): number {
    return this.pending.size
  }
}
