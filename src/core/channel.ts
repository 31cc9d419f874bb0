/**
 * Channel — unbounded in-process queue between one producer and one consumer.
 *
 * The producer calls `push()`; the consumer pulls with `take()` or iterates
 * with `for await`. Items come out in push order. `close()` stops accepting
 * new items; buffered items are still drained before the consumer sees `done`.
 */

type Waiter<T> = (result: IteratorResult<T, undefined>) => void

const DONE = { done: true, value: undefined } as const

export class Channel<T extends object> implements AsyncIterable<T> {
  private buffer: T[] = []
  private waiters: Waiter<T>[] = []
  private closed = false

  /** Enqueue an item. Returns false if the channel is closed. */
  push(item: T): boolean {
    if (this.closed) return false

    const waiter = this.waiters.shift()
    if (waiter) {
      waiter({ done: false, value: item })
    } else {
      this.buffer.push(item)
    }
    return true
  }

  /**
   * Wait for the next item.
   * Resolves `done` once the channel is closed and drained, or when `signal` aborts.
   */
  take(signal?: AbortSignal): Promise<IteratorResult<T, undefined>> {
    const head = this.buffer.shift()
    if (head) return Promise.resolve({ done: false, value: head })
    if (this.closed || signal?.aborted) return Promise.resolve(DONE)

    return new Promise((resolve) => {
      const onAbort = () => {
        this.waiters = this.waiters.filter((w) => w !== waiter)
        resolve(DONE)
      }
      const waiter: Waiter<T> = (result) => {
        signal?.removeEventListener('abort', onAbort)
        resolve(result)
      }
      signal?.addEventListener('abort', onAbort, { once: true })
      this.waiters.push(waiter)
    })
  }

  /** Stop accepting items and release every pending consumer. */
  close(): void {
    if (this.closed) return
    this.closed = true
    const waiters = this.waiters
    this.waiters = []
    for (const waiter of waiters) waiter(DONE)
  }

  get isClosed(): boolean {
    return this.closed
  }

  /** Items buffered and not yet taken. */
  get size(): number {
    return this.buffer.length
  }

  async *[Symbol.asyncIterator](): AsyncIterator<T> {
    while (true) {
      const next = await this.take()
      if (next.done) return
      yield next.value
    }
  }
}
