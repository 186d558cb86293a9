/**
 * Unbounded many-producer / single-consumer queue.
 *
 * Producers call `push`; the single consumer iterates with `for await`.
 * Iteration ends once the channel is closed and the buffer is drained.
 */
export class Channel<T> implements AsyncIterable<T> {
  private buffer: T[] = []
  private waiting: ((result: IteratorResult<T, undefined>) => void) | null = null
  private closed = false

  push(value: T): void {
    if (this.closed) {
      throw new Error('Cannot push to a closed channel')
    }

    if (this.waiting) {
      const wake = this.waiting
      this.waiting = null
      wake({ value, done: false })
    } else {
      this.buffer.push(value)
    }
  }

  close(): void {
    if (this.closed) return
    this.closed = true

    if (this.waiting) {
      const wake = this.waiting
      this.waiting = null
      wake({ value: undefined, done: true })
    }
  }

  next(): Promise<IteratorResult<T, undefined>> {
    if (this.buffer.length > 0) {
      const value = this.buffer[0]
      this.buffer.shift()
      return Promise.resolve({ value, done: false })
    }
    if (this.closed) {
      return Promise.resolve({ value: undefined, done: true })
    }
    if (this.waiting) {
      return Promise.reject(new Error('Channel supports a single consumer'))
    }

    return new Promise((resolve) => {
      this.waiting = resolve
    })
  }

  async *[Symbol.asyncIterator](): AsyncIterator<T> {
    while (true) {
      const result = await this.next()
      if (result.done) return
      yield result.value
    }
  }
}
