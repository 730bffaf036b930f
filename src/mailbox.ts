import type { SendTarget } from './send'

/**
 * FIFO queue that serializes a store's dispatches.
 *
 * `enqueue` drains synchronously unless a drain is already running further up
 * the stack, in which case the action waits its turn. Whatever the entry
 * point (a direct dispatch, an observer reacting to a change, a send handle),
 * one action's reducer, diff and notify phases finish before the next begins.
 *
 * A failing action never stalls the queue. The action that started the drain
 * rethrows to its caller once the queue is empty; a queued action that fails
 * goes to `onError`, since its sender is no longer on the stack.
 */
export class Mailbox<A> implements SendTarget<A> {
  private readonly queue: A[] = []
  private draining = false
  private closed = false

  constructor(
    private readonly process: (action: A) => void,
    private readonly onError: (error: unknown, action: A) => void
  ) {}

  get isDestroyed(): boolean {
    return this.closed
  }

  get isDraining(): boolean {
    return this.draining
  }

  get size(): number {
    return this.queue.length
  }

  enqueue(action: A): void {
    if (this.closed) return
    this.queue.push(action)
    if (!this.draining) this.drain()
  }

  /** Drop pending actions and refuse new ones. */
  close(): void {
    this.closed = true
    this.queue.length = 0
  }

  private drain(): void {
    this.draining = true
    let head = true
    let headFailed = false
    let headError: unknown
    try {
      while (this.queue.length > 0 && !this.closed) {
        const next = this.queue.shift()
        if (next === undefined) break
        try {
          this.process(next)
        } catch (error) {
          if (head) {
            headFailed = true
            headError = error
          } else {
            this.onError(error, next)
          }
        }
        head = false
      }
    } finally {
      this.draining = false
    }
    if (headFailed) throw headError
  }
}
