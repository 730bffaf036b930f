/**
 * What a `Send` needs from its store. Kept minimal so a send handle can only
 * re-enter the pipeline, never reach into store internals.
 */
export interface SendTarget<A> {
  readonly isDestroyed: boolean
  /** Append to the store's mailbox and drain it. */
  enqueue(action: A): void
}

/**
 * Re-entry capability handed to effect operations.
 *
 * Calling it schedules exactly one dispatch on the microtask queue and
 * resolves once that dispatch has finished its reducer, diff and notify
 * phases. Calls made after the store is destroyed resolve without doing
 * anything.
 */
export interface Send<A> {
  (action: A): Promise<void>
  /** `false` once the store is destroyed or collected. */
  isActive(): boolean
}

/**
 * Builds a send handle holding only a weak reference to `target`, so an
 * effect that keeps its handle forever does not keep the store alive.
 */
export function createSend<A>(target: SendTarget<A>): Send<A> {
  const ref = new WeakRef(target)

  const resolveTarget = (): SendTarget<A> | undefined => {
    const store = ref.deref()
    return store === undefined || store.isDestroyed ? undefined : store
  }

  function send(action: A): Promise<void> {
    return new Promise<void>((resolve, reject) => {
      queueMicrotask(() => {
        try {
          resolveTarget()?.enqueue(action)
          resolve()
        } catch (error) {
          reject(error)
        }
      })
    })
  }
  send.isActive = (): boolean => resolveTarget() !== undefined

  return send
}
