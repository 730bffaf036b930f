/**
 * Store Context (with unctx)
 * ==========================
 *
 * Optional composition helpers: put a store in an ambient context for the
 * duration of a synchronous call, and pick it up from anywhere below without
 * passing it through every function.
 *
 * --- ASYNC USAGE ---
 * unctx contexts are only available synchronously. Inside an async function,
 * call `use()` before the first `await` and keep the result in a local.
 *
 * @example
 * ```ts
 * const counterContext = defineStoreContext<CounterState, CounterAction>('counter')
 *
 * function incrementButton() {
 *   const store = counterContext.use()
 *   return () => store.dispatch({ type: 'increment' })
 * }
 *
 * const onClick = counterContext.call(store, incrementButton)
 * ```
 */

import { getContext } from 'unctx'
import type { Action } from './reducer'
import type { Store } from './store'

export interface StoreContext<S extends object, A extends Action> {
  /** Namespaced unctx key. */
  readonly key: string
  /**
   * Runs `fn` with `store` as the active store and returns its result.
   * Nesting `call` with a different store throws a context conflict.
   */
  call<R>(store: Store<S, A>, fn: () => R): R
  /** The active store. Throws when called outside `call` or `provide`. */
  use(): Store<S, A>
  /** The active store, or `null`. */
  tryUse(): Store<S, A> | null
  /**
   * Makes `store` the active store until `release()`. For app entry points
   * that set one store up front.
   */
  provide(store: Store<S, A>): void
  release(): void
}

export function defineStoreContext<S extends object, A extends Action>(key: string): StoreContext<S, A> {
  const namespacedKey = `fieldwise:${key}`
  const context = getContext<Store<S, A>>(namespacedKey)

  return {
    key: namespacedKey,

    call: (store, fn) => context.call(store, fn),

    use: () => {
      const store = context.tryUse() ?? null
      if (store === null) {
        throw new Error(`[fieldwise] No store in context "${namespacedKey}". Wrap the caller in call() or provide() one.`)
      }
      return store
    },

    tryUse: () => context.tryUse() ?? null,

    provide: store => {
      // `true` replaces a previous store, which hot reloads rely on
      context.set(store, true)
    },

    release: () => context.unset()
  }
}
