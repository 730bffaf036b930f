import type { Send } from './send'

/**
 * What an effect operation receives besides `send`.
 */
export interface EffectContext {
  /** Aborted when the owning store is destroyed. */
  readonly signal: AbortSignal
  /** The owning store's name, for logs. */
  readonly storeName: string
}

/**
 * Asynchronous work started after a state transition. It reports back only by
 * sending actions; failures should be caught and sent as actions too.
 */
export type EffectOperation<A> = (send: Send<A>, context: EffectContext) => void | Promise<void>

export interface NoEffect {
  readonly kind: 'none'
}

export interface RunEffect<A> {
  readonly kind: 'run'
  readonly operation: EffectOperation<A>
}

/**
 * The second half of a reducer's result: either nothing more to do, or one
 * operation for the store to run off the dispatch path.
 */
export type Effect<A> = NoEffect | RunEffect<A>

const NONE: NoEffect = Object.freeze({ kind: 'none' })

export const Effect = {
  none: NONE,

  /**
   * @example
   * ```ts
   * case 'fetchTapped':
   *   return [{ ...state, isLoading: true }, Effect.run(async send => {
   *     try {
   *       await send({ type: 'loaded', fact: await api.fact(state.count) })
   *     } catch (error) {
   *       await send({ type: 'failed', message: String(error) })
   *     }
   *   })]
   * ```
   */
  run<A>(operation: EffectOperation<A>): RunEffect<A> {
    return Object.freeze({ kind: 'run', operation })
  },

  isNone<A>(effect: Effect<A>): effect is NoEffect {
    return effect.kind === 'none'
  }
} as const
