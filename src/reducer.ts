import { Effect } from './effect'
import { createLogger } from './logger'

const log = createLogger('reducer')

// =============================================================================
// REDUCER SYSTEM FOR ACTION-BASED STATE MANAGEMENT
// =============================================================================

/**
 * Action interface with required type property.
 */
export interface Action {
  readonly type: string
}

/**
 * What a reducer returns: the next state and the work to run afterwards.
 */
export type Reduction<S, A> = readonly [state: S, effect: Effect<A>]

/**
 * A pure transition function. Given the same state and action it returns an
 * equal state and an effect of the same kind; it never mutates `state` and
 * never performs I/O itself.
 * @template S The state type.
 * @template A The action type.
 */
export type Reducer<S, A> = (state: S, action: A) => Reduction<S, A>

/**
 * One handler per action `type`; each receives the action narrowed to its
 * variant.
 */
export type ReducerHandlers<S, A extends Action> = {
  readonly [K in A['type']]: (state: S, action: Extract<A, { type: K }>) => Reduction<S, A>
}

/**
 * Creates a reducer from action type to handler mappings.
 * The handler table must cover every variant of `A`.
 *
 * @example
 * ```ts
 * type CounterAction =
 *   | { type: 'increment' }
 *   | { type: 'add'; amount: number }
 *
 * const counterReducer = createReducer<{ count: number }, CounterAction>({
 *   increment: state => [{ count: state.count + 1 }, Effect.none],
 *   add: (state, action) => [{ count: state.count + action.amount }, Effect.none]
 * })
 * ```
 */
export function createReducer<S, A extends Action>(handlers: ReducerHandlers<S, A>): Reducer<S, A> {
  return (state: S, action: A): Reduction<S, A> => {
    const type: A['type'] = action.type
    const handler = handlers[type]
    if (typeof handler === 'function') {
      return handler(state, action as Extract<A, { type: A['type'] }>)
    }
    log.warn(`No handler for action "${action.type}"; state left unchanged`)
    return [state, Effect.none]
  }
}
