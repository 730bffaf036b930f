/**
 * Counter feature: a count that can be stepped up and down, plus a trivia fact
 * about the current number fetched on demand.
 *
 * The fetch is an effect; the reducer only records that a request is pending
 * and describes the work. Whatever happens to the request, the outcome comes
 * back as a `numberFactResponse` action.
 */

import { Effect, createReducer, createStore, defineFields, type Store } from '../src'

export interface CounterState {
  count: number
  isLoading: boolean
  numberFact: string | null
}

export type CounterAction =
  | { type: 'increment' }
  | { type: 'decrement' }
  | { type: 'numberFactButtonTapped' }
  | { type: 'numberFactResponse'; fact: string }

export interface NumberFactClient {
  fetch(n: number, signal: AbortSignal): Promise<string>
}

export const FACT_FAILURE_MESSAGE = 'Failed to load fact'

export const initialCounterState: CounterState = {
  count: 0,
  isLoading: false,
  numberFact: null
}

export const counterFields = defineFields<CounterState>({
  count: 'identity',
  isLoading: 'identity',
  numberFact: 'identity'
})

export function createCounterReducer(client: NumberFactClient) {
  return createReducer<CounterState, CounterAction>({
    increment: state => [{ ...state, count: state.count + 1 }, Effect.none],

    decrement: state => [{ ...state, count: state.count - 1 }, Effect.none],

    numberFactButtonTapped: state => {
      const count = state.count
      return [
        { ...state, isLoading: true, numberFact: null },
        Effect.run<CounterAction>(async (send, { signal }) => {
          let fact: string
          try {
            fact = await client.fetch(count, signal)
          } catch {
            fact = FACT_FAILURE_MESSAGE
          }
          await send({ type: 'numberFactResponse', fact })
        })
      ]
    },

    numberFactResponse: (state, action) => [
      { ...state, isLoading: false, numberFact: action.fact },
      Effect.none
    ]
  })
}

/** Trivia from numbersapi.com over the global `fetch`. */
export const liveNumberFactClient: NumberFactClient = {
  async fetch(n, signal) {
    const response = await fetch(`http://numbersapi.com/${n}/trivia`, { signal })
    if (!response.ok) throw new Error(`numbersapi responded ${response.status}`)
    return response.text()
  }
}

export function createCounterStore(
  client: NumberFactClient = liveNumberFactClient,
  initialState: CounterState = initialCounterState
): Store<CounterState, CounterAction> {
  return createStore({
    name: 'counter',
    initialState,
    reducer: createCounterReducer(client),
    fields: counterFields
  })
}
