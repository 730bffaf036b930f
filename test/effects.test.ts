import { describe, it, expect, vi, afterEach, type Mock } from 'vitest'
import { Store } from '../src/store'
import { createReducer } from '../src/reducer'
import { Effect, type EffectContext } from '../src/effect'
import { createSend, type Send, type SendTarget } from '../src/send'
import { defineFields } from '../src/fields'
import { effect } from '../src/signals'

interface LoaderState {
  isLoading: boolean
  value: string | null
  log: string[]
}

type LoaderAction =
  | { type: 'load' }
  | { type: 'loaded'; value: string }
  | { type: 'note'; entry: string }

const loaderFields = defineFields<LoaderState>({
  isLoading: 'identity',
  value: 'identity',
  log: 'shallow'
})

function deferred<T>() {
  let resolve: (value: T) => void = () => {}
  const promise = new Promise<T>(done => {
    resolve = done
  })
  return { promise, resolve }
}

function createLoader(
  operation: (send: Send<LoaderAction>, context: EffectContext) => void | Promise<void>,
  onEffectError?: (error: unknown, action: LoaderAction) => void
) {
  const reducer = createReducer<LoaderState, LoaderAction>({
    load: state => [{ ...state, isLoading: true }, Effect.run(operation)],
    loaded: (state, action) => [{ ...state, isLoading: false, value: action.value }, Effect.none],
    note: (state, action) => [{ ...state, log: [...state.log, action.entry] }, Effect.none]
  })
  return new Store<LoaderState, LoaderAction>(
    { isLoading: false, value: null, log: [] },
    reducer,
    loaderFields,
    { name: 'loader', onEffectError }
  )
}

afterEach(() => {
  vi.restoreAllMocks()
})

describe('Effects', () => {
  describe('Effect', () => {
    it('should describe no work or one operation', () => {
      const operation = vi.fn()
      const run = Effect.run(operation)

      expect(Effect.none.kind).toBe('none')
      expect(Effect.isNone(Effect.none)).toBe(true)
      expect(run.kind).toBe('run')
      expect(run.operation).toBe(operation)
      expect(Effect.isNone(run)).toBe(false)
      expect(Object.isFrozen(run)).toBe(true)
    })
  })

  describe('running effects', () => {
    it('should start the operation after dispatch returns', async () => {
      const operation = vi.fn()
      const store = createLoader(operation)

      store.dispatch({ type: 'load' })
      expect(operation).not.toHaveBeenCalled()
      expect(store.inFlight).toBe(1)

      await store.idle()
      expect(operation).toHaveBeenCalledTimes(1)
      expect(operation.mock.calls[0]?.[1]).toMatchObject({ storeName: 'loader' })
      expect(store.inFlight).toBe(0)
    })

    it('should not start anything for Effect.none', () => {
      const store = createLoader(vi.fn())

      store.dispatch({ type: 'note', entry: 'a' })

      expect(store.inFlight).toBe(0)
    })

    it('should deliver the result of async work as a later dispatch', async () => {
      const response = deferred<string>()
      const store = createLoader(async send => {
        await send({ type: 'loaded', value: await response.promise })
      })
      const loading: boolean[] = []
      effect(() => {
        loading.push(store.read('isLoading'))
      })

      store.dispatch({ type: 'load' })
      expect(store.peek()).toEqual({ isLoading: true, value: null, log: [] })

      response.resolve('42 is the answer')
      await store.idle()

      expect(store.peek()).toEqual({ isLoading: false, value: '42 is the answer', log: [] })
      expect(loading).toEqual([false, true, false])
      expect(store.version('value')).toBe(1)
      expect(store.version('isLoading')).toBe(2)
      expect(store.version('log')).toBe(0)
    })

    it('should apply an effect’s sends in the order it made them', async () => {
      const store = createLoader(send => {
        void send({ type: 'note', entry: 'first' })
        void send({ type: 'note', entry: 'second' })
        void send({ type: 'note', entry: 'third' })
      })

      store.dispatch({ type: 'load' })
      await store.idle()

      expect(store.peek().log).toEqual(['first', 'second', 'third'])
    })

    it('should finish one sent action, nested dispatches included, before the next', async () => {
      const store = createLoader(send => {
        void send({ type: 'loaded', value: 'A' })
        void send({ type: 'note', entry: 'B' })
      })
      effect(() => {
        if (store.read('value') === 'A') store.dispatch({ type: 'note', entry: 'after A' })
      })

      store.dispatch({ type: 'load' })
      await store.idle()

      expect(store.peek().log).toEqual(['after A', 'B'])
    })

    it('should run main-context dispatches before the effect they follow', async () => {
      const store = createLoader(async send => {
        await send({ type: 'note', entry: 'from effect' })
      })

      store.dispatch({ type: 'load' })
      store.dispatch({ type: 'note', entry: 'from main' })
      await store.idle()

      expect(store.peek().log).toEqual(['from main', 'from effect'])
    })

    it('should wait in idle() for effects started by other effects', async () => {
      const reducer = createReducer<LoaderState, LoaderAction>({
        load: state => [
          { ...state, isLoading: true },
          Effect.run<LoaderAction>(async send => {
            await send({ type: 'loaded', value: 'step one' })
          })
        ],
        loaded: (state, action) => [
          { ...state, isLoading: false, value: action.value },
          Effect.run<LoaderAction>(async send => {
            await send({ type: 'note', entry: 'step two' })
          })
        ],
        note: (state, action) => [{ ...state, log: [...state.log, action.entry] }, Effect.none]
      })
      const store = new Store<LoaderState, LoaderAction>(
        { isLoading: false, value: null, log: [] },
        reducer,
        loaderFields
      )

      store.dispatch({ type: 'load' })
      await store.idle()

      expect(store.peek()).toEqual({ isLoading: false, value: 'step one', log: ['step two'] })
      expect(store.inFlight).toBe(0)
    })
  })

  describe('effect failures', () => {
    it('should log a rejected operation and report it to onEffectError', async () => {
      const error = vi.spyOn(console, 'error').mockImplementation(() => {})
      const failure = new Error('network down')
      const onEffectError = vi.fn()
      const store = createLoader(async () => {
        throw failure
      }, onEffectError)

      expect(() => store.dispatch({ type: 'load' })).not.toThrow()
      await store.idle()

      expect(onEffectError).toHaveBeenCalledWith(failure, { type: 'load' })
      expect(error).toHaveBeenCalledWith('[fieldwise:loader] effect started by "load" failed', failure)
      expect(store.peek().isLoading).toBe(true)
    })

    it('should treat a synchronous throw the same way', async () => {
      vi.spyOn(console, 'error').mockImplementation(() => {})
      const failure = new Error('bad input')
      const onEffectError = vi.fn()
      const store = createLoader(() => {
        throw failure
      }, onEffectError)

      store.dispatch({ type: 'load' })
      await store.idle()

      expect(onEffectError).toHaveBeenCalledWith(failure, { type: 'load' })
    })

    it('should log an onEffectError handler that throws', async () => {
      const error = vi.spyOn(console, 'error').mockImplementation(() => {})
      const handlerFailure = new Error('handler broke')
      const store = createLoader(
        () => {
          throw new Error('effect broke')
        },
        () => {
          throw handlerFailure
        }
      )

      store.dispatch({ type: 'load' })
      await store.idle()

      expect(error).toHaveBeenCalledWith('[fieldwise:loader] onEffectError handler threw', handlerFailure)
    })
  })

  describe('teardown', () => {
    it('should make a kept send handle a no-op after destroy', async () => {
      const kept: Send<LoaderAction>[] = []
      const store = createLoader(send => {
        kept.push(send)
      })

      store.dispatch({ type: 'load' })
      await store.idle()
      const [send] = kept
      expect(send?.isActive()).toBe(true)

      store.destroy()

      expect(send?.isActive()).toBe(false)
      await expect(send?.({ type: 'loaded', value: 'late' })).resolves.toBeUndefined()
      expect(store.peek()).toEqual({ isLoading: true, value: null, log: [] })
    })

    it('should abort in-flight effects and drop their results', async () => {
      const response = deferred<string>()
      const signals: AbortSignal[] = []
      const store = createLoader(async (send, { signal }) => {
        signals.push(signal)
        const value = await response.promise
        await send({ type: 'loaded', value })
      })

      store.dispatch({ type: 'load' })
      await Promise.resolve()
      expect(signals).toHaveLength(1)
      expect(signals[0]?.aborted).toBe(false)

      store.destroy()
      expect(signals[0]?.aborted).toBe(true)
      expect(store.inFlight).toBe(0)

      response.resolve('too late')
      await new Promise(resolve => setTimeout(resolve, 0))
      expect(store.peek()).toEqual({ isLoading: true, value: null, log: [] })
    })

    it('should not start the effect of a dispatch whose observer destroyed the store', async () => {
      const operation = vi.fn()
      const store = createLoader(operation)
      effect(() => {
        if (store.read('isLoading')) store.destroy()
      })

      store.dispatch({ type: 'load' })
      await Promise.resolve()
      await Promise.resolve()

      expect(store.isDestroyed).toBe(true)
      expect(store.peek().isLoading).toBe(true)
      expect(store.inFlight).toBe(0)
      expect(operation).not.toHaveBeenCalled()
    })

    it('should resolve idle() immediately once destroyed', async () => {
      const store = createLoader(() => new Promise<void>(() => {}))

      store.dispatch({ type: 'load' })
      store.destroy()

      await expect(store.idle()).resolves.toBeUndefined()
    })
  })

  describe('createSend', () => {
    interface FakeTarget extends SendTarget<LoaderAction> {
      isDestroyed: boolean
      enqueue: Mock<[LoaderAction], void>
    }

    function createTarget(): FakeTarget {
      return { isDestroyed: false, enqueue: vi.fn<[LoaderAction], void>() }
    }

    it('should deliver on the microtask queue, not synchronously', async () => {
      const target = createTarget()
      const send = createSend(target)

      const delivered = send({ type: 'note', entry: 'x' })
      expect(target.enqueue).not.toHaveBeenCalled()

      await delivered
      expect(target.enqueue).toHaveBeenCalledWith({ type: 'note', entry: 'x' })
    })

    it('should skip delivery once the target is destroyed', async () => {
      const target = createTarget()
      const send = createSend(target)
      target.isDestroyed = true

      await send({ type: 'note', entry: 'x' })

      expect(target.enqueue).not.toHaveBeenCalled()
      expect(send.isActive()).toBe(false)
    })

    it('should reject when delivery throws', async () => {
      const target = createTarget()
      target.enqueue.mockImplementation(() => {
        throw new Error('reducer failed')
      })
      const send = createSend(target)

      await expect(send({ type: 'note', entry: 'x' })).rejects.toThrow('reducer failed')
    })
  })
})
