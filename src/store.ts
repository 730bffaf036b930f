/**
 * Store
 * =====
 *
 * The orchestrator: owns one feature's state, a change channel per tracked
 * field, the mailbox that serializes dispatches, and the effect tasks it has
 * started.
 *
 * Each dispatch runs four steps on the caller's stack:
 *
 * 1. take the current state as `previous`;
 * 2. run the reducer, replacing the state and capturing the effect;
 * 3. walk the field registry once, bump the channel of every field whose
 *    comparator reports a difference, inside one reactive batch so observers
 *    only ever see the fully applied diff;
 * 4. evaluate the effect: `none` is done, `run` starts a task on the microtask
 *    queue with a send handle bound back to this store.
 *
 * Observers subscribe by calling `read(field)` inside a reactive `effect` or
 * `computed`; they re-run only when that field's channel moves.
 */

import { getConfig } from './config'
import type { Effect, EffectContext, EffectOperation } from './effect'
import { ConfigurationError } from './errors'
import { isFieldRegistry, type FieldId, type FieldRegistry } from './fields'
import { createLogger, type Logger } from './logger'
import { Mailbox } from './mailbox'
import type { Action, Reducer } from './reducer'
import { createSend } from './send'
import { createChannel, effect, endBatch, startBatch, untracked, type Channel } from './signals'

// =============================================================================
// STORE TYPES
// =============================================================================

export interface StoreOptions<A> {
  /** Shown in log lines and `debug()`. Defaults to `store-<n>`. */
  name?: string
  /** Overrides `configure({ devMode })` for this store. */
  devMode?: boolean
  /**
   * Called when an effect operation throws or rejects. The error is logged
   * either way; it never reaches `dispatch`.
   * @param action The action whose reduction produced the failing effect.
   */
  onEffectError?: (error: unknown, action: A) => void
}

export interface StoreConfig<S extends object, A extends Action> extends StoreOptions<A> {
  initialState: S
  reducer: Reducer<S, A>
  fields: FieldRegistry<S>
}

/** The observable half of a channel. */
export type ReadonlyChannel<Id extends string = string> = Pick<Channel<Id>, 'id' | 'version' | 'peek'>

/**
 * Deep readonly type for state handed out by the store.
 */
export type DeepReadonly<T> = T extends (infer R)[]
  ? ReadonlyArray<DeepReadonly<R>>
  : T extends object
    ? { readonly [K in keyof T]: DeepReadonly<T[K]> }
    : T

export interface StoreDebugInfo<S> {
  name: string
  state: DeepReadonly<S>
  versions: Readonly<Record<string, number>>
  dispatchCount: number
  inFlight: number
  /** Milliseconds spent in the last reducer + diff + notify pass. */
  lastDispatchDuration: number
}

// =============================================================================
// DEV MODE HELPERS
// =============================================================================

function deepFreeze<T>(value: T): T {
  if (typeof value !== 'object' || value === null || Object.isFrozen(value)) return value
  // Map, Set and class instances keep their own mutation rules
  if (Array.isArray(value)) {
    Object.freeze(value)
    value.forEach(deepFreeze)
    return value
  }
  const proto: unknown = Object.getPrototypeOf(value)
  if (proto !== Object.prototype && proto !== null) return value
  Object.freeze(value)
  for (const member of Object.values(value)) deepFreeze(member)
  return value
}

/** The same value, typed as read-only for callers outside the store. */
function readonlyView<T>(value: T): DeepReadonly<T>
function readonlyView(value: unknown): unknown {
  return value
}

// =============================================================================
// IMPLEMENTATION: STORE
// =============================================================================

let storeCounter = 0

/**
 * @template S The state type; its fields are listed in a registry from
 *             `defineFields`.
 * @template A The action union.
 *
 * @example
 * ```ts
 * const store = new Store({ count: 0 }, counterReducer, counterFields)
 *
 * effect(() => {
 *   label.textContent = String(store.read('count'))
 * })
 *
 * store.dispatch({ type: 'increment' })
 * ```
 */
export class Store<S extends object, A extends Action> {
  readonly name: string
  readonly fields: FieldRegistry<S>

  private state: S
  private readonly reducer: Reducer<S, A>
  private readonly channels: ReadonlyMap<string, Channel<FieldId<S>>>
  private readonly mailbox: Mailbox<A>
  private readonly tasks = new Set<Promise<void>>()
  private readonly abort = new AbortController()
  private readonly subscriptions = new Set<() => void>()
  private readonly devMode: boolean
  private readonly onEffectError: ((error: unknown, action: A) => void) | undefined
  private readonly log: Logger
  private destroyed = false
  private dispatchCount = 0
  private lastDispatchDuration = 0

  constructor(initialState: S, reducer: Reducer<S, A>, fields: FieldRegistry<S>, options: StoreOptions<A> = {}) {
    this.name = options.name ?? `store-${++storeCounter}`

    if (!isFieldRegistry<S>(fields)) {
      throw new ConfigurationError(`Store "${this.name}" needs a field registry created with defineFields()`)
    }
    if (typeof reducer !== 'function') {
      throw new ConfigurationError(`Store "${this.name}" needs a reducer function`)
    }
    if (typeof initialState !== 'object' || initialState === null) {
      throw new ConfigurationError(`Store "${this.name}" needs an object as its initial state`)
    }

    this.fields = fields
    this.reducer = reducer
    this.devMode = options.devMode ?? getConfig().devMode
    this.onEffectError = options.onEffectError
    this.log = createLogger(this.name)
    this.channels = new Map<string, Channel<FieldId<S>>>(fields.fields().map(field => [field.id, createChannel(field.id)]))
    this.mailbox = new Mailbox<A>(
      action => this.process(action),
      (error, action) => this.log.error(`queued action "${action.type}" failed`, error)
    )
    this.state = this.devMode ? deepFreeze(initialState) : initialState

    if (this.devMode) {
      const untrackedKeys = Object.keys(initialState).filter(key => !fields.has(key))
      if (untrackedKeys.length > 0) {
        this.log.warn(`state keys missing from the field registry: ${untrackedKeys.join(', ')}`)
      }
    }
  }

  get isDestroyed(): boolean {
    return this.destroyed
  }

  /** Number of effect operations currently running. */
  get inFlight(): number {
    return this.tasks.size
  }

  // ---------------------------------------------------------------------------
  // Dispatch
  // ---------------------------------------------------------------------------

  /**
   * Runs the reducer, notifies the changed fields and starts the effect.
   * Called while another dispatch is in progress, the action is queued and
   * runs right after it.
   */
  dispatch(action: A): void {
    if (this.destroyed) {
      this.log.warn(`dispatch("${action.type}") ignored: store is destroyed`)
      return
    }
    this.mailbox.enqueue(this.devMode ? deepFreeze(action) : action)
  }

  private process(action: A): void {
    if (this.destroyed) return
    const started = performance.now()

    const previous = this.state
    const [next, effectToRun] = this.reducer(previous, action)
    this.state = this.devMode ? deepFreeze(next) : next

    const changed = this.notifyChanges(previous, this.state)
    // an observer may have torn the store down
    if (this.destroyed) return

    this.dispatchCount++
    this.lastDispatchDuration = performance.now() - started
    if (this.devMode) {
      this.log.debug(`${action.type} changed [${changed.join(', ')}] in ${this.lastDispatchDuration.toFixed(2)}ms`)
    }

    this.runEffect(effectToRun, action)
  }

  private notifyChanges(previous: S, next: S): FieldId<S>[] {
    const changed: FieldId<S>[] = []
    for (const field of this.fields.fields()) {
      if (field.hasChanged(previous, next)) changed.push(field.id)
    }
    if (changed.length === 0) return changed

    startBatch()
    for (const id of changed) this.channels.get(id)?.bump()
    try {
      endBatch()
    } catch (error) {
      this.log.error('an observer threw while reacting to a change', error)
    }
    return changed
  }

  // ---------------------------------------------------------------------------
  // Effects
  // ---------------------------------------------------------------------------

  private runEffect(effectToRun: Effect<A>, action: A): void {
    switch (effectToRun.kind) {
      case 'none':
        return
      case 'run':
        this.spawn(effectToRun.operation, action)
        return
      default: {
        const unknownEffect: never = effectToRun
        throw new Error(`[fieldwise] unknown effect ${JSON.stringify(unknownEffect)}`)
      }
    }
  }

  private spawn(operation: EffectOperation<A>, action: A): void {
    const context: EffectContext = { signal: this.abort.signal, storeName: this.name }
    const send = createSend(this.mailbox)
    // An operation that never settles must not keep the store reachable
    const owner = new WeakRef<Store<S, A>>(this)

    const task: Promise<void> = Promise.resolve()
      .then(() => operation(send, context))
      .catch((error: unknown) => owner.deref()?.reportEffectError(error, action))
      .finally(() => {
        owner.deref()?.tasks.delete(task)
      })
    this.tasks.add(task)
  }

  private reportEffectError(error: unknown, action: A): void {
    this.log.error(`effect started by "${action.type}" failed`, error)
    if (this.onEffectError === undefined) return
    try {
      this.onEffectError(error, action)
    } catch (handlerError) {
      this.log.error('onEffectError handler threw', handlerError)
    }
  }

  /**
   * Resolves once no effect is running and no action is waiting. Effects that
   * never finish keep it pending until `destroy()`.
   */
  async idle(): Promise<void> {
    while (!this.destroyed) {
      if (this.tasks.size > 0) {
        await Promise.all([...this.tasks])
        continue
      }
      // One more turn lets sends queued by the last task land
      await new Promise<void>(resolve => queueMicrotask(resolve))
      // The mailbox drains on the stack that fills it, so no task means no work
      if (this.tasks.size === 0) return
    }
  }

  // ---------------------------------------------------------------------------
  // Reads
  // ---------------------------------------------------------------------------

  /**
   * Current value of one field. Inside a reactive `effect` or `computed` this
   * also subscribes the caller to that field, and only that field.
   */
  read<K extends FieldId<S>>(id: K): DeepReadonly<S[K]> {
    const channel = this.channels.get(id)
    if (channel !== undefined) {
      // reading the version registers the active observer
      channel.version
    } else if (this.devMode) {
      this.log.warn(`read("${id}"): field is not in the registry and will not be observed`)
    }
    return readonlyView(this.state[id])
  }

  /**
   * The whole state. Inside a reactive context this subscribes the caller to
   * every field, so it re-runs on any change; prefer `read` for observers.
   */
  snapshot(): DeepReadonly<S> {
    for (const channel of this.channels.values()) {
      channel.version
    }
    return readonlyView(this.state)
  }

  /** The whole state, without subscribing. */
  peek(): DeepReadonly<S> {
    return readonlyView(this.state)
  }

  /** A field's change counter, without subscribing. `0` for unknown ids. */
  version(id: FieldId<S>): number {
    return this.channels.get(id)?.peek() ?? 0
  }

  channel<K extends FieldId<S>>(id: K): ReadonlyChannel<K> {
    const channel = this.channels.get(id)
    if (channel === undefined) {
      throw new ConfigurationError(`Store "${this.name}" has no channel for field "${id}"`)
    }
    return Object.freeze({
      id,
      get version() {
        return channel.version
      },
      peek: () => channel.peek()
    })
  }

  /**
   * Calls `listener` after every dispatch that changed `id`.
   * @returns An unsubscribe function.
   */
  onChange<K extends FieldId<S>>(
    id: K,
    listener: (current: DeepReadonly<S[K]>, previous: DeepReadonly<S[K]>) => void
  ): () => void {
    const channel = this.channels.get(id)
    if (channel === undefined) {
      throw new ConfigurationError(`Store "${this.name}" has no channel for field "${id}"`)
    }
    if (this.destroyed) return () => {}

    let previous = this.state[id]
    let primed = false
    const stop = effect(() => {
      channel.version
      if (!primed) {
        primed = true
        return
      }
      const current = this.state[id]
      const before = previous
      previous = current
      untracked(() => listener(readonlyView(current), readonlyView(before)))
    })

    const unsubscribe = (): void => {
      stop()
      this.subscriptions.delete(unsubscribe)
    }
    this.subscriptions.add(unsubscribe)
    return unsubscribe
  }

  // ---------------------------------------------------------------------------
  // Lifecycle
  // ---------------------------------------------------------------------------

  debug(): StoreDebugInfo<S> {
    const versions: Record<string, number> = {}
    for (const [id, channel] of this.channels) versions[id] = channel.peek()
    return {
      name: this.name,
      state: readonlyView(this.state),
      versions,
      dispatchCount: this.dispatchCount,
      inFlight: this.tasks.size,
      lastDispatchDuration: this.lastDispatchDuration
    }
  }

  /**
   * Tears the store down: pending actions are dropped, running effects see
   * their abort signal fire, `onChange` listeners are removed, and every send
   * handle issued so far becomes a no-op. Safe to call twice.
   */
  destroy(): void {
    if (this.destroyed) return
    this.destroyed = true
    this.mailbox.close()
    this.tasks.clear()
    for (const unsubscribe of [...this.subscriptions]) unsubscribe()
    this.abort.abort()
    this.log.debug('destroyed')
  }
}

/**
 * Object-style constructor.
 *
 * @example
 * ```ts
 * const store = createStore({
 *   name: 'counter',
 *   initialState: { count: 0 },
 *   reducer: counterReducer,
 *   fields: counterFields
 * })
 * ```
 */
export function createStore<S extends object, A extends Action>(config: StoreConfig<S, A>): Store<S, A> {
  const { initialState, reducer, fields, ...options } = config
  return new Store(initialState, reducer, fields, options)
}
