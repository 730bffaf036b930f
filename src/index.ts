/**
 * fieldwise: Fine-Grained Change Tracking for Reducer Stores
 * ==========================================================
 *
 * A single-owner store driven by a pure reducer, with change notification at
 * the granularity of individual state fields. Features:
 *
 * - Reducers return the next state together with an effect description
 * - Effects run off the dispatch path and report back through a weak send handle
 * - Per-field change channels bumped only when a field's comparator says so
 * - Observers subscribe by reading, through a push-pull reactive runtime
 * - Serialized dispatch, including dispatches made from observers and effects
 *
 * The lit-html bindings live in `fieldwise/lit`.
 *
 * @license MIT
 */

// =============================================================================
// EXPORTS
// =============================================================================

export { Store, createStore } from './store'
export type { StoreOptions, StoreConfig, StoreDebugInfo, ReadonlyChannel, DeepReadonly } from './store'

export { createReducer } from './reducer'
export type { Action, Reducer, Reduction, ReducerHandlers } from './reducer'

export { Effect } from './effect'
export type { EffectContext, EffectOperation, NoEffect, RunEffect } from './effect'

export { createSend } from './send'
export type { Send, SendTarget } from './send'

export { defineFields, isFieldRegistry } from './fields'
export type { ComparatorSpec, FieldDescriptor, FieldId, FieldRegistry, FieldTable } from './fields'

export { shallowEqual, deepEqual } from './equality'
export type { EqualityFn } from './equality'

export { bindAccessors } from './accessors'
export type { StoreAccessors } from './accessors'

export { defineStoreContext } from './context'
export type { StoreContext } from './context'

export {
  batch,
  computed,
  createChannel,
  effect,
  effectScope,
  endBatch,
  signal,
  startBatch,
  untracked
} from './signals'
export type { Channel, EffectCleanup, WritableSignal } from './signals'

export { configure, getConfig, resetConfig } from './config'
export type { FieldwiseConfig, LogLevel } from './config'

export { createLogger } from './logger'
export type { Logger } from './logger'

export { ConfigurationError } from './errors'
