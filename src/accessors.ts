import type { FieldId } from './fields'
import type { Action } from './reducer'
import type { DeepReadonly, Store } from './store'

/**
 * One read-only property per registered field.
 */
export type StoreAccessors<S extends object> = {
  readonly [K in FieldId<S>]: DeepReadonly<S[K]>
}

/**
 * Generates a typed getter for every field in the store's registry, so view
 * code can write `counter.count` instead of `store.read('count')`. Each getter
 * goes through `read`, so property access inside an effect subscribes to that
 * field alone.
 *
 * @example
 * ```ts
 * const counter = bindAccessors(store)
 * effect(() => {
 *   label.textContent = `${counter.count}`
 * })
 * ```
 */
export function bindAccessors<S extends object, A extends Action>(store: Store<S, A>): StoreAccessors<S> {
  const accessors = {}
  for (const id of store.fields.ids()) {
    Object.defineProperty(accessors, id, {
      enumerable: true,
      get: () => store.read(id)
    })
  }
  return Object.freeze(accessors) as StoreAccessors<S>
}
