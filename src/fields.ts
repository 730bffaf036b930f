/**
 * Field registry
 * ==============
 *
 * A registry is the static, ordered table of tracked fields for one state
 * type: which keys exist and how two values of each key are compared. The
 * store walks it once per dispatch to decide which change channels to bump.
 *
 * Registries are built by an explicit registration step. The table passed to
 * `defineFields` must name every key of the state type, so adding a field to
 * the state without registering it is a compile error rather than a silent
 * hole in change tracking.
 *
 * @example
 * ```ts
 * interface TodoState {
 *   items: Todo[]
 *   filter: 'all' | 'done'
 *   selected: Set<string>
 * }
 *
 * const todoFields = defineFields<TodoState>({
 *   items: 'deep',
 *   filter: 'identity',
 *   selected: (a, b) => a.size === b.size && [...a].every(id => b.has(id))
 * })
 * ```
 */

import { deepEqual, shallowEqual, type EqualityFn } from './equality'
import { ConfigurationError } from './errors'

// =============================================================================
// FIELD TYPES
// =============================================================================

/** String keys of a state type; the identifiers a registry can track. */
export type FieldId<S> = keyof S & string

/**
 * How a field's old and new values are compared.
 * `true` and `'deep'` are structural, `'shallow'` compares one level,
 * `'identity'` is `Object.is`.
 */
export type ComparatorSpec<V> = true | 'deep' | 'shallow' | 'identity' | EqualityFn<V>

/** Registration table: one comparator spec per key of `S`, none missing. */
export type FieldTable<S extends object> = {
  readonly [K in FieldId<S>]-?: ComparatorSpec<S[K]>
}

export interface FieldDescriptor<S extends object, K extends FieldId<S> = FieldId<S>> {
  readonly id: K
  /** Position in the registry, stable for its lifetime. */
  readonly index: number
  get(state: S): S[K]
  equals(a: S[K], b: S[K]): boolean
  hasChanged(previous: S, next: S): boolean
}

const REGISTRY_BRAND = Symbol('fieldwise.registry')

export interface FieldRegistry<S extends object> {
  readonly [REGISTRY_BRAND]: true
  readonly size: number
  /** The ordered descriptors. Always the same frozen array. */
  fields(): readonly FieldDescriptor<S>[]
  ids(): readonly FieldId<S>[]
  has(id: PropertyKey): id is FieldId<S>
  get(id: FieldId<S>): FieldDescriptor<S> | undefined
  /** `false` for ids this registry does not know. */
  hasChanged(id: PropertyKey, previous: S, next: S): boolean
}

// =============================================================================
// REGISTRATION
// =============================================================================

function resolveComparator<V>(id: string, spec: ComparatorSpec<V>): EqualityFn<V> {
  if (spec === true || spec === 'deep') return deepEqual
  if (spec === 'shallow') return shallowEqual
  if (spec === 'identity') return Object.is
  if (typeof spec === 'function') return spec
  throw new ConfigurationError(
    `Field "${id}" has an invalid comparator ${JSON.stringify(spec)}; expected true, 'deep', 'shallow', 'identity' or a function`
  )
}

function describeField<S extends object, K extends FieldId<S>>(
  id: K,
  index: number,
  spec: ComparatorSpec<S[K]>
): FieldDescriptor<S, K> {
  const equals = resolveComparator(id, spec)
  const get = (state: S): S[K] => state[id]
  return Object.freeze({
    id,
    index,
    get,
    equals,
    hasChanged: (previous: S, next: S) => !equals(get(previous), get(next))
  })
}

/**
 * Build the field registry for a state type. Call it once, at module scope,
 * next to the state type it describes.
 *
 * @throws ConfigurationError when the table is empty or a comparator spec is
 *         not one of the accepted forms.
 */
export function defineFields<S extends object>(table: FieldTable<S>): FieldRegistry<S> {
  const ids = Object.keys(table).filter(
    (key): key is FieldId<S> => Object.prototype.hasOwnProperty.call(table, key)
  )
  if (ids.length === 0) {
    throw new ConfigurationError('A field registry needs at least one tracked field')
  }

  const descriptors = Object.freeze(ids.map((id, index) => describeField<S, FieldId<S>>(id, index, table[id])))
  const byId = new Map<string, FieldDescriptor<S>>(descriptors.map(d => [d.id, d]))
  const frozenIds = Object.freeze([...ids])

  const registry: FieldRegistry<S> = {
    [REGISTRY_BRAND]: true,
    size: descriptors.length,
    fields: () => descriptors,
    ids: () => frozenIds,
    has: (id: PropertyKey): id is FieldId<S> => typeof id === 'string' && byId.has(id),
    get: id => byId.get(id),
    hasChanged: (id, previous, next) => {
      if (typeof id !== 'string') return false
      const descriptor = byId.get(id)
      return descriptor ? descriptor.hasChanged(previous, next) : false
    }
  }
  return Object.freeze(registry)
}

export function isFieldRegistry<S extends object = object>(value: unknown): value is FieldRegistry<S> {
  return typeof value === 'object' && value !== null && REGISTRY_BRAND in value
}
