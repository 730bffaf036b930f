/**
 * Equality checks used by field comparators.
 */

// =============================================================================
// EQUALITY TYPES
// =============================================================================

/**
 * Equality comparison function type.
 */
export type EqualityFn<T = unknown> = (a: T, b: T) => boolean

// =============================================================================
// EQUALITY CHECKING
// =============================================================================

function isPlainObject(value: unknown): value is Record<string, unknown> {
  if (typeof value !== 'object' || value === null) return false
  const proto: unknown = Object.getPrototypeOf(value)
  return proto === Object.prototype || proto === null
}

/**
 * A shallow equality check for arrays and plain objects.
 * Compares length or key sets and then members by `Object.is`.
 */
export function shallowEqual(a: unknown, b: unknown): boolean {
  if (Object.is(a, b)) return true

  if (Array.isArray(a) && Array.isArray(b)) {
    if (a.length !== b.length) return false
    for (let i = 0; i < a.length; i++) {
      if (!Object.is(a[i], b[i])) return false
    }
    return true
  }

  if (isPlainObject(a) && isPlainObject(b)) {
    const keysA = Object.keys(a)
    if (keysA.length !== Object.keys(b).length) return false
    for (const key of keysA) {
      if (!Object.prototype.hasOwnProperty.call(b, key) || !Object.is(a[key], b[key])) return false
    }
    return true
  }

  return false
}

/**
 * A deep structural equality check.
 * Recurses through arrays, `Map`, `Set` and objects; compares `Date` by
 * timestamp and primitives by `Object.is`. Two objects, class instances
 * included, are equal when they share a prototype and their own enumerable
 * keys hold deeply equal values.
 */
export function deepEqual(a: unknown, b: unknown): boolean {
  if (Object.is(a, b)) return true
  if (typeof a !== 'object' || typeof b !== 'object' || a === null || b === null) return false

  if (Array.isArray(a) || Array.isArray(b)) {
    if (!Array.isArray(a) || !Array.isArray(b) || a.length !== b.length) return false
    for (let i = 0; i < a.length; i++) {
      if (!deepEqual(a[i], b[i])) return false
    }
    return true
  }

  if (a instanceof Date || b instanceof Date) {
    return a instanceof Date && b instanceof Date && a.getTime() === b.getTime()
  }

  if (a instanceof Map || b instanceof Map) {
    if (!(a instanceof Map) || !(b instanceof Map) || a.size !== b.size) return false
    for (const [key, value] of a) {
      if (!b.has(key) || !deepEqual(value, b.get(key))) return false
    }
    return true
  }

  // Set members are matched by identity, as Set itself does
  if (a instanceof Set || b instanceof Set) {
    if (!(a instanceof Set) || !(b instanceof Set) || a.size !== b.size) return false
    for (const member of a) {
      if (!b.has(member)) return false
    }
    return true
  }

  // Plain objects and class instances alike: same prototype, then own keys
  if (Object.getPrototypeOf(a) !== Object.getPrototypeOf(b)) return false
  const entriesA = Object.entries(a)
  const entriesB = new Map<string, unknown>(Object.entries(b))
  if (entriesA.length !== entriesB.size) return false
  for (const [key, value] of entriesA) {
    if (!entriesB.has(key) || !deepEqual(value, entriesB.get(key))) return false
  }
  return true
}
