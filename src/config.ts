/**
 * Process-wide defaults. Stores read these at construction time; per-store
 * options win over them.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent'

export interface FieldwiseConfig {
  /** Lowest level the console logger prints. */
  logLevel: LogLevel
  /** Freeze states and actions, log every dispatch at `debug`. */
  devMode: boolean
  /** Upper bound on effect runs in one flush before it is treated as a cycle. */
  maxFlushIterations: number
}

const DEFAULT_CONFIG: Readonly<FieldwiseConfig> = Object.freeze({
  logLevel: 'warn',
  devMode: false,
  maxFlushIterations: 10_000
})

let current: FieldwiseConfig = { ...DEFAULT_CONFIG }

/**
 * Merge `partial` into the active configuration.
 *
 * @example
 * ```ts
 * configure({ devMode: true, logLevel: 'debug' })
 * ```
 */
export function configure(partial: Partial<FieldwiseConfig>): Readonly<FieldwiseConfig> {
  if (partial.maxFlushIterations !== undefined && !(partial.maxFlushIterations >= 1)) {
    throw new RangeError(`[fieldwise] maxFlushIterations must be >= 1, got ${partial.maxFlushIterations}`)
  }
  current = { ...current, ...partial }
  return current
}

export function getConfig(): Readonly<FieldwiseConfig> {
  return current
}

export function resetConfig(): void {
  current = { ...DEFAULT_CONFIG }
}
