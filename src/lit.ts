/**
 * Lit-HTML Integration Module
 * ===========================
 *
 * Binds lit-html templates to a store. The template runs inside a reactive
 * effect, so a view re-renders only when a field it `read`s changes; fields it
 * never touches can change freely without a render.
 *
 * Kept out of the main entry point because lit-html expects a DOM; import it
 * from `fieldwise/lit`.
 */

import { html, render, type SVGTemplateResult, type TemplateResult } from 'lit-html'

import { createLogger } from './logger'
import type { Action } from './reducer'
import { effect, untracked } from './signals'
import type { Store } from './store'

const log = createLogger('lit')

// =============================================================================
// CORE VIEW TYPES
// =============================================================================

/**
 * Template function that receives the store and returns a lit-html template.
 * Read state through `store.read(field)` to subscribe field by field.
 */
export type TemplateFunction<S extends object, A extends Action> = (
  store: Store<S, A>
) => TemplateResult | SVGTemplateResult

/**
 * View instance with lifecycle management
 */
export interface View<S extends object, A extends Action> {
  readonly store: Store<S, A>
  readonly container: HTMLElement
  readonly mounted: boolean
  /** Renders so far, the initial one included. */
  readonly renderCount: number
  /** Re-renders now, without changing subscriptions. */
  render(): void
  /** Stops reacting and clears the container. */
  destroy(): void
}

// =============================================================================
// REACTIVE VIEW BINDING
// =============================================================================

/**
 * Create a reactive view that renders immediately and re-renders when a field
 * the template read changes.
 *
 * @example
 * ```ts
 * const view = createView(store, document.body, s => html`
 *   <span>${s.read('count')}</span>
 *   <button @click=${sendOn(s, () => ({ type: 'increment' }))}>+</button>
 * `)
 * ```
 */
export function createView<S extends object, A extends Action>(
  store: Store<S, A>,
  container: HTMLElement,
  template: TemplateFunction<S, A>
): View<S, A> {
  let isMounted = false
  let isDestroyed = false
  let renderCount = 0

  const renderView = (): void => {
    if (isDestroyed) return
    try {
      render(template(store), container)
    } catch (error) {
      log.error(`error rendering view for "${store.name}"`, error)
      render(html`<div class="fieldwise-error" style="color: red;">Render Error: ${String(error)}</div>`, container)
    }
    renderCount++
    isMounted = true
  }

  const stop = effect(renderView)

  return {
    store,
    container,

    get mounted() {
      return isMounted
    },

    get renderCount() {
      return renderCount
    },

    render: () => untracked(renderView),

    destroy: () => {
      if (isDestroyed) return
      isDestroyed = true
      isMounted = false
      stop()
      render(html``, container)
    }
  }
}

/**
 * Event-listener helper: maps a DOM event to an action and dispatches it.
 * Returning `undefined` from `toAction` skips the dispatch.
 *
 * @example
 * ```ts
 * html`<input @input=${sendOn(store, (e: InputEvent) => ({
 *   type: 'rename',
 *   name: e.target instanceof HTMLInputElement ? e.target.value : ''
 * }))} />`
 * ```
 */
export function sendOn<S extends object, A extends Action, E extends Event = Event>(
  store: Store<S, A>,
  toAction: (event: E) => A | undefined
): (event: E) => void {
  return event => {
    const action = toAction(event)
    if (action !== undefined) store.dispatch(action)
  }
}
