/**
 * fieldwise Signals Module
 * ========================
 *
 * The reactive runtime the store's change channels are built on. It is a
 * small push-pull system: writes push a "maybe stale" mark down the graph,
 * and each observer pulls versions back up before deciding to re-run, so an
 * effect whose inputs ended up equal does not run at all.
 *
 * --- FEATURES ---
 * - `signal`, `computed`, `effect`, `effectScope`, `untracked`: the reactive
 *   primitive set.
 * - `startBatch` / `endBatch` / `batch`: defer effect flushing to the end of
 *   the outermost batch. The store wraps every diff in one batch.
 * - `createChannel`: a version counter cell, one per tracked store field.
 *   Reading `channel.version` inside an effect subscribes it to that field.
 */

import { getConfig } from './config';

// --- TYPE DEFINITIONS ---

interface ReactiveSource {
	/** Increments whenever the source's value changes. */
	version: number;
	observers: Set<ReactiveObserver>;
	/** Brings a lazily computed source up to date before its version is compared. */
	refresh?(): void;
	/** Called when the last observer unlinks. */
	unwatched?(): void;
}

interface ReactiveObserver {
	/** Source -> version seen when it was last read. */
	sources: Map<ReactiveSource, number>;
	notify(): void;
}

interface Disposable {
	dispose(): void;
}

interface Owner {
	children: Set<Disposable>;
}

export interface WritableSignal<T> {
	(): T;
	(value: T): void;
}

export type EffectCleanup = () => void;

/** A version counter cell. Its value carries no meaning beyond "it moved". */
export interface Channel<Id extends string = string> {
	readonly id: Id;
	/** Current counter; registers the active observer. */
	readonly version: number;
	/** Current counter without registering. */
	peek(): number;
	/** Increment by one and notify observers. Returns the new counter. */
	bump(): number;
}

// --- RUNTIME STATE ---

let activeObserver: ReactiveObserver | undefined;
let activeOwner: Owner | undefined;
let batchDepth = 0;
let flushing = false;
const pendingEffects: EffectNode[] = [];

// --- GRAPH PRIMITIVES ---

function track(source: ReactiveSource): void {
	const observer = activeObserver;
	if (observer === undefined) return;
	observer.sources.set(source, source.version);
	source.observers.add(observer);
}

function propagate(source: ReactiveSource): void {
	for (const observer of [...source.observers]) {
		observer.notify();
	}
}

function unlinkAll(observer: ReactiveObserver): void {
	for (const source of observer.sources.keys()) {
		source.observers.delete(observer);
		if (source.observers.size === 0) source.unwatched?.();
	}
	observer.sources.clear();
}

function anySourceChanged(observer: ReactiveObserver): boolean {
	for (const [source, seen] of observer.sources) {
		source.refresh?.();
		if (source.version !== seen) return true;
	}
	return false;
}

function withContext<T>(observer: ReactiveObserver | undefined, owner: Owner | undefined, fn: () => T): T {
	const prevObserver = activeObserver;
	const prevOwner = activeOwner;
	activeObserver = observer;
	activeOwner = owner;
	try {
		return fn();
	} finally {
		activeObserver = prevObserver;
		activeOwner = prevOwner;
	}
}

function disposeChildren(owner: Owner): void {
	const children = [...owner.children];
	owner.children.clear();
	for (const child of children) child.dispose();
}

// --- NODES ---

class SignalNode<T> implements ReactiveSource {
	version = 0;
	observers = new Set<ReactiveObserver>();

	constructor(public value: T) {}

	read(): T {
		track(this);
		return this.value;
	}

	write(value: T): void {
		if (Object.is(this.value, value)) return;
		this.value = value;
		this.version++;
		if (this.observers.size === 0) return;
		propagate(this);
		if (batchDepth === 0) flush();
	}
}

type Cached<T> = { readonly ready: false } | { readonly ready: true; readonly value: T };

class ComputedNode<T> implements ReactiveSource, ReactiveObserver {
	version = 0;
	observers = new Set<ReactiveObserver>();
	sources = new Map<ReactiveSource, number>();
	private cached: Cached<T> = { ready: false };
	private dirty = true;

	constructor(private readonly getter: (previousValue?: T) => T) {}

	read(): T {
		const cached = this.refresh();
		track(this);
		return cached.value;
	}

	refresh(): Extract<Cached<T>, { ready: true }> {
		const cached = this.cached;
		if (cached.ready) {
			if (!this.dirty) return cached;
			if (this.sources.size > 0 && !anySourceChanged(this)) {
				this.dirty = false;
				return cached;
			}
		}
		const previous = cached.ready ? cached.value : undefined;
		unlinkAll(this);
		const next = withContext(this, activeOwner, () => this.getter(previous));
		const updated = { ready: true, value: next } as const;
		this.cached = updated;
		this.dirty = false;
		if (!cached.ready || !Object.is(previous, next)) this.version++;
		return updated;
	}

	notify(): void {
		if (this.dirty) return;
		this.dirty = true;
		propagate(this);
	}

	unwatched(): void {
		// Nobody reads us any more: drop upstream links and recompute on next read
		unlinkAll(this);
		this.dirty = true;
	}
}

class EffectNode implements ReactiveObserver, Owner, Disposable {
	sources = new Map<ReactiveSource, number>();
	children = new Set<Disposable>();
	queued = false;
	disposed = false;
	private cleanup: EffectCleanup | undefined;

	constructor(
		private readonly fn: () => void | EffectCleanup,
		private readonly owner: Owner | undefined,
	) {
		owner?.children.add(this);
	}

	run(): void {
		this.runCleanup();
		disposeChildren(this);
		unlinkAll(this);
		const result = withContext(this, this, this.fn);
		if (typeof result === 'function') this.cleanup = result;
	}

	stale(): boolean {
		return anySourceChanged(this);
	}

	notify(): void {
		if (this.queued || this.disposed) return;
		this.queued = true;
		pendingEffects.push(this);
	}

	dispose(): void {
		if (this.disposed) return;
		this.disposed = true;
		this.owner?.children.delete(this);
		disposeChildren(this);
		unlinkAll(this);
		this.runCleanup();
	}

	private runCleanup(): void {
		const cleanup = this.cleanup;
		this.cleanup = undefined;
		cleanup?.();
	}
}

// --- SCHEDULING ---

function flush(): void {
	if (flushing) return;
	flushing = true;
	const limit = getConfig().maxFlushIterations;
	let iterations = 0;
	let firstError: unknown;
	let failed = false;
	try {
		while (pendingEffects.length > 0) {
			if (++iterations > limit) {
				for (const node of pendingEffects) node.queued = false;
				pendingEffects.length = 0;
				throw new Error(`[fieldwise] effect flush exceeded ${limit} runs; an effect is probably writing a value it reads`);
			}
			const node = pendingEffects.shift();
			if (node === undefined) break;
			node.queued = false;
			if (node.disposed || !node.stale()) continue;
			try {
				node.run();
			} catch (error) {
				if (!failed) {
					failed = true;
					firstError = error;
				}
			}
		}
	} finally {
		flushing = false;
	}
	if (failed) throw firstError;
}

// --- PUBLIC SURFACE API ---

/**
 * Starts a batching transaction. Effects notified inside the batch run once,
 * at the end of the outermost batch.
 */
export function startBatch(): void {
	++batchDepth;
}

/**
 * Ends a batching transaction. Ending the outermost batch flushes all pending
 * effects synchronously.
 */
export function endBatch(): void {
	if (batchDepth === 0) {
		throw new Error('[fieldwise] endBatch() called without a matching startBatch()');
	}
	if (--batchDepth === 0) flush();
}

/** Runs `fn` inside a batch and returns its result. */
export function batch<T>(fn: () => T): T {
	startBatch();
	try {
		return fn();
	} finally {
		endBatch();
	}
}

/**
 * Runs `fn` without registering any dependency on the active observer.
 */
export function untracked<T>(fn: () => T): T {
	return withContext(undefined, activeOwner, fn);
}

/**
 * Creates a reactive signal.
 * @returns A function that reads the value when called with no arguments and
 *          writes it when called with one.
 * @example
 * const count = signal(0);
 * count(5);
 * count(); // 5
 */
export function signal<T>(initialValue: T): WritableSignal<T> {
	const node = new SignalNode(initialValue);
	function accessor(): T;
	function accessor(value: T): void;
	function accessor(...args: [] | [T]): T | void {
		if (args.length === 0) return node.read();
		node.write(args[0]);
	}
	return accessor;
}

/**
 * Creates a cached derived value. It recomputes lazily, and only when one of
 * the values it read last time has changed.
 * @example
 * const doubled = computed(() => count() * 2);
 */
export function computed<T>(getter: (previousValue?: T) => T): () => T {
	const node = new ComputedNode(getter);
	return () => node.read();
}

/**
 * Runs `fn` now and again after anything it read changes. `fn` may return a
 * cleanup, called before the next run and on stop.
 * @returns A stop function.
 */
export function effect(fn: () => void | EffectCleanup): () => void {
	const node = new EffectNode(fn, activeOwner);
	try {
		node.run();
	} catch (error) {
		node.dispose();
		throw error;
	}
	return () => node.dispose();
}

/**
 * Collects every effect created while `fn` runs. The returned function stops
 * all of them.
 */
export function effectScope(fn: () => void): () => void {
	const parent = activeOwner;
	const scope: Owner & Disposable = {
		children: new Set(),
		dispose: () => {
			parent?.children.delete(scope);
			disposeChildren(scope);
		},
	};
	parent?.children.add(scope);
	withContext(undefined, scope, fn);
	return () => scope.dispose();
}

/**
 * Creates a change channel: a counter that observers subscribe to by reading
 * `version`.
 */
export function createChannel<Id extends string>(id: Id): Channel<Id> {
	const node = new SignalNode(0);
	return Object.freeze({
		id,
		get version() {
			return node.read();
		},
		peek: () => node.value,
		bump: () => {
			node.write(node.value + 1);
			return node.value;
		},
	});
}
