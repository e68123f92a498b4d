/**
 * Task - cooperative, poll-driven unit of deferred work
 *
 * A Task makes progress only when polled. Pending means "poll me again";
 * the task arranges for cx.wake() to be called once another poll can make
 * progress. Polling after Ready is a ProtocolViolation.
 *
 * Single-threaded by construction: nothing here spawns work on its own.
 * Dropping a task (never polling it again) is how it gets cancelled.
 */

import { ProtocolViolation, toHttpError } from './error'
import { err, ok, Pending, type PollResult, Ready, type Result } from './poll'

// ============================================================================
// Types
// ============================================================================

/**
 * Handed to every poll call
 */
export type TaskContext = {
	/** Request another poll. Safe to call more than once and after the task finished. */
	readonly wake: () => void
}

export interface Task<T> {
	poll(cx: TaskContext): PollResult<T>
}

/**
 * Anything a transform may hand back: a Task, or a promise of the value
 */
export type TaskLike<T> = Task<T> | PromiseLike<T>

export const isTask = (value: unknown): value is Task<unknown> =>
	typeof value === 'object' && value !== null && 'poll' in value && typeof value.poll === 'function'

/** Thrown by finished tasks that get polled again */
export const pollAfterReady = (name: string): never => {
	throw new ProtocolViolation(`${name} polled after it completed`)
}

// ============================================================================
// One-shot cell
// ============================================================================

/**
 * Holds a value that may be taken exactly once.
 * Used for the transforms of then/andThen/orElse.
 */
export class OneShot<T> {
	private slot: { readonly value: T } | null

	constructor(value: T) {
		this.slot = { value }
	}

	get isTaken(): boolean {
		return this.slot === null
	}

	take(): T {
		const slot = this.slot
		if (slot === null) {
			throw new ProtocolViolation('one-shot value taken twice')
		}
		this.slot = null
		return slot.value
	}
}

// ============================================================================
// Leaf tasks
// ============================================================================

/**
 * Task resolving to a precomputed result on its first poll
 */
export const resultTask = <T>(result: Result<T, unknown>): Task<T> => {
	let done = false
	return {
		poll: () => {
			if (done) return pollAfterReady('resultTask')
			done = true
			return Ready(result.ok ? result : err(toHttpError(result.error)))
		},
	}
}

/** Task resolving to `value` on its first poll */
export const ready = <T>(value: T): Task<T> => resultTask(ok(value))

/** Task failing with `error` (converted to HttpError) on its first poll */
export const failed = <T = never>(error: unknown): Task<T> => resultTask<T>(err(error))

/**
 * Task running `f` on its first poll.
 * A throw becomes the task's runtime error.
 */
export const lazyTask = <T>(f: () => T): Task<T> => {
	let done = false
	return {
		poll: () => {
			if (done) return pollAfterReady('lazyTask')
			done = true
			try {
				return Ready(ok(f()))
			} catch (error) {
				return Ready(err(toHttpError(error)))
			}
		},
	}
}

type PromiseState<T> =
	| { readonly stage: 'idle' }
	| { readonly stage: 'waiting' }
	| { readonly stage: 'settled'; readonly result: Result<T, unknown> }
	| { readonly stage: 'done' }

/**
 * Task bridging a promise into the poll protocol.
 *
 * `start` is called on the first poll, not before. The task stays Pending
 * until the promise settles, then wakes the most recent poller.
 */
export const promiseTask = <T>(start: () => PromiseLike<T>): Task<T> => {
	let state: PromiseState<T> = { stage: 'idle' }
	let wake: () => void = () => {}

	const settle = (result: Result<T, unknown>) => {
		if (state.stage !== 'waiting') return
		state = { stage: 'settled', result }
		wake()
	}

	return {
		poll: (cx) => {
			wake = cx.wake
			switch (state.stage) {
				case 'idle': {
					let promise: PromiseLike<T>
					try {
						promise = start()
					} catch (error) {
						state = { stage: 'done' }
						return Ready(err(toHttpError(error)))
					}
					state = { stage: 'waiting' }
					void promise.then(
						(value) => settle(ok(value)),
						(error: unknown) => settle(err(error))
					)
					return Pending
				}
				case 'waiting':
					return Pending
				case 'settled': {
					const { result } = state
					state = { stage: 'done' }
					return Ready(result.ok ? result : err(toHttpError(result.error)))
				}
				case 'done':
					return pollAfterReady('promiseTask')
			}
		},
	}
}

/**
 * Normalize a TaskLike into a Task
 */
export const intoTask = <T>(like: TaskLike<T>): Task<T> =>
	isTask(like) ? like : promiseTask(() => like)

/**
 * Task calling `f` on its first poll and driving whatever it returns.
 * A throw from `f` becomes the task's runtime error.
 */
export const deferTask = <T>(f: () => TaskLike<T>): Task<T> => {
	let inner: Task<T> | null = null
	let done = false
	return {
		poll: (cx) => {
			if (done) return pollAfterReady('deferTask')
			if (inner === null) {
				try {
					inner = intoTask(f())
				} catch (error) {
					done = true
					return Ready(err(toHttpError(error)))
				}
			}
			const polled = inner.poll(cx)
			if (polled.ready) done = true
			return polled
		},
	}
}
