/**
 * Test helpers - hand-driven tasks and wake counters
 */

import {
	err,
	type HttpError,
	ok,
	Pending,
	pollAfterReady,
	Ready,
	type Result,
	type Task,
	type TaskContext,
} from '@sluice/core'

export const noopContext: TaskContext = { wake: () => {} }

/** Task context counting wake() calls */
export const wakeCounter = () => {
	let count = 0
	const cx: TaskContext = {
		wake: () => {
			count++
		},
	}
	return {
		cx,
		get count() {
			return count
		},
	}
}

export type Controlled<T> = {
	readonly task: Task<T>
	readonly resolve: (value: T) => void
	readonly reject: (error: HttpError) => void
	readonly polls: number
}

/**
 * Task that stays Pending until the test settles it
 */
export const controlled = <T>(): Controlled<T> => {
	let outcome: Result<T, HttpError> | null = null
	let done = false
	let polls = 0
	let wake = () => {}

	const task: Task<T> = {
		poll: (cx) => {
			polls++
			if (done) return pollAfterReady('controlled')
			wake = cx.wake
			if (outcome === null) return Pending
			done = true
			return Ready(outcome)
		},
	}

	return {
		task,
		resolve: (value) => {
			outcome = ok(value)
			wake()
		},
		reject: (error) => {
			outcome = err(error)
			wake()
		},
		get polls() {
			return polls
		},
	}
}

/** Let every pending promise callback run */
export const flush = (): Promise<void> => new Promise((resolve) => setTimeout(resolve, 0))
