/**
 * Chaining combinators
 *
 * thenTask / andThenTask / orElseTask are three-state machines:
 *   first  - driving the inner task, transform still unused
 *   second - driving the task the transform produced
 *   done
 * The transform lives in a OneShot and is consumed on the first -> second move.
 */

import { type HttpError, toHttpError } from './error'
import { err, ok, Pending, type PollResult, Ready, type Result } from './poll'
import { intoTask, OneShot, pollAfterReady, resultTask, type Task, type TaskLike } from './task'

type Step<T, U> = (result: Result<T, HttpError>) => Task<U>

type ChainState<T, U> =
	| { readonly stage: 'first'; readonly task: Task<T>; readonly step: OneShot<Step<T, U>> }
	| { readonly stage: 'second'; readonly task: Task<U> }
	| { readonly stage: 'done' }

const chain = <T, U>(name: string, first: Task<T>, step: Step<T, U>): Task<U> => {
	let state: ChainState<T, U> = { stage: 'first', task: first, step: new OneShot(step) }

	return {
		poll: (cx): PollResult<U> => {
			for (;;) {
				switch (state.stage) {
					case 'first': {
						const polled = state.task.poll(cx)
						if (!polled.ready) return Pending
						const next = state.step.take()
						try {
							state = { stage: 'second', task: next(polled.value) }
						} catch (error) {
							state = { stage: 'done' }
							return Ready(err(toHttpError(error)))
						}
						continue
					}
					case 'second': {
						const polled = state.task.poll(cx)
						if (polled.ready) state = { stage: 'done' }
						return polled
					}
					case 'done':
						return pollAfterReady(name)
				}
			}
		},
	}
}

/**
 * Feed the inner result, success or failure, into `f`
 */
export const thenTask = <T, U>(
	task: Task<T>,
	f: (result: Result<T, HttpError>) => TaskLike<U>
): Task<U> => chain('thenTask', task, (result) => intoTask(f(result)))

/**
 * Continue with `f` on success; failures pass through untouched
 */
export const andThenTask = <T, U>(task: Task<T>, f: (value: T) => TaskLike<U>): Task<U> =>
	chain('andThenTask', task, (result) =>
		result.ok ? intoTask(f(result.value)) : resultTask<U>(result)
	)

/**
 * Recover with `f` on failure; successes pass through untouched
 */
export const orElseTask = <T>(task: Task<T>, f: (error: HttpError) => TaskLike<T>): Task<T> =>
	chain('orElseTask', task, (result) =>
		result.ok ? resultTask<T>(result) : intoTask(f(result.error))
	)

/**
 * Synchronously transform the success value
 */
export const mapTask = <T, U>(task: Task<T>, f: (value: T) => U): Task<U> => ({
	poll: (cx) => {
		const polled = task.poll(cx)
		if (!polled.ready) return Pending
		if (!polled.value.ok) return Ready(polled.value)
		try {
			return Ready(ok(f(polled.value.value)))
		} catch (error) {
			return Ready(err(toHttpError(error)))
		}
	},
})

/**
 * Synchronously transform the failure; the result is converted back into an HttpError
 */
export const mapErrTask = <T>(task: Task<T>, f: (error: HttpError) => unknown): Task<T> => ({
	poll: (cx) => {
		const polled = task.poll(cx)
		if (!polled.ready || polled.value.ok) return polled
		return Ready(err(toHttpError(f(polled.value.error))))
	},
})
