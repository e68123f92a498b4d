/**
 * Value endpoints
 * Always match, leave the cursor alone, and produce a value
 */

import { deferTask, failed, mapTask, ok, ready, type TaskLike } from '@sluice/core'
import { type Endpoint, endpoint, type Tuple } from './endpoint'
import type { Input } from './input'

/** Produce `v` on every request */
export const value = <T>(v: T): Endpoint<[T]> => endpoint(() => ok(ready<[T]>([v])))

/** Produce nothing */
export const unit = (): Endpoint<[]> => endpoint(() => ok(ready<[]>([])))

/**
 * Compute the value when the task runs, not while routing.
 * `f` may return a plain value through `ready()`, a Task, or a promise.
 *
 * @example
 * ```typescript
 * const now = lazy(async () => new Date().toISOString())
 * ```
 */
export const lazy = <T>(f: (input: Input) => TaskLike<T>): Endpoint<[T]> =>
	endpoint((cx) => {
		const { input } = cx
		return ok(mapTask(deferTask(() => f(input)), (v): [T] => [v]))
	})

/**
 * Match everything and fail at run time with the error `f` builds
 *
 * @example
 * ```typescript
 * orStrict(users, reject(() => new HttpError('gone', { status: 410 })))
 * ```
 */
export const reject = <T extends Tuple = []>(f: (input: Input) => unknown): Endpoint<T> =>
	endpoint((cx) => {
		const { input } = cx
		return ok(deferTask(() => failed<T>(f(input))))
	})
