/**
 * Chaining combinators
 *
 * Each lifts a task combinator from @sluice/core to endpoints. Routing is
 * left untouched: the wrapped endpoint matches exactly when the inner one
 * does. Transforms run while the task runs, once per request.
 *
 * @example
 * ```typescript
 * const user = andThen(get(path('/users/:id')), (id) => db.findUser(id))
 * const safe = orElse(user, () => ready<[User | null]>([null]))
 * ```
 */

import {
	andThenTask,
	type HttpError,
	mapErrTask,
	mapTask,
	ok,
	orElseTask,
	type Result,
	type TaskLike,
	thenTask,
} from '@sluice/core'
import { type Endpoint, endpoint, type Tuple } from './endpoint'

const one = <U>(value: U): [U] => [value]

/**
 * Continue with the full outcome, success or failure.
 * Not named `then`: a module exporting `then` would be a thenable.
 */
export const thenResult = <T extends Tuple, U>(
	e: Endpoint<T>,
	f: (result: Result<T, HttpError>) => TaskLike<U>
): Endpoint<[U]> =>
	endpoint((cx) => {
		const matched = e.apply(cx)
		return matched.ok ? ok(mapTask(thenTask(matched.value, f), one)) : matched
	})

/**
 * Continue with the output values; failures pass through
 */
export const andThen = <T extends Tuple, U>(
	e: Endpoint<T>,
	f: (...args: T) => TaskLike<U>
): Endpoint<[U]> =>
	endpoint((cx) => {
		const matched = e.apply(cx)
		return matched.ok
			? ok(mapTask(andThenTask(matched.value, (args) => f(...args)), one))
			: matched
	})

/**
 * Recover from a runtime failure with a task of the same output
 */
export const orElse = <T extends Tuple>(
	e: Endpoint<T>,
	f: (error: HttpError) => TaskLike<T>
): Endpoint<T> =>
	endpoint((cx) => {
		const matched = e.apply(cx)
		return matched.ok ? ok(orElseTask(matched.value, f)) : matched
	})

/**
 * Synchronously transform the output values
 *
 * @example
 * ```typescript
 * map(path('/users/:id'), (id) => Number(id))  // Endpoint<[number]>
 * ```
 */
export const map = <T extends Tuple, U>(e: Endpoint<T>, f: (...args: T) => U): Endpoint<[U]> =>
	endpoint((cx) => {
		const matched = e.apply(cx)
		return matched.ok ? ok(mapTask(matched.value, (args) => one(f(...args)))) : matched
	})

/**
 * Synchronously transform a runtime failure; the result is converted back into an HttpError
 */
export const mapErr = <T extends Tuple>(
	e: Endpoint<T>,
	f: (error: HttpError) => unknown
): Endpoint<T> =>
	endpoint((cx) => {
		const matched = e.apply(cx)
		return matched.ok ? ok(mapErrTask(matched.value, f)) : matched
	})
