/**
 * Endpoint wrappers
 *
 * Layers over endpoints, composed with the same `compose` used for handler
 * middleware: `wrap(e, a, b)` is `a(b(e))`.
 */

import { compose, err, failed, type Layer, ok } from '@sluice/core'
import { type ApplyError, applyErrorToHttpError } from './apply-error'
import { type Endpoint, endpoint, type Tuple } from './endpoint'
import type { Input } from './input'

export type EndpointWrapper<T extends Tuple> = Layer<Endpoint<T>>

/**
 * Apply wrappers to an endpoint, outermost first
 */
export const wrap = <T extends Tuple>(
	e: Endpoint<T>,
	...wrappers: EndpointWrapper<T>[]
): Endpoint<T> =>
	compose(...wrappers)(e)

/**
 * Match every request; a routing failure of `e` becomes the task's runtime error.
 * The cursor is drained in that case, so nothing after this endpoint matches segments.
 *
 * @example
 * ```typescript
 * // Answers 404 with a runtime error instead of letting siblings try
 * orReject(path('/admin/*'))
 * ```
 */
export const orReject = <T extends Tuple>(e: Endpoint<T>): Endpoint<T> =>
	orRejectWith(e, applyErrorToHttpError)

/**
 * Like `orReject`, with the runtime error built by `f`
 */
export const orRejectWith = <T extends Tuple>(
	e: Endpoint<T>,
	f: (error: ApplyError, input: Input) => unknown
): Endpoint<T> =>
	endpoint((cx) => {
		const matched = e.apply(cx)
		if (matched.ok) return matched
		cx.drain()
		return ok(failed<T>(f(matched.error, cx.input)))
	})

/**
 * Run a routing check before `e`; an ApplyError from `check` fails the match
 *
 * @example
 * ```typescript
 * const jsonOnly = beforeApply((input) =>
 *   input.header('content-type') === 'application/json' ? undefined : notMatched()
 * )
 * ```
 */
export const beforeApply =
	<T extends Tuple>(check: (input: Input) => ApplyError | undefined): EndpointWrapper<T> =>
	(e) =>
		endpoint((cx) => {
			const error = check(cx.input)
			return error === undefined ? e.apply(cx) : err(error)
		})
