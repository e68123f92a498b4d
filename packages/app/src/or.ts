/**
 * Sum combinators
 *
 * `or(a, b)` tries both alternatives from the same cursor position and keeps
 * the one that consumed more segments (`a` on a tie). Its output says which
 * side matched. `orStrict(a, b)` takes `a` whenever it matches and never
 * applies `b` in that case; both sides share one output type.
 *
 * When every alternative fails, their errors merge: an invalid request beats
 * a method mismatch, which beats a plain miss.
 */

import { err, mapTask, ok } from '@sluice/core'
import { mergeApplyErrors } from './apply-error'
import { type Endpoint, endpoint, type Tuple } from './endpoint'

// ============================================================================
// Either
// ============================================================================

export type Either<L, R> =
	| { readonly side: 'left'; readonly value: L }
	| { readonly side: 'right'; readonly value: R }

export const left = <L>(value: L): Either<L, never> => ({ side: 'left', value })

export const right = <R>(value: R): Either<never, R> => ({ side: 'right', value })

/**
 * Collapse an Either by handling each side
 */
export const fold = <L, R, U>(
	either: Either<L, R>,
	onLeft: (value: L) => U,
	onRight: (value: R) => U
): U => (either.side === 'left' ? onLeft(either.value) : onRight(either.value))

// ============================================================================
// Combinators
// ============================================================================

/**
 * Longest-match alternative
 *
 * @example
 * ```typescript
 * const route = or(path('/users'), path('/users/:id'))
 * // GET /users/7 -> [{ side: 'right', value: ['7'] }]
 * ```
 */
export const or = <L extends Tuple, R extends Tuple>(
	a: Endpoint<L>,
	b: Endpoint<R>
): Endpoint<[Either<L, R>]> =>
	endpoint((cx) => {
		const saved = cx.snapshot()

		const first = a.apply(cx)
		if (first.ok) {
			const afterFirst = cx.snapshot()
			cx.restore(saved)

			const second = b.apply(cx)
			if (second.ok && cx.popped() > afterFirst.popped) {
				return ok(mapTask(second.value, (value): [Either<L, R>] => [right(value)]))
			}

			cx.restore(afterFirst)
			return ok(mapTask(first.value, (value): [Either<L, R>] => [left(value)]))
		}

		cx.restore(saved)
		const second = b.apply(cx)
		if (second.ok) {
			return ok(mapTask(second.value, (value): [Either<L, R>] => [right(value)]))
		}

		cx.restore(saved)
		return err(mergeApplyErrors(first.error, second.error))
	})

/**
 * First-match alternative over endpoints with the same output
 */
export const orStrict = <T extends Tuple>(a: Endpoint<T>, b: Endpoint<T>): Endpoint<T> =>
	endpoint((cx) => {
		const saved = cx.snapshot()

		const first = a.apply(cx)
		if (first.ok) return first

		cx.restore(saved)
		const second = b.apply(cx)
		if (second.ok) return second

		cx.restore(saved)
		return err(mergeApplyErrors(first.error, second.error))
	})

/**
 * `orStrict` over any number of alternatives, tried in order
 *
 * @example
 * ```typescript
 * const api = oneOf(listUsers, getUser, createUser)
 * ```
 */
export const oneOf = <T extends Tuple>(
	first: Endpoint<T>,
	...rest: readonly Endpoint<T>[]
): Endpoint<T> =>
	rest.reduce((acc, e) => orStrict(acc, e), first)
