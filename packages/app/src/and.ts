/**
 * Product combinator
 *
 * `and(a, b)` applies `a` then `b` against the same cursor and joins their
 * tasks; outputs concatenate. Both tasks are polled side by side and the
 * first failure, in declaration order, wins.
 *
 * @example
 * ```typescript
 * and(segment('users'), param(int), header('x-token'))  // Endpoint<[number, string]>
 * ```
 */

import { join, ok, ready } from '@sluice/core'
import { type Endpoint, endpoint, type Tuple } from './endpoint'

/** Concatenated output of a list of endpoints */
export type AndOutput<Es extends readonly Endpoint<Tuple>[]> = Es extends readonly [
	Endpoint<infer Head extends Tuple>,
	...infer Rest extends readonly Endpoint<Tuple>[],
]
	? [...Head, ...AndOutput<Rest>]
	: []

const and2 = <A extends Tuple, B extends Tuple>(
	a: Endpoint<A>,
	b: Endpoint<B>
): Endpoint<[...A, ...B]> =>
	endpoint((cx) => {
		const saved = cx.snapshot()

		const first = a.apply(cx)
		if (!first.ok) {
			cx.restore(saved)
			return first
		}

		const second = b.apply(cx)
		if (!second.ok) {
			cx.restore(saved)
			return second
		}

		return ok(join(first.value, second.value, (x, y): [...A, ...B] => [...x, ...y]))
	})

/**
 * Apply every endpoint in order; folds left, so `and(a, b, c)` is `and(and(a, b), c)`
 */
export function and<Es extends readonly Endpoint<Tuple>[]>(
	...endpoints: Es
): Endpoint<AndOutput<Es>>
export function and(...endpoints: readonly Endpoint<Tuple>[]): Endpoint<Tuple> {
	const [head, ...rest] = endpoints
	if (head === undefined) return endpoint(() => ok(ready<[]>([])))
	return rest.reduce<Endpoint<Tuple>>((acc, e) => and2(acc, e), head)
}
