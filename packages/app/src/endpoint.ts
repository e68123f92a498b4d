/**
 * Endpoint
 *
 * An Endpoint decides, synchronously and against the routing context,
 * whether a request matches. A match yields a Task computing the output
 * tuple; a miss yields an ApplyError. Outputs are always tuples so that
 * `and` can concatenate them.
 */

import type { Task } from '@sluice/core'
import type { ApplyResult } from './apply-error'
import type { ApplyContext } from './context'

// ============================================================================
// Types
// ============================================================================

/** Output shape of every endpoint */
export type Tuple = readonly unknown[]

export type Endpoint<T extends Tuple> = {
	readonly apply: (cx: ApplyContext) => ApplyResult<Task<T>>
}

/** Output tuple of an endpoint */
export type OutputOf<E> = E extends Endpoint<infer T extends Tuple> ? T : never

/** Single output value of a one-element endpoint */
export type ValueOf<E> = E extends Endpoint<readonly [infer V]> ? V : never

/** Tuple concatenation, the output of `and` */
export type Concat<A extends Tuple, B extends Tuple> = [...A, ...B]

// ============================================================================
// Construction
// ============================================================================

/**
 * Build an endpoint from its apply function
 *
 * @example
 * ```typescript
 * const always = endpoint<[]>(() => ok(ready([])))
 * ```
 */
export const endpoint = <T extends Tuple>(
	apply: (cx: ApplyContext) => ApplyResult<Task<T>>
): Endpoint<T> => ({ apply })

/**
 * Run `apply` and put the cursor back if it fails
 */
export const applyOrRestore = <T extends Tuple>(
	e: Endpoint<T>,
	cx: ApplyContext
): ApplyResult<Task<T>> => {
	const saved = cx.snapshot()
	const result = e.apply(cx)
	if (!result.ok) cx.restore(saved)
	return result
}
