/**
 * Lift a single-value endpoint into one that always matches.
 * A miss (or a malformed match) yields undefined and leaves the cursor where it was.
 *
 * @example
 * ```typescript
 * and(path('/search'), optional(header('x-locale')))  // Endpoint<[string | undefined]>
 * ```
 */

import { ok, ready } from '@sluice/core'
import { applyOrRestore, type Endpoint, endpoint } from './endpoint'

export const optional = <V>(e: Endpoint<[V]>): Endpoint<[V | undefined]> =>
	endpoint<[V | undefined]>((cx) => {
		const matched = applyOrRestore(e, cx)
		return ok(matched.ok ? matched.value : ready<[V | undefined]>([undefined]))
	})
