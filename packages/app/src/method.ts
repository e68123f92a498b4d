/**
 * Method guards
 *
 * The inner endpoint decides whether the route matches; the guard then
 * checks the method. A route that matches under another method reports
 * method-not-allowed with the methods it accepts, so siblings can merge
 * their sets into one `allow` header.
 *
 * @example
 * ```typescript
 * const users = or(get(path('/users')), post(and(path('/users'), body(asJson))))
 * ```
 */

import { err, hasVerb, type Method, verbs } from '@sluice/core'
import { methodNotAllowedError } from './apply-error'
import { applyOrRestore, type Endpoint, endpoint, type Tuple } from './endpoint'

/**
 * Accept `e` only under one of `methods`
 */
export const onMethod = <T extends Tuple>(
	methods: Method | readonly Method[],
	e: Endpoint<T>
): Endpoint<T> => {
	const allowed = typeof methods === 'string' ? verbs(methods) : verbs(...methods)

	return endpoint((cx) => {
		const saved = cx.snapshot()
		const matched = applyOrRestore(e, cx)
		if (!matched.ok || hasVerb(allowed, cx.input.method)) return matched
		cx.restore(saved)
		return err(methodNotAllowedError(allowed))
	})
}

export const get = <T extends Tuple>(e: Endpoint<T>): Endpoint<T> => onMethod('GET', e)

export const post = <T extends Tuple>(e: Endpoint<T>): Endpoint<T> => onMethod('POST', e)

export const put = <T extends Tuple>(e: Endpoint<T>): Endpoint<T> => onMethod('PUT', e)

export const patch = <T extends Tuple>(e: Endpoint<T>): Endpoint<T> => onMethod('PATCH', e)

export const del = <T extends Tuple>(e: Endpoint<T>): Endpoint<T> => onMethod('DELETE', e)

export const head = <T extends Tuple>(e: Endpoint<T>): Endpoint<T> => onMethod('HEAD', e)

export const options = <T extends Tuple>(e: Endpoint<T>): Endpoint<T> => onMethod('OPTIONS', e)
