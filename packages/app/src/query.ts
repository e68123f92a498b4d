/**
 * Query string endpoints and helpers
 */

import { err, ok, ready, type Result } from '@sluice/core'
import { invalidRequest, missingQuery } from './apply-error'
import { decodeSegment } from './encoded'
import { type Endpoint, endpoint } from './endpoint'

export type QueryParams = Record<string, string | string[]>

const decodeComponent = (text: string): Result<string, string> =>
	decodeSegment(text.replace(/\+/g, ' '))

/**
 * Parse a query string into an object.
 * Repeated keys and `key[]` collect into arrays.
 */
export const parseQuery = (queryString: string): Result<QueryParams, string> => {
	// A Map keeps keys such as __proto__ and toString clear of Object.prototype
	const params = new Map<string, string | string[]>()

	if (!queryString) return ok({})

	// Remove leading ? if present
	const qs = queryString.startsWith('?') ? queryString.slice(1) : queryString

	for (const pair of qs.split('&')) {
		const eq = pair.indexOf('=')
		const rawKey = eq === -1 ? pair : pair.slice(0, eq)
		const rawValue = eq === -1 ? '' : pair.slice(eq + 1)

		if (!rawKey) continue

		const decodedKey = decodeComponent(rawKey)
		if (!decodedKey.ok) return decodedKey
		const decodedValue = decodeComponent(rawValue)
		if (!decodedValue.ok) return decodedValue

		const isArray = decodedKey.value.endsWith('[]')
		const key = isArray ? decodedKey.value.slice(0, -2) : decodedKey.value
		const value = decodedValue.value
		const existing = params.get(key)

		if (Array.isArray(existing)) {
			existing.push(value)
		} else if (existing !== undefined) {
			params.set(key, [existing, value])
		} else {
			params.set(key, isArray ? [value] : value)
		}
	}

	return ok(Object.fromEntries(params))
}

/**
 * Stringify object to query string
 */
export const stringifyQuery = (
	params: Readonly<Record<string, string | readonly string[] | number | boolean | undefined>>
): string => {
	const parts: string[] = []

	for (const [key, value] of Object.entries(params)) {
		if (value === undefined) continue

		if (typeof value === 'object') {
			for (const v of value) {
				parts.push(`${encodeURIComponent(key)}[]=${encodeURIComponent(v)}`)
			}
		} else {
			parts.push(`${encodeURIComponent(key)}=${encodeURIComponent(String(value))}`)
		}
	}

	return parts.join('&')
}

// ============================================================================
// Endpoints
// ============================================================================

/** The raw query string. Missing or empty: invalid request. */
export const query = (): Endpoint<[string]> =>
	endpoint(({ input }) => (input.query ? ok(ready<[string]>([input.query])) : err(missingQuery())))

/** The raw query string, or undefined; always matches */
export const optionalQuery = (): Endpoint<[string | undefined]> =>
	endpoint(({ input }) => ok(ready<[string | undefined]>([input.query || undefined])))

/**
 * Parsed query parameters; an absent query is an empty object.
 * Malformed percent-encoding is an invalid request.
 */
export const queryParams = (): Endpoint<[QueryParams]> =>
	endpoint(({ input }) => {
		const parsed = parseQuery(input.query)
		return parsed.ok ? ok(ready<[QueryParams]>([parsed.value])) : err(invalidRequest(parsed.error))
	})
