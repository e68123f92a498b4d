/**
 * Header endpoints
 * Read request headers while routing; the cursor is never touched
 */

import { err, ok, ready, type Result } from '@sluice/core'
import { invalidRequest, missingHeader, notMatched } from './apply-error'
import type { ParseFailure } from './encoded'
import { type Endpoint, endpoint } from './endpoint'

/**
 * Converts a header value (taken as-is, not percent-decoded)
 */
export type HeaderParser<T> = (value: string) => Result<T, ParseFailure>

/**
 * Required header, as a string. Missing: invalid request.
 */
export const header = (name: string): Endpoint<[string]> =>
	endpoint((cx) => {
		const found = cx.input.header(name)
		return found === undefined ? err(missingHeader(name)) : ok(ready<[string]>([found]))
	})

/**
 * Required header, converted with `parser`.
 * A failure marked `skip` means not matched; any other failure is an invalid request.
 */
export const parsedHeader = <T>(name: string, parser: HeaderParser<T>): Endpoint<[T]> =>
	endpoint((cx) => {
		const found = cx.input.header(name)
		if (found === undefined) return err(missingHeader(name))
		const parsed = parser(found)
		if (parsed.ok) return ok(ready<[T]>([parsed.value]))
		return err(
			parsed.error.skip
				? notMatched()
				: invalidRequest(`invalid header \`${name}': ${parsed.error.reason}`, parsed.error)
		)
	})

/** Header value, or undefined when absent; always matches */
export const optionalHeader = (name: string): Endpoint<[string | undefined]> =>
	endpoint((cx) => ok(ready<[string | undefined]>([cx.input.header(name)])))

/**
 * Match only when the header is present with exactly `expected`
 *
 * @example
 * ```typescript
 * and(headerEquals('x-api-version', '2'), path('/items'))
 * ```
 */
export const headerEquals = (name: string, expected: string): Endpoint<[]> =>
	endpoint((cx) => (cx.input.header(name) === expected ? ok(ready<[]>([])) : err(notMatched())))
