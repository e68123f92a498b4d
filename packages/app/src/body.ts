/**
 * Body endpoints
 *
 * Bodies are claimed when the task first runs, never while routing, so
 * alternatives that are tried and dropped do not consume the body. A body
 * can be claimed once per request; a second claim is a 500.
 */

import {
	badRequestError,
	deferTask,
	err,
	HttpError,
	mapTask,
	ok,
	payloadTooLargeError,
	promiseTask,
	ready,
	type Result,
	type Task,
} from '@sluice/core'
import { type Endpoint, endpoint } from './endpoint'
import type { Input, RequestBody } from './input'
import { parseQuery, type QueryParams } from './query'

// 1MB default
const DEFAULT_LIMIT = 1024 * 1024

export type BodyOptions = {
	/** Max body size in bytes (default: 1MB) */
	readonly limit?: number
}

/**
 * Converts the buffered body; an error is reported as 400
 */
export type BodyParser<T> = (data: Uint8Array) => Result<T, string>

// ============================================================================
// Claiming and reading
// ============================================================================

const claimBody = (input: Input): RequestBody => {
	const body = input.takeBody()
	if (body === undefined) {
		throw new HttpError('request body already taken', { status: 500, code: 'BODY_ALREADY_TAKEN' })
	}
	return body
}

/**
 * Buffer every chunk, failing with 413 as soon as the total passes `limit`
 */
export const readBody = async (chunks: RequestBody, limit: number): Promise<Uint8Array> => {
	const parts: Uint8Array[] = []
	let size = 0

	for await (const chunk of chunks) {
		size += chunk.byteLength
		if (size > limit) throw payloadTooLargeError(limit)
		parts.push(chunk)
	}

	const data = new Uint8Array(size)
	let offset = 0
	for (const part of parts) {
		data.set(part, offset)
		offset += part.byteLength
	}
	return data
}

const declaredLength = (input: Input): number | undefined => {
	const contentLength = input.header('content-length')
	if (contentLength === undefined) return undefined
	const size = Number.parseInt(contentLength, 10)
	return Number.isNaN(size) ? undefined : size
}

const bufferedBody = (input: Input, limit: number): Task<Uint8Array> =>
	deferTask(() => {
		const chunks = claimBody(input)
		// Fast path: trust an oversized content-length without reading
		const declared = declaredLength(input)
		if (declared !== undefined && declared > limit) throw payloadTooLargeError(limit)
		return promiseTask(() => readBody(chunks, limit))
	})

// ============================================================================
// Endpoints
// ============================================================================

/**
 * The body stream itself, claimed on first poll
 */
export const rawBody = (): Endpoint<[RequestBody]> =>
	endpoint(({ input }) => ok(deferTask(() => ready<[RequestBody]>([claimBody(input)]))))

/**
 * Buffer the body (up to `limit` bytes) and convert it with `parser`
 *
 * @example
 * ```typescript
 * post(and(path('/notes'), body(asText, { limit: 4096 })))
 * ```
 */
export const body = <T>(parser: BodyParser<T>, options: BodyOptions = {}): Endpoint<[T]> => {
	const { limit = DEFAULT_LIMIT } = options

	return endpoint(({ input }) =>
		ok(
			mapTask(bufferedBody(input, limit), (data): [T] => {
				const parsed = parser(data)
				if (!parsed.ok) throw badRequestError(parsed.error)
				return [parsed.value]
			})
		)
	)
}

// ============================================================================
// Parsers
// ============================================================================

const decoder = new TextDecoder('utf-8', { fatal: true })

/** The raw bytes */
export const asBytes: BodyParser<Uint8Array> = (data) => ok(data)

/** UTF-8 text */
export const asText: BodyParser<string> = (data) => {
	try {
		return ok(decoder.decode(data))
	} catch {
		return err('request body is not valid UTF-8')
	}
}

/** JSON document */
export const asJson: BodyParser<unknown> = (data) => {
	const decoded = asText(data)
	if (!decoded.ok) return decoded
	try {
		const value: unknown = JSON.parse(decoded.value)
		return ok(value)
	} catch (error) {
		return err(`invalid JSON body: ${error instanceof Error ? error.message : String(error)}`)
	}
}

/** URL-encoded form */
export const asForm: BodyParser<QueryParams> = (data) => {
	const decoded = asText(data)
	return decoded.ok ? parseQuery(decoded.value) : decoded
}
