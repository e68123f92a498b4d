/**
 * Response types and helpers
 * Immutable response objects, rendered by the responder
 */

import type { HttpError } from './error'
import { allowHeader, type Verbs } from './methods'

/**
 * Response body type
 * - string | Buffer: Buffered response (sent all at once)
 * - AsyncIterable<Uint8Array>: Streaming response (sent chunk by chunk)
 * - null: No body
 */
export type ResponseBody = string | Buffer | AsyncIterable<Uint8Array> | null

export type ServerResponse = {
	readonly status: number
	readonly headers: Readonly<Record<string, string>>
	readonly body: ResponseBody
}

type ResponseInit = { status?: number; headers?: Record<string, string> }

/**
 * Check if body is a streaming response (AsyncIterable)
 */
export const isStreamingBody = (body: ResponseBody): body is AsyncIterable<Uint8Array> =>
	body !== null &&
	typeof body === 'object' &&
	!Buffer.isBuffer(body) &&
	Symbol.asyncIterator in body

/**
 * Structural check for values that already are responses
 */
export const isServerResponse = (value: unknown): value is ServerResponse =>
	typeof value === 'object' &&
	value !== null &&
	'status' in value &&
	typeof value.status === 'number' &&
	'headers' in value &&
	typeof value.headers === 'object' &&
	'body' in value

// Response constructors
export const response = (
	body: string | Buffer | null = null,
	init: ResponseInit = {}
): ServerResponse => ({
	status: init.status ?? 200,
	headers: init.headers ?? {},
	body,
})

export const json = <T>(data: T, init: ResponseInit = {}): ServerResponse => ({
	status: init.status ?? 200,
	headers: {
		'content-type': 'application/json',
		...init.headers,
	},
	body: JSON.stringify(data),
})

export const text = (data: string, init: ResponseInit = {}): ServerResponse => ({
	status: init.status ?? 200,
	headers: {
		'content-type': 'text/plain',
		...init.headers,
	},
	body: data,
})

export const noContent = (): ServerResponse => ({ status: 204, headers: {}, body: null })

export const redirect = (url: string, status: 301 | 302 | 303 | 307 | 308 = 302): ServerResponse => ({
	status,
	headers: { location: url },
	body: null,
})

// ============================================================================
// Error Response Types
// ============================================================================

/**
 * Standard error response body
 */
export type ErrorResponseBody = {
	/** Human-readable error message */
	readonly error: string
	/** Programmatic error code (e.g., "NOT_FOUND", "METHOD_NOT_ALLOWED") */
	readonly code?: string
	/** Additional error details */
	readonly details?: unknown
}

/**
 * Create a standardized error response
 * @param error - Human-readable error message
 * @param status - HTTP status code
 * @param code - Programmatic error code (optional)
 * @param details - Additional context (optional)
 */
export const errorResponse = (
	error: string,
	status: number,
	code?: string,
	details?: unknown,
	headers: Record<string, string> = {}
): ServerResponse => {
	const body: ErrorResponseBody = {
		error,
		...(code !== undefined ? { code } : {}),
		...(details !== undefined ? { details } : {}),
	}
	return json(body, { status, headers })
}

export const notFound = (message = 'Not Found'): ServerResponse =>
	errorResponse(message, 404, 'NOT_FOUND')

export const badRequest = (message = 'Bad Request', details?: unknown): ServerResponse =>
	errorResponse(message, 400, 'BAD_REQUEST', details)

export const methodNotAllowed = (allowed: Verbs, message = 'Method Not Allowed'): ServerResponse =>
	errorResponse(message, 405, 'METHOD_NOT_ALLOWED', undefined, { allow: allowHeader(allowed) })

export const serverError = (message = 'Internal Server Error', details?: unknown): ServerResponse =>
	errorResponse(message, 500, 'INTERNAL_ERROR', details)

/**
 * Render a runtime error. 5xx messages are replaced unless `expose` is set.
 */
export const httpErrorResponse = (error: HttpError, expose = false): ServerResponse =>
	error.status >= 500 && !expose
		? errorResponse('Internal Server Error', error.status, error.code)
		: errorResponse(error.message, error.status, error.code, error.details)
