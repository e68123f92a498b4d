/**
 * Runtime Errors
 *
 * HttpError is the single failure type a Task reports. Any value a leaf
 * throws or rejects with is converted into one through toHttpError().
 *
 * ProtocolViolation is thrown, never returned: it marks a broken contract
 * (polling a finished task, reusing a one-shot transform, touching the
 * cursor after routing) rather than a problem with the request.
 */

// ============================================================================
// HttpError
// ============================================================================

export type HttpErrorInit = {
	/** HTTP status code (default: 500) */
	readonly status?: number
	/** Programmatic error code (default: derived from status) */
	readonly code?: string
	/** Extra context rendered into the error body */
	readonly details?: unknown
	/** Underlying failure */
	readonly cause?: unknown
}

const defaultCodes: Record<number, string> = {
	400: 'BAD_REQUEST',
	401: 'UNAUTHORIZED',
	403: 'FORBIDDEN',
	404: 'NOT_FOUND',
	405: 'METHOD_NOT_ALLOWED',
	413: 'PAYLOAD_TOO_LARGE',
	429: 'TOO_MANY_REQUESTS',
	500: 'INTERNAL_ERROR',
}

export class HttpError extends Error {
	readonly status: number
	readonly code: string
	readonly details: unknown

	constructor(message: string, init: HttpErrorInit = {}) {
		super(message, init.cause === undefined ? undefined : { cause: init.cause })
		this.name = 'HttpError'
		this.status = init.status ?? 500
		this.code = init.code ?? defaultCodes[this.status] ?? 'HTTP_ERROR'
		this.details = init.details
	}
}

export const isHttpError = (value: unknown): value is HttpError => value instanceof HttpError

const messageOf = (value: unknown): string =>
	value instanceof Error ? value.message : typeof value === 'string' ? value : String(value)

/**
 * Convert any thrown or rejected value into an HttpError.
 * HttpErrors pass through; everything else becomes a 500 carrying the original as `cause`.
 */
export const toHttpError = (value: unknown): HttpError => {
	if (value instanceof HttpError) return value
	if (value instanceof ProtocolViolation) throw value
	return new HttpError(messageOf(value), { status: 500, cause: value })
}

// Error constructors

export const badRequestError = (cause: unknown, details?: unknown): HttpError =>
	new HttpError(messageOf(cause), { status: 400, details, cause })

export const payloadTooLargeError = (limit: number): HttpError =>
	new HttpError(`Payload exceeds ${limit} bytes`, { status: 413, details: { limit } })

export const internalError = (message: string, code?: string): HttpError =>
	new HttpError(message, { status: 500, code })

// ============================================================================
// ProtocolViolation
// ============================================================================

export class ProtocolViolation extends Error {
	constructor(message: string) {
		super(message)
		this.name = 'ProtocolViolation'
	}
}
