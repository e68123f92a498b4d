/**
 * Request ID and Tracing
 * Tag each request with an ID that request logging picks up
 */

import { randomBytes } from 'node:crypto'
import type { Handler, ServerResponse, Wrapper } from '@sluice/core'
import type { Input } from './input'

export type TracingOptions = {
	/** Header name for request ID (default: x-request-id) */
	readonly header?: string
	/** Generate custom request ID */
	readonly generator?: () => string
	/** Trust incoming request ID header */
	readonly trustIncoming?: boolean
	/** Add request ID to response */
	readonly setResponse?: boolean
}

/**
 * Generate default request ID (32 hex chars)
 */
const defaultGenerator = (): string => randomBytes(16).toString('hex')

// Request ID per input (WeakMap so finished requests are collected)
const requestIdMap = new WeakMap<Input, string>()

/**
 * Get request ID of an input, once tracing() has seen it
 */
export const getRequestId = (input: Input): string | undefined => requestIdMap.get(input)

/**
 * Create request ID/tracing wrapper
 */
export const tracing = (options: TracingOptions = {}): Wrapper<Input> => {
	const {
		header = 'x-request-id',
		generator = defaultGenerator,
		trustIncoming = true,
		setResponse = true,
	} = options

	return (handler: Handler<Input>): Handler<Input> => {
		return async (input: Input): Promise<ServerResponse> => {
			// Get or generate request ID
			let requestId = trustIncoming ? input.header(header) : undefined

			if (!requestId) {
				requestId = generator()
			}

			requestIdMap.set(input, requestId)

			const res = await handler(input)

			if (setResponse) {
				return {
					...res,
					headers: {
						...res.headers,
						[header]: requestId,
					},
				}
			}

			return res
		}
	}
}

/**
 * Logging wrapper with request ID
 */
export type LogFn = (msg: string, data?: Record<string, unknown>) => void

export type LoggingOptions = {
	/** Log function */
	readonly log?: LogFn
	/** Include request timing */
	readonly timing?: boolean
	/** Skip logging for certain requests */
	readonly skip?: (input: Input) => boolean
}

export const logging = (options: LoggingOptions = {}): Wrapper<Input> => {
	const { log = console.log, timing = true, skip } = options

	return (handler: Handler<Input>): Handler<Input> => {
		return async (input: Input): Promise<ServerResponse> => {
			if (skip?.(input)) {
				return handler(input)
			}

			const start = timing ? performance.now() : 0
			const requestId = getRequestId(input)

			try {
				const res = await handler(input)

				const duration = timing ? performance.now() - start : undefined

				log(`${input.method} ${input.path}`, {
					status: res.status,
					duration: duration !== undefined ? `${duration.toFixed(2)}ms` : undefined,
					requestId,
				})

				return res
			} catch (error) {
				const duration = timing ? performance.now() - start : undefined

				log(`${input.method} ${input.path} ERROR`, {
					error: error instanceof Error ? error.message : String(error),
					duration: duration !== undefined ? `${duration.toFixed(2)}ms` : undefined,
					requestId,
				})

				throw error
			}
		}
	}
}
