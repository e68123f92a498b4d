/**
 * App - Stateless application container
 *
 * Separates routing and rendering from transport. One endpoint tree is
 * routed per request; its output goes through the responder, its failures
 * through the standard error bodies.
 *
 * @example
 * ```typescript
 * const app = createApp({
 *   endpoint: oneOf(
 *     map(get(path('/health')), () => 'ok'),
 *     andThen(get(path('/users/:id')), (id) => db.findUser(id)),
 *   ),
 *   middleware: compose(tracing(), logging()),
 * })
 *
 * // Fetch API
 * const response = await app.fetch(new Request('http://localhost/users/7'))
 * ```
 */

import { type Handler, isHttpError, type ServerResponse, type Wrapper } from '@sluice/core'
import type { Endpoint, Tuple } from './endpoint'
import { type Input, inputFromRequest } from './input'
import { defaultResponder, failureResponse, type Responder } from './responder'
import { runEndpoint } from './run'
import type { LogFn } from './tracing'

// ============================================================================
// Types
// ============================================================================

/**
 * App configuration
 */
export interface AppConfig<T extends Tuple> {
	/** Top-level endpoint, routed once per request */
	readonly endpoint: Endpoint<T>
	/** Renders the endpoint output (default: defaultResponder) */
	readonly responder?: Responder<T>
	/** Handler middleware - wraps the whole app, e.g. compose(tracing(), logging()) */
	readonly middleware?: Wrapper<Input>
	/** Reports 5xx failures (default: console.log) */
	readonly log?: LogFn
	/** Render 5xx messages instead of a generic one (default: false) */
	readonly exposeErrors?: boolean
}

export interface App<T extends Tuple> {
	/**
	 * Fetch API handler
	 *
	 * @example
	 * ```typescript
	 * const response = await app.fetch(new Request('http://localhost/users'))
	 * ```
	 */
	readonly fetch: (request: Request) => Promise<Response>

	/**
	 * Internal handler: Input → ServerResponse, middleware included
	 */
	readonly handle: Handler<Input>

	/**
	 * App configuration (for introspection)
	 */
	readonly config: AppConfig<T>
}

// ============================================================================
// Fetch API conversion
// ============================================================================

const asyncIterableToReadableStream = (
	iterable: AsyncIterable<Uint8Array>
): ReadableStream<Uint8Array> => {
	const iterator = iterable[Symbol.asyncIterator]()

	return new ReadableStream<Uint8Array>({
		async pull(controller) {
			try {
				const { value, done } = await iterator.next()
				if (done) {
					controller.close()
				} else {
					controller.enqueue(value)
				}
			} catch (error) {
				controller.error(error)
			}
		},
		async cancel() {
			await iterator.return?.()
		},
	})
}

/**
 * Convert ServerResponse to Web Fetch Response
 *
 * @example
 * ```typescript
 * const response = serverResponseToResponse(json({ name: 'Alice' }))
 * // response.status === 200
 * // response.headers.get('content-type') === 'application/json'
 * ```
 */
export const serverResponseToResponse = (response: ServerResponse): Response => {
	const headers = new Headers()
	for (const [key, value] of Object.entries(response.headers)) {
		headers.set(key, value)
	}

	const { body } = response
	let init: BodyInit | null = null
	if (typeof body === 'string') {
		init = body
	} else if (Buffer.isBuffer(body)) {
		init = new Uint8Array(body)
	} else if (body !== null) {
		init = asyncIterableToReadableStream(body)
	}

	return new Response(init, { status: response.status, headers })
}

// ============================================================================
// App Builder
// ============================================================================

/**
 * Create a stateless application around one endpoint tree
 */
export const createApp = <T extends Tuple>(config: AppConfig<T>): App<T> => {
	const {
		endpoint,
		responder = defaultResponder,
		middleware,
		log = console.log,
		exposeErrors = false,
	} = config

	const route: Handler<Input> = async (input) => {
		const outcome = await runEndpoint(endpoint, input)
		if (outcome.ok) return responder(outcome.value)

		const { error } = outcome
		if (isHttpError(error) && error.status >= 500) {
			log(`${input.method} ${input.path} FAILED`, {
				status: error.status,
				code: error.code,
				error: error.message,
			})
		}
		return failureResponse(error, exposeErrors)
	}

	const handle = middleware ? middleware(route) : route

	const fetch = async (request: Request): Promise<Response> =>
		serverResponseToResponse(await handle(inputFromRequest(request)))

	return { fetch, handle, config }
}
