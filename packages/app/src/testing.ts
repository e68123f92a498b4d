/**
 * Test runner
 *
 * Drives an endpoint in process, without a server. Requests are a URL
 * (GET) or a full InputInit.
 *
 * @example
 * ```typescript
 * const runner = createTestRunner(get(path('/users/:id')))
 * await runner.apply('/users/7')          // { ok: true, value: '7' }
 * await runner.perform({ url: '/users' }) // 404 ServerResponse
 * ```
 */

import {
	type HttpError,
	isStreamingBody,
	ok,
	type Result,
	type ServerResponse,
	type Task,
} from '@sluice/core'
import type { ApplyError, ApplyResult } from './apply-error'
import { createApp } from './app'
import type { Endpoint, Tuple } from './endpoint'
import { Input, type InputInit } from './input'
import type { Responder } from './responder'
import { applyRequest, runEndpoint } from './run'

export type TestRequest = string | InputInit

export type TestRunnerOptions<T extends Tuple> = {
	/** Headers added to every request unless the request sets them */
	readonly defaultHeaders?: Readonly<Record<string, string>>
	/** Responder used by perform() (default: defaultResponder) */
	readonly responder?: Responder<T>
}

export class TestRunner<T extends Tuple> {
	readonly endpoint: Endpoint<T>
	private readonly options: TestRunnerOptions<T>

	constructor(endpoint: Endpoint<T>, options: TestRunnerOptions<T> = {}) {
		this.endpoint = endpoint
		this.options = options
	}

	/** Build the Input a request would produce */
	input(request: TestRequest): Input {
		const init = typeof request === 'string' ? { url: request } : request
		const headers: Record<string, string> = { ...this.options.defaultHeaders }
		const given = init.headers instanceof Headers ? Object.fromEntries(init.headers) : init.headers
		for (const [key, value] of Object.entries(given ?? {})) {
			headers[key.toLowerCase()] = value
		}
		return new Input({ ...init, headers })
	}

	/** Routing only: the ApplyResult, with the task left unpolled */
	route(request: TestRequest): ApplyResult<Task<T>> {
		return applyRequest(this.endpoint, this.input(request))
	}

	/** Route and run, keeping the output tuple as is */
	applyRaw(request: TestRequest): Promise<Result<T, ApplyError | HttpError>> {
		return runEndpoint(this.endpoint, this.input(request))
	}

	/** Route and run a single-value endpoint, unwrapping its value */
	async apply<V>(
		this: TestRunner<[V]>,
		request: TestRequest
	): Promise<Result<V, ApplyError | HttpError>> {
		const result = await this.applyRaw(request)
		return result.ok ? ok(result.value[0]) : result
	}

	/** Full round trip through the responder */
	perform(request: TestRequest): Promise<ServerResponse> {
		const { responder } = this.options
		const app = createApp({ endpoint: this.endpoint, responder, log: () => {} })
		return Promise.resolve(app.handle(this.input(request)))
	}
}

export const createTestRunner = <T extends Tuple>(
	endpoint: Endpoint<T>,
	options: TestRunnerOptions<T> = {}
): TestRunner<T> => new TestRunner(endpoint, options)

/**
 * Read a ServerResponse body as text, draining streams
 */
export const readResponseBody = async (response: ServerResponse): Promise<string> => {
	const { body } = response
	if (body === null) return ''
	if (typeof body === 'string') return body
	if (!isStreamingBody(body)) return body.toString('utf8')

	const decoder = new TextDecoder()
	let out = ''
	for await (const chunk of body) {
		out += decoder.decode(chunk, { stream: true })
	}
	return out + decoder.decode()
}
