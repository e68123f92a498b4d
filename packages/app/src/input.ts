/**
 * Request Input
 *
 * The read-only view of an incoming request that endpoints route on.
 * The body handle is the one movable part: it can be taken exactly once,
 * by whichever task claims it first.
 */

/**
 * Request body handle - chunks as they arrive
 */
export type RequestBody = AsyncIterable<Uint8Array>

export type InputInit = {
	/** HTTP method (default: GET) */
	readonly method?: string
	/** Absolute or origin-relative URL; path and query are taken from it */
	readonly url?: string
	/** Path, used when no url is given (default: /) */
	readonly path?: string
	/** Query string without the leading '?' */
	readonly query?: string
	readonly headers?: Readonly<Record<string, string>> | Headers
	readonly body?: string | Uint8Array | RequestBody | null
}

const encoder = new TextEncoder()

async function* chunks(...parts: Uint8Array[]): RequestBody {
	yield* parts
}

/**
 * Adapt a web ReadableStream into an async iterable of chunks
 */
export async function* readableStreamChunks(stream: ReadableStream<Uint8Array>): RequestBody {
	const reader = stream.getReader()
	try {
		for (;;) {
			const { done, value } = await reader.read()
			if (done) return
			yield value
		}
	} finally {
		reader.releaseLock()
	}
}

const toBody = (body: InputInit['body']): RequestBody => {
	if (body === undefined || body === null) return chunks()
	if (typeof body === 'string') return chunks(encoder.encode(body))
	if (body instanceof Uint8Array) return chunks(body)
	return body
}

const toHeaders = (headers: InputInit['headers']): Record<string, string> => {
	const out: Record<string, string> = {}
	if (headers === undefined) return out
	if (headers instanceof Headers) {
		headers.forEach((value, key) => {
			out[key.toLowerCase()] = value
		})
		return out
	}
	for (const [key, value] of Object.entries(headers)) {
		out[key.toLowerCase()] = value
	}
	return out
}

/**
 * Path and query of a URL. An origin-relative URL is split by hand, since
 * the URL parser reads a leading '//' as the start of a host.
 */
const splitUrl = (url: string): { path: string; query: string } => {
	if (!url.startsWith('/')) {
		const parsed = new URL(url, 'http://localhost')
		return { path: parsed.pathname, query: parsed.search.slice(1) }
	}
	const hash = url.indexOf('#')
	const target = hash === -1 ? url : url.slice(0, hash)
	const mark = target.indexOf('?')
	return mark === -1
		? { path: target, query: '' }
		: { path: target.slice(0, mark), query: target.slice(mark + 1) }
}

export class Input {
	readonly method: string
	readonly path: string
	readonly query: string
	readonly headers: Readonly<Record<string, string>>
	private body: RequestBody | null

	constructor(init: InputInit = {}) {
		this.method = (init.method ?? 'GET').toUpperCase()

		if (init.url !== undefined) {
			const target = splitUrl(init.url)
			this.path = target.path
			this.query = target.query
		} else {
			this.path = init.path ?? '/'
			this.query = init.query ?? ''
		}

		this.headers = toHeaders(init.headers)
		this.body = toBody(init.body)
	}

	/** Header value by case-insensitive name */
	header(name: string): string | undefined {
		return this.headers[name.toLowerCase()]
	}

	/** Whether some task already claimed the body */
	get isBodyTaken(): boolean {
		return this.body === null
	}

	/**
	 * Move the body out of the input.
	 * A request without a body still has an (empty) one to take; undefined means it was taken.
	 */
	takeBody(): RequestBody | undefined {
		const body = this.body
		this.body = null
		return body ?? undefined
	}
}

export const createInput = (init: InputInit = {}): Input => new Input(init)

/**
 * Build an Input from a Fetch API Request, streaming its body
 */
export const inputFromRequest = (request: Request): Input =>
	new Input({
		method: request.method,
		url: request.url,
		headers: request.headers,
		body: request.body ? readableStreamChunks(request.body) : null,
	})
