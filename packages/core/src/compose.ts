/**
 * Composition utilities
 * Pure functions over anything that wraps a value into one of the same shape:
 * request handlers (middleware) and endpoints (endpoint wrappers) alike
 */

import type { ServerResponse } from './response'

/**
 * Transforms a value into another of the same type
 */
export type Layer<T> = (inner: T) => T

/**
 * Request handler - takes the request input and returns a response
 */
export type Handler<In = unknown> = (input: In) => ServerResponse | Promise<ServerResponse>

/**
 * Handler middleware
 */
export type Wrapper<In = unknown> = Layer<Handler<In>>

/**
 * Compose layers from left to right (outer to inner)
 * compose(a, b, c)(inner) = a(b(c(inner)))
 *
 * Example:
 *   compose(logging(), tracing())(handler)
 *   Request flow: logging -> tracing -> handler
 */
export const compose =
	<T>(...layers: Layer<T>[]): Layer<T> =>
	(inner) =>
		layers.reduceRight((acc, layer) => layer(acc), inner)

/**
 * Pipe layers from left to right (inner to outer)
 * pipe(a, b, c)(inner) = c(b(a(inner)))
 */
export const pipe =
	<T>(...layers: Layer<T>[]): Layer<T> =>
	(inner) =>
		layers.reduce((acc, layer) => layer(acc), inner)
