/**
 * Path endpoints
 *
 * Primitives that consume segments from the cursor, and `path()` which
 * builds a matcher from a route pattern with typed parameters.
 *
 * @example
 * ```typescript
 * path('/users/:id')              // Endpoint<[string]>
 * path('/files/*')                // Endpoint<[string]> (the rest of the path)
 * and(segment('posts'), param(int), eos())  // Endpoint<[number]>
 * ```
 */

import { err, ok, ready } from '@sluice/core'
import { type ApplyResult, invalidRequest, notMatched } from './apply-error'
import type { ApplyContext } from './context'
import { encodeSegment, type SegmentParser, str } from './encoded'
import { type Endpoint, endpoint } from './endpoint'
import { pathSegments } from './segments'

// ============================================================================
// Type-Level Pattern Parsing
// ============================================================================

/** Output of a single pattern segment */
type PartOutput<S extends string> = S extends `:${string}` ? [string] : S extends '*' ? [string] : []

type PartsOutput<S extends string> = S extends `${infer Head}/${infer Tail}`
	? [...PartOutput<Head>, ...PartsOutput<Tail>]
	: PartOutput<S>

/** Output tuple of `path(pattern)`: one string per `:param` and `*`, in order */
export type PathOutput<P extends string> = string extends P
	? string[]
	: P extends `/${infer Rest}`
		? PartsOutput<Rest>
		: PartsOutput<P>

// ============================================================================
// Matching
// ============================================================================

const parseFailure = (reason: string, skip: boolean | undefined) =>
	skip ? notMatched() : invalidRequest(reason)

/** Pop one segment equal to the (already encoded) literal */
const matchLiteral = (cx: ApplyContext, encoded: string): ApplyResult<undefined> => {
	const saved = cx.snapshot()
	const next = cx.nextSegment()
	if (next !== undefined && next.encoded === encoded) return ok(undefined)
	cx.restore(saved)
	return err(notMatched())
}

const matchParam = <T>(cx: ApplyContext, parser: SegmentParser<T>): ApplyResult<T> => {
	const saved = cx.snapshot()
	const next = cx.nextSegment()
	if (next === undefined) return err(notMatched())
	const parsed = parser(next.encoded)
	if (parsed.ok) return parsed
	cx.restore(saved)
	return err(parseFailure(parsed.error.reason, parsed.error.skip))
}

/** Drains the cursor whether or not the conversion succeeds */
const matchRemains = <T>(cx: ApplyContext, parser: SegmentParser<T>): ApplyResult<T> => {
	const rest = cx.remainingPath()
	cx.drain()
	const parsed = parser(rest)
	return parsed.ok ? parsed : err(parseFailure(parsed.error.reason, parsed.error.skip))
}

// ============================================================================
// Primitives
// ============================================================================

/**
 * Match one segment equal to `literal`.
 * The literal is percent-encoded once; segments are compared encoded.
 */
export const segment = (literal: string): Endpoint<[]> => {
	const encoded = encodeSegment(literal)
	return endpoint((cx) => {
		const matched = matchLiteral(cx, encoded)
		return matched.ok ? ok(ready<[]>([])) : matched
	})
}

/** Match only when no segment remains */
export const eos = (): Endpoint<[]> =>
	endpoint((cx) => (cx.isExhausted() ? ok(ready<[]>([])) : err(notMatched())))

/**
 * Convert the next segment with `parser`.
 * No segment left: not matched. Conversion failure: invalid request, or
 * not matched when the parser marks it `skip`.
 */
export const param = <T>(parser: SegmentParser<T>): Endpoint<[T]> =>
	endpoint((cx) => {
		const matched = matchParam(cx, parser)
		return matched.ok ? ok(ready<[T]>([matched.value])) : matched
	})

/** Convert the whole remaining path with `parser`, consuming every segment */
export const remains = <T>(parser: SegmentParser<T>): Endpoint<[T]> =>
	endpoint((cx) => {
		const matched = matchRemains(cx, parser)
		return matched.ok ? ok(ready<[T]>([matched.value])) : matched
	})

// ============================================================================
// Patterns
// ============================================================================

type Step =
	| { readonly kind: 'literal'; readonly encoded: string }
	| { readonly kind: 'param' }
	| { readonly kind: 'rest' }

const compile = (pattern: string): Step[] => {
	const parts = pathSegments(pattern)
	return parts.map((part, index): Step => {
		if (part === '*') {
			if (index !== parts.length - 1) {
				throw new Error(`wildcard must be the last segment of '${pattern}'`)
			}
			return { kind: 'rest' }
		}
		if (part.startsWith(':')) return { kind: 'param' }
		return { kind: 'literal', encoded: encodeSegment(part) }
	})
}

const matchStep = (cx: ApplyContext, step: Step): ApplyResult<string | undefined> => {
	switch (step.kind) {
		case 'literal':
			return matchLiteral(cx, step.encoded)
		case 'param':
			return matchParam(cx, str)
		case 'rest':
			return matchRemains(cx, str)
	}
}

const route = <P extends string>(pattern: P, exact: boolean): Endpoint<PathOutput<P>> => {
	const steps = compile(pattern)
	const arity = steps.filter((step) => step.kind !== 'literal').length
	const isOutput = (values: unknown): values is PathOutput<P> =>
		Array.isArray(values) && values.length === arity

	return endpoint((cx) => {
		const saved = cx.snapshot()
		const values: string[] = []

		for (const step of steps) {
			const matched = matchStep(cx, step)
			if (!matched.ok) {
				cx.restore(saved)
				return matched
			}
			if (matched.value !== undefined) values.push(matched.value)
		}

		if (exact && !cx.isExhausted()) {
			cx.restore(saved)
			return err(notMatched())
		}
		if (!isOutput(values)) {
			throw new Error(`pattern '${pattern}' produced ${values.length} values, expected ${arity}`)
		}
		return ok(ready(values))
	})
}

/**
 * Match the whole path against a pattern.
 * `:name` captures one decoded segment, a trailing `*` the decoded rest of the path.
 */
export const path = <P extends string>(pattern: P): Endpoint<PathOutput<P>> => route(pattern, true)

/** Like `path()`, but segments may remain for the endpoints that follow */
export const prefix = <P extends string>(pattern: P): Endpoint<PathOutput<P>> => route(pattern, false)
