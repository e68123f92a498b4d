/**
 * Percent-encoded path text
 *
 * Path segments stay percent-encoded while routing. Literals are encoded
 * once up front and compared byte for byte; parameters are decoded by the
 * parser that asks for them.
 */

import { err, ok, type Result } from '@sluice/core'
import { pathSegments } from './segments'

// ============================================================================
// Encoding
// ============================================================================

// Printable ASCII that still gets escaped inside a segment
const ESCAPED = new Set([' ', '"', '#', '<', '>', '`', '?', '{', '}', '/'])

const encoder = new TextEncoder()

const hex = (byte: number): string => `%${byte.toString(16).toUpperCase().padStart(2, '0')}`

/**
 * Percent-encode a literal segment.
 * Controls, non-ASCII bytes, space, `"#<>`?{}` and `/` are escaped; everything else is kept.
 */
export const encodeSegment = (segment: string): string => {
	let out = ''
	for (const byte of encoder.encode(segment)) {
		const char = String.fromCharCode(byte)
		out += byte < 0x20 || byte >= 0x7f || ESCAPED.has(char) ? hex(byte) : char
	}
	return out
}

/**
 * Decode percent-escapes. Malformed escapes or invalid UTF-8 yield an error.
 * `+` is left alone: it only means space in query strings.
 */
export const decodeSegment = (encoded: string): Result<string, string> => {
	try {
		return ok(decodeURIComponent(encoded))
	} catch {
		return err(`invalid percent-encoding: ${encoded}`)
	}
}

// ============================================================================
// Parsers
// ============================================================================

/**
 * Why a conversion failed.
 * `skip` marks failures that mean "not this route" rather than "bad request".
 */
export type ParseFailure = {
	readonly reason: string
	readonly skip?: boolean
}

/**
 * Converts percent-encoded text into a value
 */
export type SegmentParser<T> = (encoded: string) => Result<T, ParseFailure>

const fail = (reason: string, skip = false): Result<never, ParseFailure> => err({ reason, skip })

const decoded = <T>(
	encoded: string,
	convert: (text: string) => Result<T, ParseFailure>
): Result<T, ParseFailure> => {
	const text = decodeSegment(encoded)
	return text.ok ? convert(text.value) : fail(text.error)
}

/** The raw, still-encoded text */
export const encoded: SegmentParser<string> = (text) => ok(text)

/** Percent-decoded string */
export const str: SegmentParser<string> = (text) => decoded(text, ok)

/** Base-10 safe integer */
export const int: SegmentParser<number> = (text) =>
	decoded(text, (value) => {
		const n = /^[+-]?\d+$/.test(value) ? Number(value) : Number.NaN
		return Number.isSafeInteger(n) ? ok(n) : fail(`expected an integer, got '${value}'`)
	})

/** Finite number */
export const float: SegmentParser<number> = (text) =>
	decoded(text, (value) => {
		const n = value.trim() === '' ? Number.NaN : Number(value)
		return Number.isFinite(n) ? ok(n) : fail(`expected a number, got '${value}'`)
	})

/** `true` or `false` */
export const bool: SegmentParser<boolean> = (text) =>
	decoded(text, (value) =>
		value === 'true' ? ok(true) : value === 'false' ? ok(false) : fail(`expected a boolean, got '${value}'`)
	)

/**
 * Decoded segments of a remaining path, split the way the cursor splits it
 */
export const segmentList: SegmentParser<string[]> = (text) => {
	const out: string[] = []
	for (const part of pathSegments(text)) {
		const value = decodeSegment(part)
		if (!value.ok) return fail(value.error)
		out.push(value.value)
	}
	return ok(out)
}

/**
 * Turn a parser's failures into skips, so a sibling route gets a chance instead of a 400
 */
export const orSkip =
	<T>(parser: SegmentParser<T>): SegmentParser<T> =>
	(text) => {
		const result = parser(text)
		return result.ok ? result : fail(result.error.reason, true)
	}
