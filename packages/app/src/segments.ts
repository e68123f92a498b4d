/**
 * Segment Cursor
 *
 * Zero-copy iterator over the segments of a request path. Segments are
 * views (start/end offsets into the original string), still percent-encoded.
 *
 * Splitting is strictly on '/':
 *   "/"           -> no segments
 *   "/foo/bar"    -> "foo", "bar"
 *   "/foo/"       -> "foo"          (a trailing slash adds nothing)
 *   "/a//b"       -> "a", "", "b"   (empty segments are kept, not collapsed)
 */

export type Segment = {
	/** The full path this segment points into */
	readonly path: string
	/** Offset of the first character */
	readonly start: number
	/** Offset one past the last character */
	readonly end: number
	/** The segment text, percent-encoded as it arrived */
	readonly encoded: string
}

/**
 * Saved cursor state, restored when a sub-match fails
 */
export type CursorSnapshot = {
	readonly pos: number
	readonly popped: number
}

export class Segments {
	readonly path: string
	private pos: number
	private count: number

	constructor(path: string) {
		this.path = path.startsWith('/') ? path : `/${path}`
		this.pos = 1
		this.count = 0
	}

	/** Pop the next segment; undefined (repeatedly) once exhausted */
	next(): Segment | undefined {
		const { path, pos } = this
		if (pos >= path.length) return undefined

		const slash = path.indexOf('/', pos)
		const end = slash === -1 ? path.length : slash
		this.pos = slash === -1 ? path.length : slash + 1
		this.count++

		return { path, start: pos, end, encoded: path.slice(pos, end) }
	}

	/** The unconsumed suffix of the path, without its leading '/' */
	remainingPath(): string {
		return this.path.slice(this.pos)
	}

	/**
	 * Offset of the cursor in the path, in UTF-16 code units.
	 * Equals the byte offset for a percent-encoded (ASCII) path.
	 */
	position(): number {
		return this.pos
	}

	/** Number of segments popped so far */
	popped(): number {
		return this.count
	}

	isExhausted(): boolean {
		return this.pos >= this.path.length
	}

	/** Pop every remaining segment */
	drain(): void {
		while (this.next() !== undefined) {}
	}

	snapshot(): CursorSnapshot {
		return { pos: this.pos, popped: this.count }
	}

	restore(snapshot: CursorSnapshot): void {
		this.pos = snapshot.pos
		this.count = snapshot.popped
	}

	clone(): Segments {
		const copy = new Segments(this.path)
		copy.restore(this.snapshot())
		return copy
	}
}

/**
 * Encoded segments of a path, split exactly as the cursor splits it
 */
export const pathSegments = (path: string): string[] => {
	const cursor = new Segments(path)
	const out: string[] = []
	for (let segment = cursor.next(); segment !== undefined; segment = cursor.next()) {
		out.push(segment.encoded)
	}
	return out
}
