/**
 * Routing Context
 *
 * Handed to every Endpoint.apply() call. Borrows the request input and owns
 * the segment cursor for the duration of routing. Once the top-level apply
 * returns the context is closed: touching the cursor afterwards is a
 * ProtocolViolation, since tasks must never see routing state.
 */

import { ProtocolViolation } from '@sluice/core'
import type { Input } from './input'
import { type CursorSnapshot, type Segment, Segments } from './segments'

export class ApplyContext {
	readonly input: Input
	private readonly cursor: Segments
	private closed = false

	constructor(input: Input, cursor: Segments = new Segments(input.path)) {
		this.input = input
		this.cursor = cursor
	}

	private live(): Segments {
		if (this.closed) {
			throw new ProtocolViolation('routing context used after routing finished')
		}
		return this.cursor
	}

	get isClosed(): boolean {
		return this.closed
	}

	/** Pop the next path segment */
	nextSegment(): Segment | undefined {
		return this.live().next()
	}

	/** The unconsumed suffix of the path, without its leading '/' */
	remainingPath(): string {
		return this.live().remainingPath()
	}

	/** Pop every remaining segment */
	drain(): void {
		this.live().drain()
	}

	isExhausted(): boolean {
		return this.live().isExhausted()
	}

	/** Number of segments popped so far */
	popped(): number {
		return this.live().popped()
	}

	snapshot(): CursorSnapshot {
		return this.live().snapshot()
	}

	restore(snapshot: CursorSnapshot): void {
		this.live().restore(snapshot)
	}

	/** End routing; the cursor is unusable from here on */
	close(): void {
		this.closed = true
	}
}

export const createApplyContext = (input: Input): ApplyContext => new ApplyContext(input)
