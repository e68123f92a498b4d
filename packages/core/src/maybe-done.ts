/**
 * MaybeDone - poll-once-cache-result slot
 *
 * Shared by join() and joinAll(). A slot is polled until its task completes,
 * then holds the value until taken; a completed task is never polled again.
 */

import { ProtocolViolation } from './error'
import type { HttpError } from './error'
import { err, ok, type Result } from './poll'
import type { Task, TaskContext } from './task'

type Slot<T> =
	| { readonly state: 'pending'; readonly task: Task<T> }
	| { readonly state: 'done'; readonly value: T }
	| { readonly state: 'taken' }

export class MaybeDone<T> {
	private slot: Slot<T>

	constructor(task: Task<T>) {
		this.slot = { state: 'pending', task }
	}

	get isDone(): boolean {
		return this.slot.state === 'done'
	}

	/**
	 * Advance the slot.
	 * ok(true) once a value is cached, ok(false) while pending, err on task failure.
	 */
	pollDone(cx: TaskContext): Result<boolean, HttpError> {
		const slot = this.slot
		switch (slot.state) {
			case 'done':
				return ok(true)
			case 'taken':
				throw new ProtocolViolation('MaybeDone polled after its value was taken')
			case 'pending': {
				const polled = slot.task.poll(cx)
				if (!polled.ready) return ok(false)
				if (!polled.value.ok) {
					this.slot = { state: 'taken' }
					return err(polled.value.error)
				}
				this.slot = { state: 'done', value: polled.value.value }
				return ok(true)
			}
		}
	}

	take(): T {
		const slot = this.slot
		if (slot.state !== 'done') {
			throw new ProtocolViolation(`MaybeDone.take() called in state '${slot.state}'`)
		}
		this.slot = { state: 'taken' }
		return slot.value
	}

	/** Drop whatever the slot holds */
	clear(): void {
		this.slot = { state: 'taken' }
	}
}
