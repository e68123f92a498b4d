/**
 * Join Tests - MaybeDone slots, join, joinAll
 */

import { describe, expect, it } from 'vitest'
import {
	failed,
	HttpError,
	join,
	joinAll,
	MaybeDone,
	ok,
	Pending,
	ProtocolViolation,
	Ready,
	ready,
} from '@sluice/core'
import { controlled, noopContext } from './helpers'

describe('MaybeDone', () => {
	it('should cache the value and never re-poll a finished task', () => {
		const source = controlled<number>()
		const slot = new MaybeDone(source.task)

		expect(slot.pollDone(noopContext)).toEqual(ok(false))
		source.resolve(9)
		expect(slot.pollDone(noopContext)).toEqual(ok(true))
		expect(slot.pollDone(noopContext)).toEqual(ok(true))
		expect(source.polls).toBe(2)
		expect(slot.isDone).toBe(true)
	})

	it('should hand the value out once', () => {
		const slot = new MaybeDone(ready('a'))
		slot.pollDone(noopContext)
		expect(slot.take()).toBe('a')
		expect(() => slot.take()).toThrow(ProtocolViolation)
		expect(() => slot.pollDone(noopContext)).toThrow(ProtocolViolation)
	})

	it('should refuse take() before completion', () => {
		const slot = new MaybeDone(controlled<number>().task)
		expect(() => slot.take()).toThrow("MaybeDone.take() called in state 'pending'")
	})

	it('should report failures and drop the task', () => {
		const error = new HttpError('broken', { status: 502 })
		const slot = new MaybeDone(failed<number>(error))
		expect(slot.pollDone(noopContext)).toEqual({ ok: false, error })
		expect(slot.isDone).toBe(false)
	})
})

describe('join', () => {
	it('should combine two ready tasks on the first poll', () => {
		const task = join(ready(1), ready('x'), (a, b) => `${a}${b}`)
		expect(task.poll(noopContext)).toEqual(Ready(ok('1x')))
		expect(() => task.poll(noopContext)).toThrow('join polled after it completed')
	})

	it('should poll both sides every cycle until each is done', () => {
		const a = controlled<number>()
		const b = controlled<string>()
		const task = join(a.task, b.task, (x, y) => [x, y])

		expect(task.poll(noopContext)).toBe(Pending)
		expect([a.polls, b.polls]).toEqual([1, 1])

		a.resolve(1)
		expect(task.poll(noopContext)).toBe(Pending)
		expect([a.polls, b.polls]).toEqual([2, 2])

		b.resolve('y')
		expect(task.poll(noopContext)).toEqual(Ready(ok([1, 'y'])))
		expect([a.polls, b.polls]).toEqual([2, 3])
	})

	it('should let the first declared failure win', () => {
		const first = new HttpError('first', { status: 400 })
		const b = controlled<number>()
		const task = join(failed<number>(first), b.task, (x, y) => x + y)

		expect(task.poll(noopContext)).toEqual(Ready({ ok: false, error: first }))
		expect(b.polls).toBe(0)
	})

	it('should fail as soon as the second side fails', () => {
		const a = controlled<number>()
		const second = new HttpError('second', { status: 409 })
		const task = join(a.task, failed<number>(second), (x, y) => x + y)

		expect(task.poll(noopContext)).toEqual(Ready({ ok: false, error: second }))
		expect(() => task.poll(noopContext)).toThrow(ProtocolViolation)
		expect(a.polls).toBe(1)
	})
})

describe('joinAll', () => {
	it('should keep declaration order whatever the completion order', () => {
		const tasks = [controlled<string>(), controlled<string>(), controlled<string>()]
		const task = joinAll(tasks.map((t) => t.task))

		expect(task.poll(noopContext)).toBe(Pending)
		tasks[2]?.resolve('c')
		tasks[0]?.resolve('a')
		expect(task.poll(noopContext)).toBe(Pending)
		tasks[1]?.resolve('b')
		expect(task.poll(noopContext)).toEqual(Ready(ok(['a', 'b', 'c'])))
		expect(tasks.map((t) => t.polls)).toEqual([2, 3, 2])
	})

	it('should resolve an empty list at once', () => {
		expect(joinAll<number>([]).poll(noopContext)).toEqual(Ready(ok([])))
	})

	it('should stop at the first failure', () => {
		const error = new HttpError('no', { status: 403 })
		const last = controlled<number>()
		const task = joinAll([ready(1), failed<number>(error), last.task])

		expect(task.poll(noopContext)).toEqual(Ready({ ok: false, error }))
		expect(last.polls).toBe(0)
		expect(() => task.poll(noopContext)).toThrow('joinAll polled after it completed')
	})
})
