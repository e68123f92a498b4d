/**
 * Driver Tests - routing context lifetime and the poll loop
 */

import { describe, expect, it } from 'vitest'
import {
	ApplyContext,
	applyRequest,
	createInput,
	endpoint,
	err,
	notMatched,
	ok,
	Pending,
	ProtocolViolation,
	Ready,
	ready,
	runEndpoint,
	runTask,
	type Task,
} from '@sluice/app'
import { promiseTask } from '@sluice/core'

describe('ApplyContext', () => {
	it('should hand out segments of the input path', () => {
		const cx = new ApplyContext(createInput({ path: '/a/b' }))
		expect(cx.nextSegment()?.encoded).toBe('a')
		expect(cx.popped()).toBe(1)
		expect(cx.remainingPath()).toBe('b')
		expect(cx.isExhausted()).toBe(false)
	})

	it('should refuse any use after close', () => {
		const cx = new ApplyContext(createInput({ path: '/a' }))
		cx.close()
		expect(cx.isClosed).toBe(true)
		expect(() => cx.nextSegment()).toThrow(ProtocolViolation)
		expect(() => cx.snapshot()).toThrow('routing context used after routing finished')
	})
})

describe('applyRequest', () => {
	it('should close the context once routing returns', () => {
		let seen: ApplyContext | undefined
		const spy = endpoint<[]>((cx) => {
			seen = cx
			return ok(ready<[]>([]))
		})

		expect(applyRequest(spy, createInput()).ok).toBe(true)
		expect(seen?.isClosed).toBe(true)
	})

	it('should close the context when apply throws', () => {
		let seen: ApplyContext | undefined
		const broken = endpoint<[]>((cx) => {
			seen = cx
			throw new Error('apply failed')
		})

		expect(() => applyRequest(broken, createInput())).toThrow('apply failed')
		expect(seen?.isClosed).toBe(true)
	})
})

describe('runTask', () => {
	it('should resolve a ready task', async () => {
		expect(await runTask(ready(1))).toEqual(ok(1))
	})

	it('should wait for promises', async () => {
		expect(await runTask(promiseTask(() => Promise.resolve(5)))).toEqual(ok(5))
	})

	it('should poll again once per wake cycle', async () => {
		let polls = 0
		const task: Task<string> = {
			poll: (cx) => {
				polls++
				if (polls > 1) return Ready(ok('woken'))
				cx.wake()
				cx.wake()
				cx.wake()
				return Pending
			},
		}

		expect(await runTask(task)).toEqual(ok('woken'))
		expect(polls).toBe(2)
	})

	it('should reject on a protocol violation', async () => {
		const task: Task<never> = {
			poll: () => {
				throw new ProtocolViolation('polled twice')
			},
		}
		await expect(runTask(task)).rejects.toThrow('polled twice')
	})
})

describe('runEndpoint', () => {
	it('should return routing failures without running anything', async () => {
		const miss = endpoint<[]>(() => err(notMatched()))
		expect(await runEndpoint(miss, createInput())).toEqual({
			ok: false,
			error: { kind: 'not-matched' },
		})
	})
})
