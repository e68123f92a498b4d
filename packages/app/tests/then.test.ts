/**
 * Chaining Tests - thenResult, andThen, orElse, map, mapErr
 */

import { describe, expect, it } from 'vitest'
import {
	andThen,
	createTestRunner,
	HttpError,
	int,
	map,
	mapErr,
	orElse,
	param,
	path,
	ready,
	reject,
	thenResult,
} from '@sluice/app'

describe('map', () => {
	it('should transform the output', async () => {
		const runner = createTestRunner(map(path('/users/:id'), (id) => Number(id)))
		expect(await runner.apply('/users/7')).toEqual({ ok: true, value: 7 })
	})

	it('should pass routing failures through', async () => {
		const runner = createTestRunner(map(path('/users/:id'), (id) => Number(id)))
		expect(await runner.apply('/posts/7')).toEqual({ ok: false, error: { kind: 'not-matched' } })
	})
})

describe('andThen', () => {
	it('should continue with a task', async () => {
		const runner = createTestRunner(andThen(param(int), (n) => ready(n * 2)))
		expect(await runner.apply('/21')).toEqual({ ok: true, value: 42 })
	})

	it('should continue with a promise', async () => {
		const runner = createTestRunner(andThen(param(int), async (n) => n + 1))
		expect(await runner.apply('/1')).toEqual({ ok: true, value: 2 })
	})

	it('should not run the transform when routing misses', async () => {
		let calls = 0
		const runner = createTestRunner(
			andThen(path('/a'), () => {
				calls++
				return ready('done')
			})
		)

		expect((await runner.apply('/b')).ok).toBe(false)
		expect(calls).toBe(0)
	})

	it('should skip the transform on a runtime failure', async () => {
		let calls = 0
		const runner = createTestRunner(
			andThen(reject(() => new HttpError('locked', { status: 423 })), () => {
				calls++
				return ready('done')
			})
		)

		const result = await runner.apply('/')
		if (result.ok) throw new Error('expected a failure')
		expect(result.error).toMatchObject({ status: 423 })
		expect(calls).toBe(0)
	})
})

describe('thenResult', () => {
	it('should see failures as results', async () => {
		const runner = createTestRunner(
			thenResult(reject(() => new HttpError('missing', { status: 404 })), (result) =>
				ready(result.ok ? 0 : result.error.status)
			)
		)
		expect(await runner.apply('/')).toEqual({ ok: true, value: 404 })
	})

	it('should see successes as results', async () => {
		const runner = createTestRunner(
			thenResult(param(int), (result) => ready(result.ok ? result.value[0] : -1))
		)
		expect(await runner.apply('/5')).toEqual({ ok: true, value: 5 })
	})
})

describe('orElse', () => {
	it('should recover from a runtime failure', async () => {
		const runner = createTestRunner(
			orElse(reject<[string]>(() => new HttpError('down', { status: 503 })), (error) =>
				ready<[string]>([`recovered ${error.status}`])
			)
		)
		expect(await runner.apply('/')).toEqual({ ok: true, value: 'recovered 503' })
	})
})

describe('mapErr', () => {
	it('should replace the runtime error', async () => {
		const runner = createTestRunner(
			mapErr(
				reject(() => new Error('raw')),
				(error) => new HttpError(`wrapped ${error.message}`, { status: 502 })
			)
		)
		const result = await runner.applyRaw('/')
		if (result.ok) throw new Error('expected a failure')
		expect(result.error).toMatchObject({ status: 502, message: 'wrapped raw' })
	})
})
