/**
 * Method Guard Tests - 405 reporting and verb merging
 */

import { describe, expect, it } from 'vitest'
import {
	and,
	createTestRunner,
	encoded,
	get,
	onMethod,
	or,
	orStrict,
	path,
	post,
	prefix,
	remains,
} from '@sluice/app'
import { verbs } from '@sluice/core'

describe('method guards', () => {
	const users = get(path('/users'))

	it('should match under the guarded method', async () => {
		expect(await createTestRunner(users).applyRaw('/users')).toEqual({ ok: true, value: [] })
	})

	it('should accept lower-case request methods', async () => {
		const runner = createTestRunner(users)
		expect((await runner.applyRaw({ method: 'get', url: '/users' })).ok).toBe(true)
	})

	it('should report method-not-allowed when the route matches', async () => {
		expect(await createTestRunner(users).applyRaw({ method: 'POST', url: '/users' })).toEqual({
			ok: false,
			error: { kind: 'method-not-allowed', allowed: verbs('GET') },
		})
	})

	it('should report not-matched when the route misses', async () => {
		expect(await createTestRunner(users).applyRaw('/other')).toEqual({
			ok: false,
			error: { kind: 'not-matched' },
		})
	})

	it('should accept any of several methods', async () => {
		const runner = createTestRunner(onMethod(['PUT', 'PATCH'], path('/doc')))
		expect((await runner.applyRaw({ method: 'PATCH', url: '/doc' })).ok).toBe(true)
		expect(await runner.applyRaw({ method: 'GET', url: '/doc' })).toEqual({
			ok: false,
			error: { kind: 'method-not-allowed', allowed: verbs('PUT', 'PATCH') },
		})
	})

	it('should merge allowed methods across alternatives', async () => {
		const runner = createTestRunner(or(get(path('/users')), post(path('/users'))))
		const res = await runner.perform({ method: 'DELETE', url: '/users' })

		expect(res.status).toBe(405)
		expect(res.headers.allow).toBe('GET, POST')
	})

	it('should restore the cursor for the next alternative', async () => {
		const runner = createTestRunner(
			orStrict(post(and(prefix('/a'), remains(encoded))), remains(encoded))
		)
		expect(await runner.apply('/a/b')).toEqual({ ok: true, value: 'a/b' })
	})
})
