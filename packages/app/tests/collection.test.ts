/**
 * Collection Tests - all and optional
 */

import { describe, expect, it } from 'vitest'
import {
	all,
	and,
	createTestRunner,
	encoded,
	header,
	int,
	lazy,
	map,
	optional,
	orStrict,
	param,
	remains,
	str,
	value,
} from '@sluice/app'

const delay = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms))

describe('all', () => {
	it('should collect values in declaration order', async () => {
		const runner = createTestRunner(all([param(str), param(str), param(str)]))
		expect(await runner.apply('/a/b/c')).toEqual({ ok: true, value: ['a', 'b', 'c'] })
	})

	it('should keep order when later tasks finish first', async () => {
		const slow = lazy(async () => {
			await delay(5)
			return 'slow'
		})
		const runner = createTestRunner(all([slow, value('fast')]))
		expect(await runner.apply('/')).toEqual({ ok: true, value: ['slow', 'fast'] })
	})

	it('should produce an empty list for no endpoints', async () => {
		expect(await createTestRunner(all<string>([])).apply('/')).toEqual({ ok: true, value: [] })
	})

	it('should restore the cursor when one endpoint misses', async () => {
		const runner = createTestRunner(
			orStrict(
				all([param(str), param(str)]),
				map(remains(encoded), (rest) => [rest])
			)
		)
		expect(await runner.apply('/only')).toEqual({ ok: true, value: ['only'] })
	})
})

describe('optional', () => {
	it('should produce undefined when the endpoint misses', async () => {
		const runner = createTestRunner(optional(header('x-locale')))
		expect(await runner.apply('/')).toEqual({ ok: true, value: undefined })
		expect(await runner.apply({ url: '/', headers: { 'x-locale': 'de' } })).toEqual({
			ok: true,
			value: 'de',
		})
	})

	it('should leave the cursor alone after a failed match', async () => {
		const runner = createTestRunner(and(optional(param(int)), remains(encoded)))
		expect(await runner.applyRaw('/abc')).toEqual({ ok: true, value: [undefined, 'abc'] })
		expect(await runner.applyRaw('/12/x')).toEqual({ ok: true, value: [12, 'x'] })
	})
})
