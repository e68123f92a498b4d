/**
 * Compose Tests - layer ordering
 */

import { describe, expect, it } from 'vitest'
import { compose, type Layer, pipe } from '@sluice/core'

const named =
	(name: string): Layer<string> =>
	(inner) =>
		`${name}(${inner})`

describe('compose', () => {
	it('should apply the first layer outermost', () => {
		expect(compose(named('a'), named('b'))('x')).toBe('a(b(x))')
	})

	it('should be the identity with no layers', () => {
		expect(compose<string>()('x')).toBe('x')
	})
})

describe('pipe', () => {
	it('should apply the first layer innermost', () => {
		expect(pipe(named('a'), named('b'))('x')).toBe('b(a(x))')
	})
})
