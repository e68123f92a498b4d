/**
 * Segments Tests - cursor splitting and backtracking
 */

import { describe, expect, it } from 'vitest'
import { pathSegments, Segments } from '@sluice/app'

describe('pathSegments', () => {
	it('should produce no segments for the root path', () => {
		expect(pathSegments('/')).toEqual([])
	})

	it('should split on every slash', () => {
		expect(pathSegments('/foo/bar')).toEqual(['foo', 'bar'])
	})

	it('should ignore a trailing slash', () => {
		expect(pathSegments('/foo/')).toEqual(['foo'])
	})

	it('should keep empty segments', () => {
		expect(pathSegments('//')).toEqual([''])
		expect(pathSegments('/a//b')).toEqual(['a', '', 'b'])
	})

	it('should treat a missing leading slash as present', () => {
		expect(pathSegments('foo/bar')).toEqual(['foo', 'bar'])
	})

	it('should leave percent-escapes alone', () => {
		expect(pathSegments('/a%20b/c%2Fd')).toEqual(['a%20b', 'c%2Fd'])
	})
})

describe('Segments', () => {
	it('should return views into the original path', () => {
		const cursor = new Segments('/users/7')
		expect(cursor.next()).toEqual({ path: '/users/7', start: 1, end: 6, encoded: 'users' })
		expect(cursor.next()).toEqual({ path: '/users/7', start: 7, end: 8, encoded: '7' })
	})

	it('should keep returning undefined once exhausted', () => {
		const cursor = new Segments('/a')
		cursor.next()
		expect(cursor.isExhausted()).toBe(true)
		expect(cursor.next()).toBeUndefined()
		expect(cursor.next()).toBeUndefined()
		expect(cursor.popped()).toBe(1)
	})

	it('should expose the unconsumed rest of the path', () => {
		const cursor = new Segments('/a/b/c')
		cursor.next()
		expect(cursor.remainingPath()).toBe('b/c')
		expect(cursor.position()).toBe(3)
	})

	it('should count positions over the encoded path', () => {
		const cursor = new Segments('/caf%C3%A9/x')
		cursor.next()
		expect(cursor.position()).toBe(11)
	})

	it('should drain every remaining segment', () => {
		const cursor = new Segments('/a/b/c')
		cursor.drain()
		expect(cursor.popped()).toBe(3)
		expect(cursor.remainingPath()).toBe('')
	})

	it('should restore a snapshot', () => {
		const cursor = new Segments('/a/b/c')
		cursor.next()
		const saved = cursor.snapshot()
		cursor.next()
		cursor.next()

		cursor.restore(saved)
		expect(cursor.popped()).toBe(1)
		expect(cursor.next()?.encoded).toBe('b')
	})

	it('should clone independently', () => {
		const cursor = new Segments('/a/b')
		cursor.next()
		const copy = cursor.clone()
		copy.next()

		expect(copy.isExhausted()).toBe(true)
		expect(cursor.isExhausted()).toBe(false)
		expect(cursor.next()?.encoded).toBe('b')
	})
})
