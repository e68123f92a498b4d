/**
 * Response Tests - constructors and error bodies
 */

import { describe, expect, it } from 'vitest'
import {
	badRequest,
	errorResponse,
	HttpError,
	httpErrorResponse,
	isServerResponse,
	isStreamingBody,
	json,
	methodNotAllowed,
	noContent,
	notFound,
	redirect,
	response,
	serverError,
	text,
	verbs,
} from '@sluice/core'

describe('Response helpers', () => {
	it('should build raw responses', () => {
		expect(response()).toEqual({ status: 200, headers: {}, body: null })
		expect(response('hi', { status: 201, headers: { 'x-a': '1' } })).toEqual({
			status: 201,
			headers: { 'x-a': '1' },
			body: 'hi',
		})
	})

	it('should build JSON responses', () => {
		expect(json({ a: 1 })).toEqual({
			status: 200,
			headers: { 'content-type': 'application/json' },
			body: '{"a":1}',
		})
	})

	it('should build text responses', () => {
		expect(text('hello', { status: 202 })).toEqual({
			status: 202,
			headers: { 'content-type': 'text/plain' },
			body: 'hello',
		})
	})

	it('should build empty and redirect responses', () => {
		expect(noContent()).toEqual({ status: 204, headers: {}, body: null })
		expect(redirect('/login')).toEqual({ status: 302, headers: { location: '/login' }, body: null })
		expect(redirect('/new', 308).status).toBe(308)
	})

	it('should recognise responses structurally', () => {
		expect(isServerResponse(text('x'))).toBe(true)
		expect(isServerResponse({ status: 200 })).toBe(false)
		expect(isServerResponse('x')).toBe(false)
	})

	it('should detect streaming bodies', () => {
		async function* chunks() {
			yield new Uint8Array([1])
		}
		expect(isStreamingBody(chunks())).toBe(true)
		expect(isStreamingBody('x')).toBe(false)
		expect(isStreamingBody(Buffer.from('x'))).toBe(false)
		expect(isStreamingBody(null)).toBe(false)
	})
})

describe('Error responses', () => {
	it('should omit absent code and details', () => {
		expect(errorResponse('x', 418).body).toBe('{"error":"x"}')
		expect(errorResponse('x', 422, 'INVALID', { field: 'name' }).body).toBe(
			'{"error":"x","code":"INVALID","details":{"field":"name"}}'
		)
	})

	it('should render the standard errors', () => {
		expect(notFound()).toEqual({
			status: 404,
			headers: { 'content-type': 'application/json' },
			body: '{"error":"Not Found","code":"NOT_FOUND"}',
		})
		expect(badRequest('missing query').body).toBe('{"error":"missing query","code":"BAD_REQUEST"}')
		expect(serverError().status).toBe(500)
	})

	it('should list allowed methods on 405', () => {
		const res = methodNotAllowed(verbs('POST', 'GET'))
		expect(res.status).toBe(405)
		expect(res.headers).toEqual({ 'content-type': 'application/json', allow: 'GET, POST' })
		expect(res.body).toBe('{"error":"Method Not Allowed","code":"METHOD_NOT_ALLOWED"}')
	})

	it('should render client errors with their message and details', () => {
		const res = httpErrorResponse(new HttpError('nope', { status: 400, details: { field: 'x' } }))
		expect(res.status).toBe(400)
		expect(res.body).toBe('{"error":"nope","code":"BAD_REQUEST","details":{"field":"x"}}')
	})

	it('should hide server error messages unless exposed', () => {
		const error = new HttpError('db down', { status: 503 })
		expect(httpErrorResponse(error).body).toBe(
			'{"error":"Internal Server Error","code":"HTTP_ERROR"}'
		)
		expect(httpErrorResponse(error, true).body).toBe('{"error":"db down","code":"HTTP_ERROR"}')
		expect(httpErrorResponse(error).status).toBe(503)
	})
})
