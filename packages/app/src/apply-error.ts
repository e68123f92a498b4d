/**
 * Routing Errors
 *
 * ApplyError is produced only while routing, by Endpoint.apply(). Sibling
 * combinators recover from it (or, orStrict) and merge it by precedence:
 *
 *   not-matched        ⊕ not-matched        = not-matched
 *   not-matched        ⊕ method-not-allowed = method-not-allowed
 *   method-not-allowed ⊕ method-not-allowed = method-not-allowed (union of verbs)
 *   anything           ⊕ invalid-request    = invalid-request
 *
 * A request that reached a route but is malformed beats every other outcome.
 */

import {
	allowHeader,
	badRequest,
	HttpError,
	methodNotAllowed,
	notFound,
	type Result,
	type ServerResponse,
	unionVerbs,
	type Verbs,
	verbList,
} from '@sluice/core'

// ============================================================================
// Types
// ============================================================================

export type ApplyError =
	| { readonly kind: 'not-matched' }
	| { readonly kind: 'method-not-allowed'; readonly allowed: Verbs }
	| { readonly kind: 'invalid-request'; readonly reason: string; readonly cause?: unknown }

export type ApplyResult<T> = Result<T, ApplyError>

// ============================================================================
// Constructors
// ============================================================================

const NOT_MATCHED: ApplyError = Object.freeze({ kind: 'not-matched' })

export const notMatched = (): ApplyError => NOT_MATCHED

export const methodNotAllowedError = (allowed: Verbs): ApplyError => ({
	kind: 'method-not-allowed',
	allowed,
})

export const invalidRequest = (reason: string, cause?: unknown): ApplyError =>
	cause === undefined ? { kind: 'invalid-request', reason } : { kind: 'invalid-request', reason, cause }

export const missingHeader = (name: string): ApplyError => invalidRequest(`missing header: \`${name}'`)

export const missingQuery = (): ApplyError => invalidRequest('missing query')

// ============================================================================
// Merge
// ============================================================================

/**
 * Combine the failures of two alternatives into the one worth reporting
 */
export const mergeApplyErrors = (left: ApplyError, right: ApplyError): ApplyError => {
	if (left.kind === 'invalid-request') return left
	if (right.kind === 'invalid-request') return right
	if (left.kind === 'method-not-allowed' && right.kind === 'method-not-allowed') {
		return methodNotAllowedError(unionVerbs(left.allowed, right.allowed))
	}
	if (left.kind === 'method-not-allowed') return left
	return right
}

// ============================================================================
// Rendering
// ============================================================================

export const applyErrorStatus = (error: ApplyError): number => {
	switch (error.kind) {
		case 'not-matched':
			return 404
		case 'method-not-allowed':
			return 405
		case 'invalid-request':
			return 400
	}
}

/**
 * Human-readable description; `verbose` lists the allowed methods
 */
export const describeApplyError = (error: ApplyError, verbose = false): string => {
	switch (error.kind) {
		case 'not-matched':
			return 'not matched'
		case 'method-not-allowed':
			return verbose
				? `method not allowed (allowed methods: ${verbList(error.allowed).join(', ')})`
				: 'method not allowed'
		case 'invalid-request':
			return error.reason
	}
}

/**
 * 404 / 405 (with an `allow` header) / 400
 */
export const applyErrorResponse = (error: ApplyError): ServerResponse => {
	switch (error.kind) {
		case 'not-matched':
			return notFound()
		case 'method-not-allowed':
			return methodNotAllowed(error.allowed)
		case 'invalid-request':
			return badRequest(error.reason)
	}
}

/**
 * Carry a routing failure over to the runtime error channel
 */
export const applyErrorToHttpError = (error: ApplyError): HttpError =>
	new HttpError(describeApplyError(error), {
		status: applyErrorStatus(error),
		details: error.kind === 'method-not-allowed' ? { allow: allowHeader(error.allowed) } : undefined,
		cause: error.kind === 'invalid-request' ? error.cause : undefined,
	})
