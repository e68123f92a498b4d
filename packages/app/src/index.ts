/**
 * @sluice/app
 *
 * Composable, type-safe endpoints: synchronous backtracking routing over a
 * shared segment cursor, with poll-driven tasks for the work behind a match
 *
 * @example
 * ```typescript
 * import { andThen, createApp, get, oneOf, path, ready } from '@sluice/app'
 *
 * const app = createApp({
 *   endpoint: oneOf(
 *     andThen(get(path('/users')), () => ready({ users: [] })),
 *     andThen(get(path('/users/:id')), (id) => ready({ id })),
 *   ),
 * })
 *
 * const response = await app.fetch(new Request('http://localhost/users/7'))
 * ```
 */

// ============================================================================
// Core (from @sluice/core)
// ============================================================================

export type {
	Handler,
	HttpErrorInit,
	Layer,
	Method,
	Poll,
	PollResult,
	ResponseBody,
	Result,
	ServerResponse,
	Task,
	TaskContext,
	TaskLike,
	Verbs,
	Wrapper,
} from '@sluice/core'

export {
	badRequest,
	compose,
	err,
	failed,
	HttpError,
	isHttpError,
	json,
	notFound,
	ok,
	Pending,
	pipe,
	ProtocolViolation,
	Ready,
	ready,
	redirect,
	response,
	serverError,
	text,
} from '@sluice/core'

// ============================================================================
// Request
// ============================================================================

export type { InputInit, RequestBody } from './input'
export { createInput, Input, inputFromRequest } from './input'
export type { CursorSnapshot, Segment } from './segments'
export { pathSegments, Segments } from './segments'
export type { ParseFailure, SegmentParser } from './encoded'
export {
	bool,
	decodeSegment,
	encoded,
	encodeSegment,
	float,
	int,
	orSkip,
	segmentList,
	str,
} from './encoded'

// ============================================================================
// Endpoints
// ============================================================================

export { ApplyContext, createApplyContext } from './context'
export type { ApplyError, ApplyResult } from './apply-error'
export {
	applyErrorResponse,
	applyErrorStatus,
	applyErrorToHttpError,
	describeApplyError,
	invalidRequest,
	mergeApplyErrors,
	methodNotAllowedError,
	missingHeader,
	missingQuery,
	notMatched,
} from './apply-error'
export type { Concat, Endpoint, OutputOf, Tuple, ValueOf } from './endpoint'
export { applyOrRestore, endpoint } from './endpoint'

// Primitives
export type { PathOutput } from './path'
export { eos, param, path, prefix, remains, segment } from './path'
export { lazy, reject, unit, value } from './value'
export { del, get, head, onMethod, options, patch, post, put } from './method'
export type { HeaderParser } from './header'
export { header, headerEquals, optionalHeader, parsedHeader } from './header'
export type { QueryParams } from './query'
export { optionalQuery, parseQuery, query, queryParams, stringifyQuery } from './query'
export type { BodyOptions, BodyParser } from './body'
export { asBytes, asForm, asJson, asText, body, rawBody, readBody } from './body'

// Combinators
export type { AndOutput } from './and'
export { and } from './and'
export type { Either } from './or'
export { fold, left, oneOf, or, orStrict, right } from './or'
export { andThen, map, mapErr, orElse, thenResult } from './then'
export { all } from './all'
export { optional } from './optional'
export type { EndpointWrapper } from './wrapper'
export { beforeApply, orReject, orRejectWith, wrap } from './wrapper'

// ============================================================================
// Running
// ============================================================================

export { applyRequest, runEndpoint, runTask } from './run'
export type { Responder } from './responder'
export { defaultResponder, failureResponse } from './responder'
export type { App, AppConfig } from './app'
export { createApp, serverResponseToResponse } from './app'

// ============================================================================
// Tracing & Logging
// ============================================================================

export type { LogFn, LoggingOptions, TracingOptions } from './tracing'
export { getRequestId, logging, tracing } from './tracing'

// ============================================================================
// Testing
// ============================================================================

export type { TestRequest, TestRunnerOptions } from './testing'
export { createTestRunner, readResponseBody, TestRunner } from './testing'
