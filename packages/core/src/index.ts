/**
 * @sluice/core
 * Poll-driven task substrate, runtime errors and response helpers
 * Pure building blocks with no I/O of their own
 */

export type { Handler, Layer, Wrapper } from './compose'
// Composition utilities (pure functions)
export { compose, pipe } from './compose'

export type { Poll, PollResult, Result } from './poll'
// Poll / Result
export { err, isPending, isReady, mapPoll, mapPollErr, mapPollOk, ok, Pending, Ready } from './poll'

export type { Task, TaskContext, TaskLike } from './task'
// Tasks
export {
	deferTask,
	failed,
	intoTask,
	isTask,
	lazyTask,
	OneShot,
	pollAfterReady,
	promiseTask,
	ready,
	resultTask,
} from './task'
export { MaybeDone } from './maybe-done'
export { join, joinAll } from './join'
export { andThenTask, mapErrTask, mapTask, orElseTask, thenTask } from './chain'

export type { HttpErrorInit } from './error'
// Runtime errors
export {
	badRequestError,
	HttpError,
	internalError,
	isHttpError,
	payloadTooLargeError,
	ProtocolViolation,
	toHttpError,
} from './error'

export type { Method, MethodCode, Verbs } from './methods'
// HTTP methods
export {
	allowHeader,
	hasVerb,
	isMethod,
	MethodNames,
	Methods,
	NO_VERBS,
	unionVerbs,
	verbList,
	verbs,
} from './methods'

export type { ErrorResponseBody, ResponseBody, ServerResponse } from './response'
// Response helpers (pure, no I/O)
export {
	badRequest,
	errorResponse,
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
} from './response'
