/**
 * sluice
 * Composable HTTP endpoints with backtracking routing and poll-driven tasks
 *
 * This is the main package that re-exports from:
 * - @sluice/app: endpoints, combinators, driver, app container
 * - @sluice/core: the task substrate underneath (poll, join, chain)
 *
 * @example
 * ```typescript
 * import { and, asJson, body, createApp, map, path, post } from 'sluice'
 *
 * const app = createApp({
 *   endpoint: map(post(and(path('/echo'), body(asJson))), (doc) => ({ echoed: doc })),
 * })
 * ```
 */

// ============================================================================
// Re-export everything from @sluice/app
// ============================================================================

export * from '@sluice/app'

// ============================================================================
// Task substrate from @sluice/core
// (the rest of @sluice/core is already re-exported by @sluice/app)
// ============================================================================

export type { ErrorResponseBody, MethodCode } from '@sluice/core'

export {
	allowHeader,
	andThenTask,
	badRequestError,
	deferTask,
	errorResponse,
	hasVerb,
	httpErrorResponse,
	internalError,
	intoTask,
	isMethod,
	isPending,
	isReady,
	isServerResponse,
	isStreamingBody,
	isTask,
	join,
	joinAll,
	lazyTask,
	mapErrTask,
	mapPoll,
	mapPollErr,
	mapPollOk,
	mapTask,
	MaybeDone,
	methodNotAllowed,
	MethodNames,
	Methods,
	NO_VERBS,
	noContent,
	OneShot,
	orElseTask,
	payloadTooLargeError,
	pollAfterReady,
	promiseTask,
	resultTask,
	thenTask,
	toHttpError,
	unionVerbs,
	verbList,
	verbs,
} from '@sluice/core'
