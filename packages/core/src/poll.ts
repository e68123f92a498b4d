/**
 * Poll and Result
 * The two outcome types every task speaks
 */

import type { HttpError } from './error'

// ============================================================================
// Result
// ============================================================================

export type Result<T, E> =
	| { readonly ok: true; readonly value: T }
	| { readonly ok: false; readonly error: E }

export const ok = <T>(value: T): Result<T, never> => ({ ok: true, value })

export const err = <E>(error: E): Result<never, E> => ({ ok: false, error })

// ============================================================================
// Poll
// ============================================================================

/**
 * Outcome of a single poll: the value, or a promise to be polled again
 */
export type Poll<T> = { readonly ready: true; readonly value: T } | { readonly ready: false }

/**
 * Fallible poll outcome - the shape every Task returns
 */
export type PollResult<T, E = HttpError> = Poll<Result<T, E>>

export const Pending: Poll<never> = Object.freeze({ ready: false })

export const Ready = <T>(value: T): Poll<T> => ({ ready: true, value })

export const isReady = <T>(poll: Poll<T>): poll is { readonly ready: true; readonly value: T } =>
	poll.ready

export const isPending = <T>(poll: Poll<T>): boolean => !poll.ready

export const mapPoll = <T, U>(poll: Poll<T>, f: (value: T) => U): Poll<U> =>
	poll.ready ? Ready(f(poll.value)) : Pending

/** Map the success value of a ready result, leaving errors and Pending alone */
export const mapPollOk = <T, U, E>(poll: PollResult<T, E>, f: (value: T) => U): PollResult<U, E> =>
	mapPoll(poll, (result) => (result.ok ? ok(f(result.value)) : result))

/** Map the error of a ready result, leaving successes and Pending alone */
export const mapPollErr = <T, E, F>(poll: PollResult<T, E>, f: (error: E) => F): PollResult<T, F> =>
	mapPoll(poll, (result) => (result.ok ? result : err(f(result.error))))
