/**
 * Driver
 *
 * applyRequest() routes once, synchronously, and closes the routing context.
 * runTask() polls the resulting task until it is ready. A Pending poll
 * parks the driver until the task calls cx.wake(); the next poll runs in a
 * microtask, so one wake per cycle is enough no matter how often it fires.
 */

import type { HttpError, Result, Task, TaskContext } from '@sluice/core'
import type { ApplyError, ApplyResult } from './apply-error'
import { ApplyContext } from './context'
import type { Endpoint, Tuple } from './endpoint'
import type { Input } from './input'

/**
 * Route `input` through `e`.
 * The routing context is closed before this returns, success or not.
 */
export const applyRequest = <T extends Tuple>(
	e: Endpoint<T>,
	input: Input
): ApplyResult<Task<T>> => {
	const cx = new ApplyContext(input)
	try {
		return e.apply(cx)
	} finally {
		cx.close()
	}
}

/**
 * Poll `task` to completion.
 * Resolves with its result; rejects only when the task breaks the poll
 * protocol (a ProtocolViolation) or throws outright.
 */
export const runTask = <T>(task: Task<T>): Promise<Result<T, HttpError>> =>
	new Promise((resolve, reject) => {
		let finished = false
		let scheduled = false

		const step = () => {
			scheduled = false
			if (finished) return
			try {
				const polled = task.poll(cx)
				if (polled.ready) {
					finished = true
					resolve(polled.value)
				}
			} catch (error) {
				finished = true
				reject(error)
			}
		}

		const cx: TaskContext = {
			wake: () => {
				if (finished || scheduled) return
				scheduled = true
				queueMicrotask(step)
			},
		}

		step()
	})

/**
 * Route and run in one go
 */
export const runEndpoint = async <T extends Tuple>(
	e: Endpoint<T>,
	input: Input
): Promise<Result<T, ApplyError | HttpError>> => {
	const routed = applyRequest(e, input)
	if (!routed.ok) return routed
	return runTask(routed.value)
}
