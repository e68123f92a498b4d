/**
 * Join combinators
 *
 * join() and joinAll() drive several tasks side by side. Every poll advances
 * each slot that is not done yet, in declaration order. The first failure
 * wins: it is returned at once and the remaining slots are dropped.
 */

import { MaybeDone } from './maybe-done'
import { ok, Pending, Ready } from './poll'
import { pollAfterReady, type Task } from './task'

/**
 * Drive two tasks to completion and combine their values
 */
export const join = <A, B, C>(
	first: Task<A>,
	second: Task<B>,
	combine: (a: A, b: B) => C
): Task<C> => {
	let slots: readonly [MaybeDone<A>, MaybeDone<B>] | null = [
		new MaybeDone(first),
		new MaybeDone(second),
	]

	const drop = () => {
		slots?.[0].clear()
		slots?.[1].clear()
		slots = null
	}

	return {
		poll: (cx) => {
			if (slots === null) return pollAfterReady('join')
			const [a, b] = slots

			const doneA = a.pollDone(cx)
			if (!doneA.ok) {
				drop()
				return Ready(doneA)
			}

			const doneB = b.pollDone(cx)
			if (!doneB.ok) {
				drop()
				return Ready(doneB)
			}

			if (!doneA.value || !doneB.value) return Pending

			const value = combine(a.take(), b.take())
			slots = null
			return Ready(ok(value))
		},
	}
}

/**
 * Drive an ordered collection of tasks; resolves to their values in the same order
 */
export const joinAll = <T>(tasks: readonly Task<T>[]): Task<T[]> => {
	let slots: MaybeDone<T>[] | null = tasks.map((task) => new MaybeDone(task))

	return {
		poll: (cx) => {
			if (slots === null) return pollAfterReady('joinAll')

			let allDone = true
			for (const slot of slots) {
				const done = slot.pollDone(cx)
				if (!done.ok) {
					for (const other of slots) other.clear()
					slots = null
					return Ready(done)
				}
				allDone = allDone && done.value
			}

			if (!allDone) return Pending

			const values = slots.map((slot) => slot.take())
			slots = null
			return Ready(ok(values))
		},
	}
}
