/**
 * Homogeneous collection combinator
 *
 * Applies every endpoint in order against one cursor; any miss fails the
 * whole group with the cursor restored. Values come back in declaration
 * order, whatever order their tasks finish in.
 */

import { joinAll, mapTask, ok, type Task } from '@sluice/core'
import { type Endpoint, endpoint } from './endpoint'

export const all = <V>(endpoints: readonly Endpoint<readonly [V]>[]): Endpoint<[V[]]> =>
	endpoint((cx) => {
		const saved = cx.snapshot()
		const tasks: Task<readonly [V]>[] = []

		for (const e of endpoints) {
			const matched = e.apply(cx)
			if (!matched.ok) {
				cx.restore(saved)
				return matched
			}
			tasks.push(matched.value)
		}

		return ok(mapTask(joinAll(tasks), (outputs): [V[]] => [outputs.map(([v]) => v)]))
	})
