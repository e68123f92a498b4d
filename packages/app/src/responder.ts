/**
 * Responder
 * Renders endpoint outputs and failures into ServerResponses
 */

import {
	type HttpError,
	httpErrorResponse,
	isHttpError,
	isServerResponse,
	json,
	noContent,
	type ServerResponse,
	text,
} from '@sluice/core'
import { type ApplyError, applyErrorResponse } from './apply-error'
import type { Tuple } from './endpoint'

/**
 * Turns the output tuple of the top-level endpoint into a response
 */
export type Responder<T extends Tuple = Tuple> = (output: T) => ServerResponse

const renderValue = (value: unknown): ServerResponse => {
	if (value === undefined) return noContent()
	if (isServerResponse(value)) return value
	if (typeof value === 'string') return text(value)
	return json(value)
}

/**
 * Default rendering:
 * - `[]` or `[undefined]`: 204
 * - `[response]`: passed through
 * - `[string]`: text/plain
 * - `[value]`: JSON
 * - longer tuples: JSON array
 */
export const defaultResponder: Responder = (output) => {
	if (output.length === 0) return noContent()
	if (output.length === 1) return renderValue(output[0])
	return json(output)
}

/**
 * Render a failure: routing errors map to 404/405/400, runtime errors to their status.
 * 5xx messages are hidden unless `expose` is set.
 */
export const failureResponse = (error: ApplyError | HttpError, expose = false): ServerResponse =>
	isHttpError(error) ? httpErrorResponse(error, expose) : applyErrorResponse(error)
