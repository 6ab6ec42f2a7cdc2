/**
 * Caption records produced by the WebVTT parser.
 *
 * @module vtt/caption
 */

import { StructuredError } from '../errors/index.ts'
import { type NonEmptyArray, nonEmptyArray } from '../utils/index.ts'
import type { Natural } from '../validation/index.ts'
import { type TimeOfDay, compareTimeOfDay, formatTimestamp } from './timestamp.ts'

/**
 * One cue block: identifier, time range and at least one line of text.
 */
export interface Caption {
	readonly identifier: Natural
	readonly start: TimeOfDay
	/** Always strictly after `start`. */
	readonly end: TimeOfDay
	/** One element per input line, in document order. */
	readonly payload: NonEmptyArray<string>
}

export interface CaptionFields {
	identifier: Natural
	start: TimeOfDay
	end: TimeOfDay
	payload: NonEmptyArray<string>
}

/**
 * True when `start` is strictly before `end`.
 */
export function isOrderedRange(start: TimeOfDay, end: TimeOfDay): boolean {
	return compareTimeOfDay(start, end) < 0
}

/**
 * Create a frozen caption.
 *
 * @throws StructuredError (`INVALID_CAPTION_RANGE`) unless `start` is before `end`
 */
export function createCaption(fields: CaptionFields): Caption {
	const { identifier, start, end, payload } = fields

	if (!isOrderedRange(start, end)) {
		throw new StructuredError(
			`Caption ${identifier} must end after it starts`,
			'VALIDATION',
			'INVALID_CAPTION_RANGE',
			false,
			{
				identifier,
				start: formatTimestamp(start),
				end: formatTimestamp(end),
			},
		)
	}

	return frozen({
		identifier,
		start: frozen({ ...start }),
		end: frozen({ ...end }),
		payload: frozen(nonEmptyArray(...payload)),
	})
}

function frozen<T extends object>(value: T): T {
	Object.freeze(value)
	return value
}
