/**
 * WebVTT timestamps (`HH:MM:SS.mmm`).
 *
 * Every field is zero padded to a fixed width. Minutes and seconds must be
 * below 60; hours take any two digits. Values are composed into an exact
 * integer count of milliseconds since midnight.
 *
 * @module vtt/timestamp
 */

import {
	addNatural,
	multiplyNatural,
	type Natural,
	parseNatural,
	toNatural,
} from '../validation/index.ts'
import { TextReader } from './reader.ts'

/**
 * Time of day with millisecond resolution.
 */
export interface TimeOfDay {
	readonly hours: Natural
	readonly minutes: Natural
	readonly seconds: Natural
	readonly milliseconds: Natural
	/** Milliseconds since midnight; ordering uses this field. */
	readonly offset: Natural
}

const SIXTY = toNatural(60)
const ONE_THOUSAND = toNatural(1000)

function hoursToMilliseconds(hours: Natural): Natural {
	return minutesToMilliseconds(multiplyNatural(hours, SIXTY))
}

function minutesToMilliseconds(minutes: Natural): Natural {
	return secondsToMilliseconds(multiplyNatural(minutes, SIXTY))
}

function secondsToMilliseconds(seconds: Natural): Natural {
	return multiplyNatural(seconds, ONE_THOUSAND)
}

/**
 * Build a {@link TimeOfDay} from its fields.
 *
 * Does not range-check minutes or seconds; the grammar does that.
 *
 * @throws StructuredError (`NATURAL_OVERFLOW`) if the offset leaves the safe integer range
 */
export function createTimeOfDay(
	hours: Natural,
	minutes: Natural,
	seconds: Natural,
	milliseconds: Natural,
): TimeOfDay {
	const offset = [
		minutesToMilliseconds(minutes),
		secondsToMilliseconds(seconds),
		milliseconds,
	].reduce(addNatural, hoursToMilliseconds(hours))

	return { hours, minutes, seconds, milliseconds, offset }
}

function readField(reader: TextReader, width: number): Natural | undefined {
	const digits = reader.readDigits(width)
	return digits === undefined ? undefined : parseNatural(digits)
}

/**
 * Read one timestamp at the reader's position.
 */
export function readTimestamp(reader: TextReader): TimeOfDay | undefined {
	const hours = readField(reader, 2)
	if (hours === undefined || !reader.readLiteral(':')) return undefined

	const minutes = readField(reader, 2)
	if (minutes === undefined || minutes >= 60 || !reader.readLiteral(':')) {
		return undefined
	}

	const seconds = readField(reader, 2)
	if (seconds === undefined || seconds >= 60 || !reader.readLiteral('.')) {
		return undefined
	}

	const milliseconds = readField(reader, 3)
	if (milliseconds === undefined) return undefined

	return createTimeOfDay(hours, minutes, seconds, milliseconds)
}

/**
 * Parse a complete `HH:MM:SS.mmm` string.
 *
 * @example
 * ```ts
 * parseTimestamp("00:01:02.003")?.offset // 62003
 * parseTimestamp("00:60:00.000") // undefined
 * parseTimestamp("0:00:00.000") // undefined
 * ```
 */
export function parseTimestamp(text: string): TimeOfDay | undefined {
	const reader = new TextReader(text)
	const time = readTimestamp(reader)
	return time !== undefined && reader.atEnd ? time : undefined
}

/**
 * Format a time of day as a zero-padded `HH:MM:SS.mmm` timestamp.
 */
export function formatTimestamp(time: TimeOfDay): string {
	const pad = (value: number, width: number) =>
		value.toString().padStart(width, '0')

	return `${pad(time.hours, 2)}:${pad(time.minutes, 2)}:${pad(time.seconds, 2)}.${pad(time.milliseconds, 3)}`
}

/**
 * Compare two times of day by offset.
 *
 * @returns Negative if `a` is earlier, positive if later, zero if equal
 */
export function compareTimeOfDay(a: TimeOfDay, b: TimeOfDay): number {
	return a.offset - b.offset
}
