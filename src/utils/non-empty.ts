/**
 * Sequences with at least one element.
 *
 * @module utils/non-empty
 */

import { StructuredError } from '../errors/index.ts'

/**
 * A readonly array that always has a first element.
 */
export type NonEmptyArray<T> = readonly [T, ...T[]]

/**
 * Build a non-empty array from its first element and the rest.
 *
 * @example
 * ```ts
 * const lines = nonEmptyArray(">>", "Hello, world!");
 * lines[0]; // ">>" (typed as string, not string | undefined)
 * ```
 */
export function nonEmptyArray<T>(first: T, ...rest: T[]): NonEmptyArray<T> {
	return [first, ...rest]
}

/**
 * Type guard for non-empty arrays.
 */
export function isNonEmptyArray<T>(items: readonly T[]): items is NonEmptyArray<T> {
	return items.length > 0
}

/**
 * Copy an array into a non-empty array.
 *
 * @throws StructuredError (`EMPTY_SEQUENCE`) when `items` is empty
 */
export function toNonEmptyArray<T>(items: readonly T[]): NonEmptyArray<T> {
	if (!isNonEmptyArray(items)) {
		throw new StructuredError(
			'Expected at least one element',
			'VALIDATION',
			'EMPTY_SEQUENCE',
			false,
		)
	}
	const [first, ...rest] = items
	return nonEmptyArray(first, ...rest)
}
