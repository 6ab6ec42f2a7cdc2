/**
 * Natural numbers with checked arithmetic.
 *
 * A {@link Natural} is a non-negative integer inside the safe integer range.
 * Arithmetic on naturals never wraps or loses precision: a result outside
 * the range throws `NATURAL_OVERFLOW`.
 *
 * @module validation/natural
 */

import { StructuredError } from '../errors/index.ts'

declare const naturalBrand: unique symbol

/**
 * Non-negative safe integer. Obtain one through {@link isNatural},
 * {@link parseNatural} or the checked arithmetic helpers.
 */
export type Natural = number & { readonly [naturalBrand]: true }

const DIGITS = /^[0-9]+$/

/**
 * Check whether a number is a natural (non-negative safe integer).
 *
 * @example
 * ```ts
 * isNatural(0) // true
 * isNatural(42) // true
 * isNatural(-1) // false
 * isNatural(1.5) // false
 * isNatural(2 ** 53) // false (outside the safe range)
 * ```
 */
export function isNatural(value: number): value is Natural {
	return Number.isSafeInteger(value) && value >= 0
}

/**
 * Parse a string of ASCII decimal digits into a natural.
 *
 * Leading zeros are allowed. Anything else (signs, whitespace, an empty
 * string, or a value past `Number.MAX_SAFE_INTEGER`) yields `undefined`.
 *
 * @example
 * ```ts
 * parseNatural("007") // 7
 * parseNatural("") // undefined
 * parseNatural("-1") // undefined
 * parseNatural("9007199254740992") // undefined
 * ```
 */
export function parseNatural(digits: string): Natural | undefined {
	if (!DIGITS.test(digits)) {
		return undefined
	}
	const value = Number(digits)
	return isNatural(value) ? value : undefined
}

/**
 * Assert that a number is a natural, throwing `NATURAL_OVERFLOW` otherwise.
 *
 * @throws StructuredError when the value is negative, fractional or unsafe
 */
export function toNatural(value: number): Natural {
	if (!isNatural(value)) {
		throw new StructuredError(
			`Value is not a natural number (got: ${value})`,
			'VALIDATION',
			'NATURAL_OVERFLOW',
			false,
			{ value },
		)
	}
	return value
}

/**
 * Add two naturals.
 *
 * @throws StructuredError when the sum leaves the safe integer range
 */
export function addNatural(a: Natural, b: Natural): Natural {
	return toNatural(a + b)
}

/**
 * Multiply two naturals.
 *
 * @throws StructuredError when the product leaves the safe integer range
 */
export function multiplyNatural(a: Natural, b: Natural): Natural {
	return toNatural(a * b)
}
