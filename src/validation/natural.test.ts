import { describe, expect, test } from 'vitest'
import { StructuredError } from '../errors/index.ts'
import {
	addNatural,
	isNatural,
	multiplyNatural,
	parseNatural,
	toNatural,
} from './natural.ts'

describe('validation/natural', () => {
	describe('isNatural', () => {
		test('accepts zero and positive integers', () => {
			expect(isNatural(0)).toBe(true)
			expect(isNatural(1)).toBe(true)
			expect(isNatural(Number.MAX_SAFE_INTEGER)).toBe(true)
		})

		test('rejects negatives, fractions and unsafe values', () => {
			expect(isNatural(-1)).toBe(false)
			expect(isNatural(1.5)).toBe(false)
			expect(isNatural(Number.NaN)).toBe(false)
			expect(isNatural(Number.POSITIVE_INFINITY)).toBe(false)
			expect(isNatural(Number.MAX_SAFE_INTEGER + 1)).toBe(false)
		})
	})

	describe('parseNatural', () => {
		test('parses decimal digits', () => {
			expect(parseNatural('0')).toBe(0)
			expect(parseNatural('42')).toBe(42)
			expect(parseNatural('007')).toBe(7)
			expect(parseNatural('9007199254740991')).toBe(Number.MAX_SAFE_INTEGER)
		})

		test('rejects anything that is not only digits', () => {
			expect(parseNatural('')).toBeUndefined()
			expect(parseNatural('-1')).toBeUndefined()
			expect(parseNatural('+1')).toBeUndefined()
			expect(parseNatural(' 1')).toBeUndefined()
			expect(parseNatural('1.0')).toBeUndefined()
			expect(parseNatural('1e3')).toBeUndefined()
			expect(parseNatural('٣')).toBeUndefined()
		})

		test('rejects values past the safe integer range', () => {
			expect(parseNatural('9007199254740992')).toBeUndefined()
			expect(parseNatural('99999999999999999999')).toBeUndefined()
		})
	})

	describe('toNatural', () => {
		test('returns valid naturals unchanged', () => {
			expect(toNatural(12)).toBe(12)
		})

		test('throws NATURAL_OVERFLOW for invalid values', () => {
			expect(() => toNatural(-3)).toThrow('not a natural number (got: -3)')
			try {
				toNatural(0.5)
				expect.unreachable()
			} catch (error) {
				expect(error).toBeInstanceOf(StructuredError)
				expect(error).toMatchObject({
					code: 'NATURAL_OVERFLOW',
					category: 'VALIDATION',
					context: { value: 0.5 },
				})
			}
		})
	})

	describe('checked arithmetic', () => {
		test('adds and multiplies within range', () => {
			expect(addNatural(toNatural(2), toNatural(3))).toBe(5)
			expect(multiplyNatural(toNatural(60), toNatural(1000))).toBe(60000)
		})

		test('throws instead of losing precision', () => {
			const max = toNatural(Number.MAX_SAFE_INTEGER)
			expect(() => addNatural(max, toNatural(1))).toThrow(StructuredError)
			expect(() => multiplyNatural(max, toNatural(2))).toThrow(StructuredError)
		})
	})
})
