import { describe, expect, test } from 'vitest'
import { StructuredError } from '../errors/index.ts'
import { nonEmptyArray } from '../utils/index.ts'
import { toNatural } from '../validation/index.ts'
import { createCaption, isOrderedRange } from './caption.ts'
import { createTimeOfDay, type TimeOfDay } from './timestamp.ts'

function seconds(value: number): TimeOfDay {
	return createTimeOfDay(toNatural(0), toNatural(0), toNatural(value), toNatural(0))
}

describe('isOrderedRange', () => {
	test('requires start strictly before end', () => {
		expect(isOrderedRange(seconds(1), seconds(2))).toBe(true)
		expect(isOrderedRange(seconds(2), seconds(2))).toBe(false)
		expect(isOrderedRange(seconds(3), seconds(2))).toBe(false)
	})
})

describe('createCaption', () => {
	test('keeps every field', () => {
		const caption = createCaption({
			identifier: toNatural(3),
			start: seconds(1),
			end: seconds(2),
			payload: nonEmptyArray('>>', 'Hello, world!'),
		})

		expect(caption.identifier).toBe(3)
		expect(caption.start.offset).toBe(1000)
		expect(caption.end.offset).toBe(2000)
		expect(caption.payload).toEqual(['>>', 'Hello, world!'])
	})

	test('returns a frozen record', () => {
		const caption = createCaption({
			identifier: toNatural(1),
			start: seconds(0),
			end: seconds(1),
			payload: nonEmptyArray('Hi'),
		})

		expect(Object.isFrozen(caption)).toBe(true)
		expect(Object.isFrozen(caption.payload)).toBe(true)
		expect(Object.isFrozen(caption.start)).toBe(true)
	})

	test('does not share the payload array with the caller', () => {
		const payload = nonEmptyArray('one')
		const caption = createCaption({
			identifier: toNatural(1),
			start: seconds(0),
			end: seconds(1),
			payload,
		})

		expect(caption.payload).not.toBe(payload)
	})

	test('rejects an empty time range', () => {
		expect(() =>
			createCaption({
				identifier: toNatural(7),
				start: seconds(2),
				end: seconds(2),
				payload: nonEmptyArray('x'),
			}),
		).toThrow('Caption 7 must end after it starts')
	})

	test('reports an inverted range with formatted timestamps', () => {
		try {
			createCaption({
				identifier: toNatural(7),
				start: seconds(5),
				end: seconds(4),
				payload: nonEmptyArray('x'),
			})
			expect.unreachable()
		} catch (error) {
			expect(error).toBeInstanceOf(StructuredError)
			expect(error).toMatchObject({
				code: 'INVALID_CAPTION_RANGE',
				context: { identifier: 7, start: '00:00:05.000', end: '00:00:04.000' },
			})
		}
	})
})
