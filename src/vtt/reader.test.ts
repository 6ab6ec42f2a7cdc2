import { describe, expect, test } from 'vitest'
import { isAsciiDigit, TextReader } from './reader.ts'

describe('TextReader', () => {
	test('reads literals only when they match', () => {
		const reader = new TextReader('WEBVTT\n\n')

		expect(reader.readLiteral('WEBVTX')).toBe(false)
		expect(reader.mark()).toBe(0)
		expect(reader.readLiteral('WEBVTT\n\n')).toBe(true)
		expect(reader.atEnd).toBe(true)
	})

	test('reads an exact number of digits', () => {
		const reader = new TextReader('123:')

		expect(reader.readDigits(4)).toBeUndefined()
		expect(reader.readDigits(2)).toBe('12')
		expect(reader.readDigits(2)).toBeUndefined()
		expect(reader.readDigits(1)).toBe('3')
	})

	test('does not read digits past the end', () => {
		expect(new TextReader('1').readDigits(2)).toBeUndefined()
	})

	test('reads the longest matching run', () => {
		const reader = new TextReader('0042\nrest')

		expect(reader.readWhile(isAsciiDigit)).toBe('0042')
		expect(reader.readWhile(isAsciiDigit)).toBeUndefined()
		expect(reader.readLiteral('\n')).toBe(true)
	})

	test('resets to a mark', () => {
		const reader = new TextReader('abc')
		const mark = reader.mark()

		reader.readLiteral('ab')
		reader.reset(mark)

		expect(reader.readLiteral('abc')).toBe(true)
	})
})

describe('isAsciiDigit', () => {
	test('accepts only 0-9', () => {
		expect(isAsciiDigit('0')).toBe(true)
		expect(isAsciiDigit('9')).toBe(true)
		expect(isAsciiDigit('a')).toBe(false)
		expect(isAsciiDigit('٣')).toBe(false)
		expect(isAsciiDigit('')).toBe(false)
	})
})
