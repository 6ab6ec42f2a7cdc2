import { describe, expect, test } from 'vitest'
import { nonEmptyArray } from '../utils/index.ts'
import { toNatural } from '../validation/index.ts'
import { type Caption, createCaption } from './caption.ts'
import { parseVtt } from './parser.ts'
import { createTimeOfDay } from './timestamp.ts'
import { renderTranscript, renderTranscriptHtml } from './transcript.ts'

function caption(index: number, first: string, ...rest: string[]): Caption {
	return createCaption({
		identifier: toNatural(index),
		start: createTimeOfDay(toNatural(0), toNatural(0), toNatural(index), toNatural(0)),
		end: createTimeOfDay(toNatural(0), toNatural(0), toNatural(index + 1), toNatural(0)),
		payload: nonEmptyArray(first, ...rest),
	})
}

describe('renderTranscript', () => {
	test('renders nothing for no captions', () => {
		expect(renderTranscript([])).toEqual([])
	})

	test('joins a lone marker line with the following text', () => {
		const captions = parseVtt('WEBVTT\n\n1\n00:00:00.000 --> 00:00:02.000\n>>\nHello, world!\n')

		expect(captions).toBeDefined()
		expect(renderTranscript(captions ?? [])).toEqual(['>> Hello, world!'])
	})

	test('merges captions not separated by a speaker change', () => {
		expect(renderTranscript([caption(1, 'Hello'), caption(2, 'world!')])).toEqual([
			'Hello world!',
		])
	})

	test('splits only at speaker changes', () => {
		const captions = [
			caption(1, ">> We've been sent"),
			caption(2, 'good weather.'),
			caption(3, '>> Praise be.'),
		]

		expect(renderTranscript(captions)).toEqual([
			">> We've been sent good weather.",
			'>> Praise be.',
		])
	})

	test('keeps words before the first marker as their own line', () => {
		const captions = [caption(1, '...and that was it.'), caption(2, '>> Welcome back.')]

		expect(renderTranscript(captions)).toEqual(['...and that was it.', '>> Welcome back.'])
	})

	test('emits no empty leading line when the first word is a marker', () => {
		expect(renderTranscript([caption(1, '>> First.', '>> Second.')])).toEqual([
			'>> First.',
			'>> Second.',
		])
	})

	test('splits at markers in the middle of a line', () => {
		expect(renderTranscript([caption(1, '>> Yes. >> No.')])).toEqual(['>> Yes.', '>> No.'])
	})

	test('normalizes whitespace inside lines', () => {
		expect(renderTranscript([caption(1, '  >>   lots\tof   space  ')])).toEqual([
			'>> lots of space',
		])
	})

	test('treats markers attached to words as ordinary words', () => {
		expect(renderTranscript([caption(1, '>> Hi'), caption(2, '>>there')])).toEqual([
			'>> Hi >>there',
		])
	})

	test('renders consecutive markers as separate lines', () => {
		expect(renderTranscript([caption(1, '>>', '>>', 'Hi')])).toEqual(['>>', '>> Hi'])
	})

	test('parses and renders a whole document', () => {
		const vtt = `WEBVTT

1
00:00:00.000 --> 00:00:03.000
>> Welcome to the show.
Today we talk about

2
00:00:03.000 --> 00:00:05.000
type classes.
>> Sounds

3
00:00:05.000 --> 00:00:06.000
good.
`

		const first = renderTranscript(parseVtt(vtt) ?? [])
		const second = renderTranscript(parseVtt(vtt) ?? [])

		expect(first).toEqual([
			'>> Welcome to the show. Today we talk about type classes.',
			'>> Sounds good.',
		])
		expect(second).toEqual(first)
	})
})

describe('renderTranscriptHtml', () => {
	test('wraps each line in an escaped paragraph', () => {
		expect(renderTranscriptHtml(['>> Tom & Jerry', '>> <3'])).toBe(
			'<p>&gt;&gt; Tom &amp; Jerry</p>\n<p>&gt;&gt; &lt;3</p>',
		)
	})

	test('renders an empty string for no lines', () => {
		expect(renderTranscriptHtml([])).toBe('')
	})
})
