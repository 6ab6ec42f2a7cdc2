/**
 * WebVTT (.vtt) parser for the subset used by episode captions.
 *
 * Only this shape is accepted:
 *
 * ```
 * WEBVTT
 *
 * 1
 * 00:00:00.000 --> 00:00:02.000
 * >>
 * Hello, world!
 *
 * 2
 * 00:00:02.000 --> 00:00:04.500
 * Second caption.
 * ```
 *
 * Identifiers are decimal numbers, every caption ends after it starts, lines
 * end in `\n` (no carriage returns), captions are separated by one blank
 * line and the document ends with the last payload line's newline. Cue
 * settings, styling, comments and regions are not supported.
 *
 * Parsing is all or nothing: a document that doesn't match returns
 * `undefined`, without a position.
 *
 * @module vtt/parser
 */

import { StructuredError } from '../errors/index.ts'
import { type NonEmptyArray, nonEmptyArray } from '../utils/index.ts'
import { type Natural, parseNatural } from '../validation/index.ts'
import { type Caption, createCaption, isOrderedRange } from './caption.ts'
import { isAsciiDigit, TextReader } from './reader.ts'
import { readTimestamp } from './timestamp.ts'

const HEADER = 'WEBVTT\n\n'
const NEWLINE = '\n'
const ARROW = ' --> '

/**
 * Thrown by {@link parseVttOrThrow} when a document doesn't match.
 */
export class VttParseError extends StructuredError {
	constructor(context: Record<string, unknown>) {
		super(
			'Document is not a supported WebVTT file',
			'VALIDATION',
			'VTT_PARSE_FAILED',
			false,
			context,
		)
		this.name = 'VttParseError'
	}
}

/**
 * Check if a file path is a VTT file.
 *
 * @param filePath - Path to check
 * @returns True if the file has a .vtt extension (case-insensitive)
 */
export function isVttFile(filePath: string): boolean {
	return filePath.toLowerCase().endsWith('.vtt')
}

function isLineCharacter(char: string): boolean {
	return char !== NEWLINE
}

function readIdentifier(reader: TextReader): Natural | undefined {
	const digits = reader.readWhile(isAsciiDigit)
	return digits === undefined ? undefined : parseNatural(digits)
}

/**
 * A non-empty line of text and its terminating newline.
 */
function readLine(reader: TextReader): string | undefined {
	const start = reader.mark()
	const line = reader.readWhile(isLineCharacter)
	if (line === undefined || !reader.readLiteral(NEWLINE)) {
		reader.reset(start)
		return undefined
	}
	return line
}

function readPayload(reader: TextReader): NonEmptyArray<string> | undefined {
	const first = readLine(reader)
	if (first === undefined) return undefined

	const rest: string[] = []
	for (let line = readLine(reader); line !== undefined; line = readLine(reader)) {
		rest.push(line)
	}
	return nonEmptyArray(first, ...rest)
}

function readCaption(reader: TextReader): Caption | undefined {
	const identifier = readIdentifier(reader)
	if (identifier === undefined || !reader.readLiteral(NEWLINE)) return undefined

	const start = readTimestamp(reader)
	if (start === undefined || !reader.readLiteral(ARROW)) return undefined

	const end = readTimestamp(reader)
	if (end === undefined || !reader.readLiteral(NEWLINE)) return undefined

	if (!isOrderedRange(start, end)) return undefined

	const payload = readPayload(reader)
	if (payload === undefined) return undefined

	return createCaption({ identifier, start, end, payload })
}

/**
 * Read zero or more captions separated by a single newline. When a
 * separator isn't followed by a caption, the reader is left before it.
 */
function readCaptions(reader: TextReader): Caption[] {
	const captions: Caption[] = []

	let mark = reader.mark()
	let caption = readCaption(reader)
	while (caption !== undefined) {
		captions.push(caption)
		mark = reader.mark()
		caption = reader.readLiteral(NEWLINE) ? readCaption(reader) : undefined
	}
	reader.reset(mark)

	return captions
}

/**
 * Parse a WebVTT document into captions.
 *
 * @param content - Raw VTT file content with `\n` line endings
 * @returns Captions in document order, or `undefined` if the whole document doesn't match
 *
 * @example
 * ```ts
 * parseVtt("WEBVTT\n\n1\n00:00:00.000 --> 00:00:02.000\nHi\n")?.length // 1
 * parseVtt("WEBVTT\n1\n...") // undefined
 * ```
 */
export function parseVtt(content: string): Caption[] | undefined {
	const reader = new TextReader(content)
	if (!reader.readLiteral(HEADER)) return undefined

	const captions = readCaptions(reader)
	return reader.atEnd ? captions : undefined
}

/**
 * Parse a WebVTT document, throwing instead of returning `undefined`.
 *
 * @throws VttParseError if the document doesn't match
 */
export function parseVttOrThrow(content: string): Caption[] {
	const captions = parseVtt(content)
	if (captions === undefined) {
		throw new VttParseError({ length: content.length })
	}
	return captions
}
