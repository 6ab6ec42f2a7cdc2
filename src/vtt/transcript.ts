/**
 * Transcript rendering.
 *
 * Captions wrap dialogue at arbitrary points, so a caption file looks like:
 *
 * ```
 * >> We've been sent
 * good weather.
 * >> Praise be.
 * ```
 *
 * The transcript drops every line break except the ones where the speaker
 * changes:
 *
 * ```
 * >> We've been sent good weather.
 * >> Praise be.
 * ```
 *
 * @module vtt/transcript
 */

import { htmlTag } from '../html/index.ts'
import { splitWords } from '../utils/index.ts'
import type { Caption } from './caption.ts'

/** Token that starts a new speaker's turn. */
export const SPEAKER_CHANGE_MARKER = '>>'

/**
 * One rendered line. Lines that begin a speaker's turn start with `">> "`.
 */
export type TranscriptLine = string

/**
 * Group words into speaker turns. Every turn after the first starts with
 * {@link SPEAKER_CHANGE_MARKER}; words before the first marker form their
 * own turn when there are any.
 */
function segmentBySpeaker(words: readonly string[]): string[][] {
	const segments: string[][] = []
	let current: string[] = []

	for (const word of words) {
		if (word === SPEAKER_CHANGE_MARKER) {
			if (current.length > 0) segments.push(current)
			current = [word]
		} else {
			current.push(word)
		}
	}
	if (current.length > 0) segments.push(current)

	return segments
}

/**
 * Render captions as a transcript, one line per speaker turn.
 *
 * Only payload text is used. Caption boundaries and original line wrapping
 * are discarded; words are re-joined with single spaces.
 *
 * @example
 * ```ts
 * renderTranscript(parseVtt(content) ?? [])
 * // [">> We've been sent good weather.", ">> Praise be."]
 * ```
 */
export function renderTranscript(captions: readonly Caption[]): TranscriptLine[] {
	const words = captions
		.flatMap((caption) => caption.payload)
		.flatMap((line) => splitWords(line))

	return segmentBySpeaker(words).map((segment) => segment.join(' '))
}

/**
 * Render transcript lines as HTML paragraphs, one `<p>` per line.
 */
export function renderTranscriptHtml(lines: readonly TranscriptLine[]): string {
	return lines.map((line) => htmlTag('p', {}, line)).join('\n')
}
