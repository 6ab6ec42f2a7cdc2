/**
 * WebVTT captions and transcripts.
 *
 * Parses the small WebVTT subset episode captions are written in, and renders
 * the captions as a transcript with one line per speaker turn.
 *
 * @example
 * ```ts
 * import { parseVtt, renderTranscript } from "vtt-transcript/vtt";
 *
 * const captions = parseVtt(await readFile("episode-1.vtt", "utf8"));
 * if (captions === undefined) {
 *   throw new Error("episode-1.vtt is not a supported WebVTT file");
 * }
 * console.log(renderTranscript(captions).join("\n"));
 * ```
 *
 * @module vtt
 */

export {
	type Caption,
	type CaptionFields,
	createCaption,
	isOrderedRange,
} from './caption.ts'
export { isVttFile, parseVtt, parseVttOrThrow, VttParseError } from './parser.ts'
export {
	compareTimeOfDay,
	createTimeOfDay,
	formatTimestamp,
	parseTimestamp,
	type TimeOfDay,
} from './timestamp.ts'
export {
	renderTranscript,
	renderTranscriptHtml,
	SPEAKER_CHANGE_MARKER,
	type TranscriptLine,
} from './transcript.ts'
