/**
 * vtt-transcript
 *
 * Parse episode caption files (a strict WebVTT subset) and render them as
 * speaker-segmented transcripts.
 *
 * Import from subpath exports:
 *   import { parseVtt, renderTranscript } from "vtt-transcript/vtt";
 *   import { StructuredError } from "vtt-transcript/errors";
 *
 * @packageDocumentation
 */

export const VERSION = '0.1.0'

export {
	type Caption,
	parseVtt,
	parseVttOrThrow,
	renderTranscript,
	renderTranscriptHtml,
	type TimeOfDay,
	type TranscriptLine,
} from './vtt/index.ts'
