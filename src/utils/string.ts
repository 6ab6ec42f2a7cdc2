/**
 * String utilities
 *
 * @example
 * ```ts
 * import { splitWords } from "vtt-transcript/utils";
 *
 * splitWords("  >> We've been sent\tgood weather. "); // [">>", "We've", "been", "sent", "good", "weather."]
 * ```
 */

// ASCII whitespace, NBSP and Unicode space separators. BOM and line/paragraph
// separators stay inside words.
const WHITESPACE = /[\t\n\v\f\r \u00a0\p{Zs}]+/u

/**
 * Split text into whitespace-delimited words.
 *
 * Any run of whitespace (spaces, tabs, newlines, Unicode space separators) separates
 * words; leading and trailing whitespace produce no empty words.
 *
 * @example
 * ```ts
 * splitWords("Hello,  world!"); // ["Hello,", "world!"]
 * splitWords("   "); // []
 * ```
 */
export function splitWords(text: string): string[] {
	return text.split(WHITESPACE).filter((word) => word.length > 0)
}
