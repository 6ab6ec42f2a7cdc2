/**
 * Lightweight CLI argument parsing and output helpers.
 *
 * - Three-format flag parsing (--flag value, --flag=value, --flag)
 * - Flag normalization for duplicate flags
 * - Error formatting for text and JSON output
 */

import type { StructuredError } from '../errors/index.ts'

/** Raw flag value: duplicates become arrays. */
export type FlagValue = string | boolean | (string | boolean)[]

export interface ParsedArgs {
	command: string
	subcommand?: string
	positional: string[]
	flags: Record<string, FlagValue>
}

/**
 * Parse command-line arguments into structured format.
 *
 * Handles three flag formats:
 * - `--key value` (spaced syntax)
 * - `--key=value` (equals syntax)
 * - `--key` (boolean flag)
 *
 * Duplicate flags are stored as arrays:
 * - `--format json --format text` → flags.format = ["json", "text"]
 *
 * @example
 * parseArgs(["render", "episode-1.vtt", "--format", "json"])
 * // → { command: "render", subcommand: "episode-1.vtt", positional: [], flags: { format: "json" } }
 *
 * @example
 * parseArgs(["captions", "episode-1.vtt", "--log-dir=/tmp/logs"])
 * // → { command: "captions", subcommand: "episode-1.vtt", positional: [], flags: { "log-dir": "/tmp/logs" } }
 */
export function parseArgs(argv: readonly string[]): ParsedArgs {
	const positional: string[] = []
	const flags: Record<string, FlagValue> = {}

	for (let i = 0; i < argv.length; i++) {
		const arg = argv[i]
		if (!arg) continue
		if (arg.startsWith('--')) {
			const [keyRaw, ...valueParts] = arg.split('=')
			const key = keyRaw?.slice(2)
			if (!key) continue
			const value = valueParts.length > 0 ? valueParts.join('=') : undefined
			const next = argv[i + 1]

			const setValue = (newValue: string | boolean) => {
				const existing = flags[key]
				if (existing === undefined) {
					flags[key] = newValue
				} else if (Array.isArray(existing)) {
					existing.push(newValue)
				} else {
					flags[key] = [existing, newValue]
				}
			}

			if (value !== undefined) {
				setValue(value)
			} else if (next && !next.startsWith('--')) {
				setValue(next)
				i++
			} else {
				setValue(true)
			}
		} else {
			positional.push(arg)
		}
	}

	const [command, subcommand, ...rest] = positional
	return { command: command ?? '', subcommand, positional: rest, flags }
}

/**
 * Normalize a flag value to single value (string or boolean).
 * If array (from duplicate flags), returns the first element.
 *
 * @example
 * normalizeFlagValue("json") // → "json"
 * normalizeFlagValue(true) // → true
 * normalizeFlagValue(["json", "text"]) // → "json"
 * normalizeFlagValue(undefined) // → undefined
 */
export function normalizeFlagValue(
	value: FlagValue | undefined,
): string | boolean | undefined {
	if (Array.isArray(value)) {
		return value[0]
	}
	return value
}

/**
 * Format an error for the terminal.
 *
 * JSON output carries the error code and context; text output is a single
 * `Error: <message>` line.
 *
 * @example
 * formatError("text", error) // → "Error: Document is not a supported WebVTT file"
 * formatError("json", error) // → '{"success":false,"error":"…","code":"VTT_PARSE_FAILED","details":{…}}'
 */
export function formatError(
	format: 'json' | 'text',
	error: Pick<StructuredError, 'message' | 'code' | 'context'>,
): string {
	if (format === 'json') {
		return JSON.stringify({
			success: false,
			error: error.message,
			code: error.code,
			...(Object.keys(error.context).length > 0 ? { details: error.context } : {}),
		})
	}
	return `Error: ${error.message}`
}
