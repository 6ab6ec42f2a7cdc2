/**
 * CLI option validation.
 *
 * @module cli/options
 */

import { z } from 'zod'
import { StructuredError } from '../errors/index.ts'
import { DEFAULT_LOG_LEVEL, LOG_LEVELS } from '../logging/index.ts'
import { type FlagValue, normalizeFlagValue } from './index.ts'

export const OUTPUT_FORMATS = ['text', 'json', 'html'] as const

/**
 * Schema for the options shared by every command.
 */
export const CliOptionsSchema = z.object({
	/** Output format for `render` (default: "text") */
	format: z.enum(OUTPUT_FORMATS).default('text'),
	/** Directory for the JSONL log file (default: ~/.vtt-transcript/logs) */
	logDir: z.string().min(1).optional(),
	/** Lowest level written to the log file (default: "info") */
	logLevel: z.enum(LOG_LEVELS).default(DEFAULT_LOG_LEVEL),
})

export type CliOptions = z.infer<typeof CliOptionsSchema>

/** Command-line flag for each option. */
const FLAG_NAMES = {
	format: 'format',
	logDir: 'log-dir',
	logLevel: 'log-level',
} as const satisfies Record<keyof CliOptions, string>

const KNOWN_FLAGS: ReadonlySet<string> = new Set(Object.values(FLAG_NAMES))

function flagName(key: PropertyKey | undefined): string {
	const match = Object.entries(FLAG_NAMES).find(([option]) => option === key)
	return match ? match[1] : String(key)
}

function invalidOptions(message: string, context: Record<string, unknown>): StructuredError {
	return new StructuredError(message, 'CONFIGURATION', 'INVALID_OPTIONS', false, context)
}

/**
 * Validate parsed flags and apply defaults.
 *
 * Duplicate flags use their first value.
 *
 * @throws StructuredError (`INVALID_OPTIONS`) naming the first bad flag
 *
 * @example
 * ```ts
 * parseCliOptions({ format: "json" })
 * // → { format: "json", logLevel: "info" }
 * parseCliOptions({ format: "xml" }) // throws "Invalid option --format: …"
 * ```
 */
export function parseCliOptions(flags: Record<string, FlagValue>): CliOptions {
	const unknown = Object.keys(flags).find((flag) => !KNOWN_FLAGS.has(flag))
	if (unknown !== undefined) {
		throw invalidOptions(`Unknown option --${unknown}`, { flag: unknown })
	}

	const result = CliOptionsSchema.safeParse({
		format: normalizeFlagValue(flags[FLAG_NAMES.format]),
		logDir: normalizeFlagValue(flags[FLAG_NAMES.logDir]),
		logLevel: normalizeFlagValue(flags[FLAG_NAMES.logLevel]),
	})

	if (!result.success) {
		const [issue] = result.error.issues
		const flag = flagName(issue?.path[0])
		throw invalidOptions(`Invalid option --${flag}: ${issue?.message ?? 'invalid value'}`, {
			flag,
		})
	}

	return result.data
}
