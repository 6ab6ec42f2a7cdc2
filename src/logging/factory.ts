/**
 * App Logger Factory.
 *
 * Creates configured LogTape loggers with:
 * - JSONL file output with rotation
 * - Hierarchical categories for subsystem filtering
 * - A per-user log location (~/.vtt-transcript/logs/<name>.jsonl)
 */

import { existsSync, mkdirSync } from 'node:fs'
import { join } from 'node:path'
import { getRotatingFileSink } from '@logtape/file'
import {
	configure,
	getLogger,
	jsonLinesFormatter,
	type Logger,
	reset,
} from '@logtape/logtape'
import {
	DEFAULT_LOG_DIR,
	DEFAULT_LOG_EXTENSION,
	DEFAULT_LOG_LEVEL,
	DEFAULT_MAX_FILES,
	DEFAULT_MAX_SIZE,
	type LogLevel,
} from './config.ts'
import { createCorrelationId } from './correlation.ts'

/**
 * Options for creating an app logger.
 */
export interface AppLoggerOptions<TSubsystem extends string = string> {
	/** App name (used for log file name and root category). Should be kebab-case. */
	name: string

	/**
	 * Subsystem names accepted by {@link AppLogger.getSubsystemLogger}.
	 * Each subsystem logs under the app category.
	 *
	 * @example ["cli"] → logger for ["vtt-transcript", "cli"]
	 */
	subsystems?: readonly TSubsystem[]

	/** Log directory. Defaults to ~/.vtt-transcript/logs/ */
	logDir?: string

	/**
	 * Log file name (without extension). Defaults to the app name.
	 * Results in: <logDir>/<logFileName>.jsonl
	 */
	logFileName?: string

	/** Maximum log file size before rotation. Defaults to 1 MiB. */
	maxSize?: number

	/** Number of rotated files to keep. Defaults to 5. */
	maxFiles?: number

	/** Lowest log level to capture. Defaults to "info". */
	lowestLevel?: LogLevel
}

/**
 * Result of creating an app logger.
 */
export interface AppLogger<TSubsystem extends string = string> {
	/**
	 * Configure LogTape. Must be called before anything is written.
	 * Safe to call multiple times - only initializes once.
	 */
	initLogger: () => Promise<void>

	/**
	 * Flush and close the sinks, and drop the LogTape configuration this
	 * logger installed. Call before the process exits.
	 */
	closeLogger: () => Promise<void>

	/** Generate a correlation ID for request tracing. */
	createCorrelationId: typeof createCorrelationId

	/** Root logger for the app category. */
	rootLogger: Logger

	/**
	 * Get a subsystem logger.
	 *
	 * @returns Logger for the [name, subsystem] category
	 */
	getSubsystemLogger: (subsystem: TSubsystem) => Logger

	/** Log directory path */
	logDir: string

	/** Log file path */
	logFile: string
}

/**
 * Create a configured logger.
 *
 * Loggers are usable before {@link AppLogger.initLogger} runs; until LogTape
 * is configured they write nothing.
 *
 * @example
 * ```typescript
 * const { initLogger, closeLogger, getSubsystemLogger } = createAppLogger({
 *   name: "vtt-transcript",
 *   subsystems: ["cli"],
 *   lowestLevel: "debug",
 * });
 *
 * await initLogger();
 * getSubsystemLogger("cli").info("Started", { argv: process.argv.slice(2) });
 * await closeLogger();
 * ```
 */
export function createAppLogger<TSubsystem extends string>(
	options: AppLoggerOptions<TSubsystem>,
): AppLogger<TSubsystem> {
	const {
		name,
		logDir = DEFAULT_LOG_DIR,
		logFileName = name,
		maxSize = DEFAULT_MAX_SIZE,
		maxFiles = DEFAULT_MAX_FILES,
		lowestLevel = DEFAULT_LOG_LEVEL,
	} = options

	const logFile = join(logDir, `${logFileName}${DEFAULT_LOG_EXTENSION}`)

	let isInitialized = false
	let ownsConfiguration = false

	async function initLogger(): Promise<void> {
		if (isInitialized) return

		if (!existsSync(logDir)) {
			mkdirSync(logDir, { recursive: true })
		}

		// Unique sink name per app to avoid LogTape configuration conflicts
		const sinkName = `file_${name}`

		try {
			await configure({
				sinks: {
					[sinkName]: getRotatingFileSink(logFile, {
						formatter: jsonLinesFormatter,
						maxSize,
						maxFiles,
					}),
				},
				loggers: [
					{
						category: [name],
						sinks: [sinkName],
						lowestLevel,
					},
					{
						category: ['logtape', 'meta'],
						sinks: [sinkName],
						lowestLevel: 'error',
					},
				],
			})
		} catch (error: unknown) {
			// Someone else (e.g. a test harness) already configured LogTape;
			// keep their configuration.
			if (
				error instanceof Error &&
				error.message.includes('Already configured')
			) {
				isInitialized = true
				return
			}
			throw error
		}

		getLogger([name]).debug('Logging initialized', {
			logDir,
			logFile,
			maxSize,
			maxFiles,
			lowestLevel,
		})

		isInitialized = true
		ownsConfiguration = true
	}

	async function closeLogger(): Promise<void> {
		if (!ownsConfiguration) return
		await reset()
		isInitialized = false
		ownsConfiguration = false
	}

	function getSubsystemLogger(subsystem: TSubsystem): Logger {
		return getLogger([name, subsystem])
	}

	return {
		initLogger,
		closeLogger,
		createCorrelationId,
		rootLogger: getLogger([name]),
		getSubsystemLogger,
		logDir,
		logFile,
	}
}
