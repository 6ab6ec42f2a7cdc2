/**
 * Logging configuration defaults.
 *
 * These values can be overridden when creating an app logger.
 */

import { homedir } from 'node:os'
import { join } from 'node:path'

/** Maximum log file size before rotation (1 MiB) */
export const DEFAULT_MAX_SIZE: number = 0x400 * 0x400

/** Number of rotated files to keep */
export const DEFAULT_MAX_FILES = 5

/** Default log file extension */
export const DEFAULT_LOG_EXTENSION = '.jsonl'

/** Default log directory (~/.vtt-transcript/logs) */
export const DEFAULT_LOG_DIR = join(homedir(), '.vtt-transcript', 'logs')

/**
 * Log levels used by the CLI.
 *
 * Note: LogTape uses "warning" not "warn".
 *
 * - DEBUG: Parsing and rendering details (caption counts, file sizes)
 * - INFO: Command start/complete
 * - WARNING: Suspicious input that still works (unexpected file extension)
 * - ERROR: Failures (unreadable file, parse failure, invalid options)
 */
export const LOG_LEVELS = ['debug', 'info', 'warning', 'error'] as const

export type LogLevel = (typeof LOG_LEVELS)[number]

/** Default lowest log level to capture */
export const DEFAULT_LOG_LEVEL: LogLevel = 'info'
