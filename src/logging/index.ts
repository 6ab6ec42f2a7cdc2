/**
 * LogTape-based logging.
 *
 * @example
 * ```ts
 * import { createAppLogger } from "vtt-transcript/logging";
 *
 * const { initLogger, getSubsystemLogger } = createAppLogger({
 *   name: "vtt-transcript",
 *   subsystems: ["cli"],
 * });
 *
 * await initLogger();
 * getSubsystemLogger("cli").info("Rendered transcript", { lines: 12 });
 * ```
 *
 * @packageDocumentation
 */

export {
	DEFAULT_LOG_DIR,
	DEFAULT_LOG_EXTENSION,
	DEFAULT_LOG_LEVEL,
	DEFAULT_MAX_FILES,
	DEFAULT_MAX_SIZE,
	LOG_LEVELS,
	type LogLevel,
} from './config.ts'
export { createCorrelationId } from './correlation.ts'
export {
	type AppLogger,
	type AppLoggerOptions,
	createAppLogger,
} from './factory.ts'
